import { JSX, Show, mergeProps, splitProps } from 'solid-js';
import Loader2Icon from 'lucide-solid/icons/loader-2';
import RefreshCwIcon from 'lucide-solid/icons/refresh-cw';

type ButtonVariant = 'primary' | 'secondary' | 'danger' | 'ghost';
type ButtonSize = 'sm' | 'md' | 'icon';

export interface ButtonProps extends JSX.ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: ButtonVariant;
  size?: ButtonSize;
  isLoading?: boolean;
  icon?: JSX.Element;
  class?: string;
}

const variantClasses: Record<ButtonVariant, string> = {
  primary: 'bg-blue-600 text-white hover:bg-blue-700 border border-transparent shadow-sm',
  secondary:
    'bg-white text-gray-800 hover:bg-gray-50 border border-gray-300 shadow-sm dark:bg-gray-800 dark:text-gray-100 dark:border-gray-600 dark:hover:bg-gray-700',
  danger: 'bg-red-600 text-white hover:bg-red-700 border border-transparent shadow-sm',
  ghost: 'bg-transparent text-gray-700 hover:bg-gray-100 border border-transparent dark:text-gray-200 dark:hover:bg-gray-800',
};

const sizeClasses: Record<ButtonSize, string> = {
  sm: 'px-2.5 py-1 text-xs gap-1',
  md: 'px-3 py-1.5 text-sm gap-1.5',
  icon: 'p-1.5',
};

const defaults: { variant: ButtonVariant; size: ButtonSize; type: 'button' } = {
  variant: 'secondary',
  size: 'md',
  type: 'button',
};

export function Button(props: ButtonProps) {
  const merged = mergeProps(defaults, props);
  const [local, rest] = splitProps(merged, ['variant', 'size', 'isLoading', 'icon', 'class', 'children', 'disabled']);

  return (
    <button
      class={`inline-flex items-center justify-center font-medium rounded-md transition-colors focus:outline-none focus-visible:ring-2 focus-visible:ring-blue-500 disabled:opacity-50 disabled:cursor-not-allowed ${
        variantClasses[local.variant]
      } ${sizeClasses[local.size]} ${local.class ?? ''}`.trim()}
      disabled={local.disabled || local.isLoading}
      aria-busy={local.isLoading ? 'true' : undefined}
      {...rest}
    >
      <Show when={local.isLoading} fallback={local.icon}>
        <Loader2Icon class="h-4 w-4 animate-spin" />
      </Show>
      {local.children}
    </button>
  );
}

/** Reload button of a panel toolbar; spins while loading. */
export function RefreshButton(props: { loading: boolean; onClick: () => void }) {
  return (
    <Button
      size="icon"
      variant="ghost"
      aria-label="Refresh"
      title="Refresh"
      disabled={props.loading}
      onClick={() => props.onClick()}
    >
      <RefreshCwIcon class={`h-4 w-4 ${props.loading ? 'animate-spin' : ''}`} />
    </Button>
  );
}

export default Button;
