import { For, Show, createSignal, onCleanup, onMount } from 'solid-js';
import type { JSX } from 'solid-js';
import ChevronDownIcon from 'lucide-solid/icons/chevron-down';
import { Button } from './Button';

export interface MenuItem {
  label: string;
  icon?: JSX.Element;
  disabled?: boolean;
  onSelect: () => void;
}

export interface MenuButtonProps {
  label: string;
  items: readonly MenuItem[];
  icon?: JSX.Element;
  disabled?: boolean;
}

/** Button opening a drop-down menu. */
export function MenuButton(props: MenuButtonProps) {
  const [open, setOpen] = createSignal(false);
  let container: HTMLDivElement | undefined;

  onMount(() => {
    const onDocumentClick = (event: MouseEvent) => {
      if (container && event.target instanceof Node && !container.contains(event.target)) setOpen(false);
    };
    document.addEventListener('mousedown', onDocumentClick);
    onCleanup(() => document.removeEventListener('mousedown', onDocumentClick));
  });

  const choose = (item: MenuItem) => {
    setOpen(false);
    item.onSelect();
  };

  return (
    <div
      ref={(el) => {
        container = el;
      }}
      class="relative inline-block"
      onKeyDown={(event) => {
        if (event.key === 'Escape') setOpen(false);
      }}
    >
      <Button
        size="sm"
        icon={props.icon}
        disabled={props.disabled}
        aria-haspopup="menu"
        aria-expanded={open() ? 'true' : 'false'}
        onClick={() => setOpen(!open())}
      >
        {props.label}
        <ChevronDownIcon class="h-3 w-3" />
      </Button>
      <Show when={open()}>
        <div
          role="menu"
          class="absolute left-0 z-50 mt-1 min-w-[12rem] rounded-md border border-gray-200 bg-white py-1 shadow-lg dark:border-gray-700 dark:bg-gray-800"
        >
          <For each={props.items}>
            {(item) => (
              <button
                type="button"
                role="menuitem"
                disabled={item.disabled}
                class="flex w-full items-center gap-2 px-3 py-1.5 text-left text-sm text-gray-700 hover:bg-gray-100 disabled:opacity-50 dark:text-gray-200 dark:hover:bg-gray-700"
                onClick={() => choose(item)}
              >
                {item.icon}
                {item.label}
              </button>
            )}
          </For>
        </div>
      </Show>
    </div>
  );
}

export default MenuButton;
