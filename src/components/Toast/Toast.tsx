import { Component, createSignal, For, onCleanup, Show } from 'solid-js';
import { Portal } from 'solid-js/web';
import CheckCircleIcon from 'lucide-solid/icons/check-circle';
import XCircleIcon from 'lucide-solid/icons/x-circle';
import AlertTriangleIcon from 'lucide-solid/icons/alert-triangle';
import InfoIcon from 'lucide-solid/icons/info';
import XIcon from 'lucide-solid/icons/x';
import { POLLING_INTERVALS, ANIMATIONS } from '@/constants';

export type ToastType = 'success' | 'error' | 'warning' | 'info';

export interface ToastMessage {
  id: string;
  type: ToastType;
  title: string;
  message?: string;
  duration?: number;
}

declare global {
  interface Window {
    showToast?: (type: ToastType, title: string, message?: string, duration?: number) => string;
  }
}

interface ToastProps {
  toast: ToastMessage;
  onRemove: (id: string) => void;
}

const colors: Record<ToastType, string> = {
  success: 'bg-green-50 dark:bg-green-900/20 text-green-800 dark:text-green-200 border-green-200 dark:border-green-800',
  error: 'bg-red-50 dark:bg-red-900/20 text-red-800 dark:text-red-200 border-red-200 dark:border-red-800',
  warning: 'bg-yellow-50 dark:bg-yellow-900/20 text-yellow-800 dark:text-yellow-200 border-yellow-200 dark:border-yellow-800',
  info: 'bg-blue-50 dark:bg-blue-900/20 text-blue-800 dark:text-blue-200 border-blue-200 dark:border-blue-800',
};

const iconColors: Record<ToastType, string> = {
  success: 'text-green-500',
  error: 'text-red-500',
  warning: 'text-yellow-500',
  info: 'text-blue-500',
};

const ToastIcon: Component<{ type: ToastType }> = (props) => {
  switch (props.type) {
    case 'success':
      return <CheckCircleIcon class="w-5 h-5" />;
    case 'error':
      return <XCircleIcon class="w-5 h-5" />;
    case 'warning':
      return <AlertTriangleIcon class="w-5 h-5" />;
    default:
      return <InfoIcon class="w-5 h-5" />;
  }
};

export const Toast: Component<ToastProps> = (props) => {
  const [show, setShow] = createSignal(true);
  let removeTimer: number | undefined;

  const dismiss = () => {
    if (removeTimer !== undefined) return;
    window.clearTimeout(autoTimer);
    setShow(false);
    removeTimer = window.setTimeout(() => props.onRemove(props.toast.id), ANIMATIONS.TOAST_SLIDE);
  };

  const autoTimer = window.setTimeout(dismiss, props.toast.duration || POLLING_INTERVALS.TOAST_DURATION);

  onCleanup(() => {
    window.clearTimeout(autoTimer);
    if (removeTimer !== undefined) window.clearTimeout(removeTimer);
  });

  return (
    <div
      class={`transform transition-[transform,opacity] duration-300 ${
        show() ? 'translate-x-0 opacity-100' : 'translate-x-full opacity-0'
      }`}
      role={props.toast.type === 'error' ? 'alert' : 'status'}
    >
      <div class={`flex items-start gap-3 p-4 border rounded-lg shadow-lg ${colors[props.toast.type]}`}>
        <div class={`flex-shrink-0 ${iconColors[props.toast.type]}`}>
          <ToastIcon type={props.toast.type} />
        </div>
        <div class="flex-1">
          <h3 class="text-sm font-medium">{props.toast.title}</h3>
          <Show when={props.toast.message}>
            <p class="mt-1 text-xs opacity-90 whitespace-pre-line">{props.toast.message}</p>
          </Show>
        </div>
        <button
          type="button"
          aria-label="Dismiss"
          onClick={dismiss}
          class="flex-shrink-0 ml-2 hover:opacity-70 transition-opacity"
        >
          <XIcon class="w-4 h-4" />
        </button>
      </div>
    </div>
  );
};

let toastCounter = 0;

/** Renders toasts and registers `window.showToast` while mounted. */
export const ToastContainer: Component = () => {
  const [toasts, setToasts] = createSignal<ToastMessage[]>([]);

  const removeToast = (id: string) => {
    setToasts((current) => current.filter((t) => t.id !== id));
  };

  window.showToast = (type, title, message, duration) => {
    toastCounter += 1;
    const id = `toast-${Date.now()}-${toastCounter}`;
    setToasts((current) => [...current, { id, type, title, message, duration }]);
    return id;
  };

  onCleanup(() => {
    window.showToast = undefined;
  });

  return (
    <Portal>
      <div class="fixed top-4 right-4 z-50 space-y-2 max-w-sm">
        <For each={toasts()}>{(toast) => <Toast toast={toast} onRemove={removeToast} />}</For>
      </div>
    </Portal>
  );
};
