import { Show, createEffect, onCleanup } from 'solid-js';
import type { Component, JSX } from 'solid-js';
import { Portal } from 'solid-js/web';
import XIcon from 'lucide-solid/icons/x';

export interface DialogProps {
  isOpen: boolean;
  onClose: () => void;
  title?: JSX.Element;
  children: JSX.Element;
  /** Rendered below the body, right aligned. */
  footer?: JSX.Element;
  panelClass?: string;
  closeOnBackdrop?: boolean;
  /** Hide the close icon in the title bar. */
  hideClose?: boolean;
}

const FOCUSABLE_SELECTOR =
  'a[href],button:not([disabled]),input:not([disabled]):not([type="hidden"]),select:not([disabled]),textarea:not([disabled]),[tabindex]:not([tabindex="-1"])';

let openDialogCount = 0;
let previousBodyOverflow = '';

const lockBodyScroll = () => {
  if (openDialogCount === 0) {
    previousBodyOverflow = document.body.style.overflow;
    document.body.style.overflow = 'hidden';
  }
  openDialogCount += 1;
};

const unlockBodyScroll = () => {
  openDialogCount = Math.max(0, openDialogCount - 1);
  if (openDialogCount === 0) document.body.style.overflow = previousBodyOverflow;
};

const focusableElements = (container: HTMLElement): HTMLElement[] =>
  Array.from(container.querySelectorAll<HTMLElement>(FOCUSABLE_SELECTOR)).filter(
    (element) => element.getAttribute('aria-hidden') !== 'true',
  );

let dialogSeq = 0;

/** Modal window with a title bar; Escape and the close icon call `onClose`. */
export const Dialog: Component<DialogProps> = (props) => {
  let panelRef: HTMLDivElement | undefined;
  const titleId = `dialog-title-${++dialogSeq}`;

  createEffect(() => {
    if (!props.isOpen) return;

    const previousFocus = document.activeElement instanceof HTMLElement ? document.activeElement : null;
    lockBodyScroll();

    queueMicrotask(() => {
      if (!panelRef) return;
      const autofocus = panelRef.querySelector<HTMLElement>('[autofocus]');
      (autofocus ?? focusableElements(panelRef)[0] ?? panelRef).focus();
    });

    const onKeyDown = (event: KeyboardEvent) => {
      if (!panelRef) return;
      if (event.key === 'Escape') {
        event.preventDefault();
        props.onClose();
        return;
      }
      if (event.key !== 'Tab') return;

      const focusable = focusableElements(panelRef);
      if (focusable.length === 0) {
        event.preventDefault();
        return;
      }
      const first = focusable[0];
      const last = focusable[focusable.length - 1];
      const active = document.activeElement;
      const outside = !(active instanceof HTMLElement) || !panelRef.contains(active);

      if (event.shiftKey && (active === first || outside)) {
        event.preventDefault();
        last.focus();
      } else if (!event.shiftKey && (active === last || outside)) {
        event.preventDefault();
        first.focus();
      }
    };

    document.addEventListener('keydown', onKeyDown);
    onCleanup(() => {
      document.removeEventListener('keydown', onKeyDown);
      unlockBodyScroll();
      if (previousFocus && document.contains(previousFocus)) previousFocus.focus();
    });
  });

  return (
    <Show when={props.isOpen}>
      <Portal mount={document.body}>
        <div class="fixed inset-0 z-[1000]">
          <div
            class="absolute inset-0 bg-slate-900/40 backdrop-blur-sm"
            data-dialog-backdrop
            onClick={() => {
              if (props.closeOnBackdrop) props.onClose();
            }}
          />
          <div class="relative flex h-full items-start justify-center overflow-y-auto p-4 sm:items-center pointer-events-none">
            <div
              ref={(el) => {
                panelRef = el;
              }}
              role="dialog"
              aria-modal="true"
              aria-labelledby={props.title ? titleId : undefined}
              tabindex="-1"
              class={`relative flex w-full max-h-[calc(100dvh-2rem)] flex-col overflow-hidden rounded-lg border border-gray-200 bg-white shadow-2xl outline-none pointer-events-auto dark:border-gray-700 dark:bg-gray-900 ${
                props.panelClass ?? 'max-w-lg'
              }`}
              onClick={(event) => event.stopPropagation()}
            >
              <Show when={props.title !== undefined || !props.hideClose}>
                <div class="flex items-center justify-between gap-2 border-b border-gray-200 px-4 py-2 dark:border-gray-700">
                  <h2 id={titleId} class="text-sm font-semibold text-gray-900 dark:text-gray-100">
                    {props.title}
                  </h2>
                  <Show when={!props.hideClose}>
                    <button
                      type="button"
                      aria-label="Close"
                      class="rounded p-1 text-gray-500 hover:bg-gray-100 dark:hover:bg-gray-800"
                      onClick={() => props.onClose()}
                    >
                      <XIcon class="h-4 w-4" />
                    </button>
                  </Show>
                </div>
              </Show>
              <div class="min-h-0 flex-1 overflow-auto">{props.children}</div>
              <Show when={props.footer}>
                <div class="flex items-center justify-end gap-2 border-t border-gray-200 px-4 py-2 dark:border-gray-700">
                  {props.footer}
                </div>
              </Show>
            </div>
          </div>
        </div>
      </Portal>
    </Show>
  );
};

export default Dialog;
