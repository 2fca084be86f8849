import { For, Show, createMemo, createSignal } from 'solid-js';
import type { JSX } from 'solid-js';
import { Dialog } from './Dialog';
import { Button } from './Button';
import { createFormContext } from './formContext';
import type { FormContext, FormValues } from './formContext';
import { inputPanel } from './Form';
import { errorMessage, handleError } from '@/utils/errorHandler';

export interface WizardPage {
  id: string;
  title: string;
  render: (form: FormContext) => JSX.Element;
  /** Extra check for this page; field errors are always checked. */
  valid?: (form: FormContext) => boolean;
}

export interface WizardProps {
  title: string;
  pages: readonly WizardPage[];
  onClose: () => void;
  onSubmit: (form: FormContext) => Promise<unknown>;
  onDone?: () => void;
  initialValues?: FormValues;
  submitText?: string;
}

/**
 * Multi page form. Later pages stay locked until every page before them is
 * valid; Finish submits the values of all pages.
 */
export function Wizard(props: WizardProps) {
  const form = createFormContext(props.initialValues ?? {});
  const [index, setIndex] = createSignal(0);
  const [submitting, setSubmitting] = createSignal(false);
  const [submitError, setSubmitError] = createSignal<string | null>(null);

  const page = createMemo(() => props.pages[index()]);
  // fields of other pages are unmounted, so only the current page's errors are live
  const pageValid = () => form.valid() && (page().valid?.(form) ?? true);
  const isLast = () => index() === props.pages.length - 1;

  const next = async () => {
    if (!pageValid()) return;
    if (!isLast()) {
      setIndex(index() + 1);
      return;
    }
    setSubmitting(true);
    setSubmitError(null);
    try {
      await props.onSubmit(form);
      props.onDone?.();
      props.onClose();
    } catch (err) {
      handleError(err, { component: 'Wizard', action: props.title });
      setSubmitError(errorMessage(err));
    } finally {
      setSubmitting(false);
    }
  };

  const footer = (
    <>
      <Show when={index() > 0}>
        <Button size="sm" disabled={submitting()} onClick={() => setIndex(index() - 1)}>
          Back
        </Button>
      </Show>
      <Button size="sm" variant="primary" isLoading={submitting()} disabled={!pageValid()} onClick={() => void next()}>
        {isLast() ? (props.submitText ?? 'Finish') : 'Next'}
      </Button>
    </>
  );

  return (
    <Dialog isOpen title={props.title} onClose={props.onClose} footer={footer} panelClass="max-w-3xl">
      <div class="flex min-h-[320px]">
        <nav class="w-40 flex-shrink-0 border-r border-gray-200 py-2 dark:border-gray-700" aria-label="Wizard pages">
          <For each={props.pages}>
            {(item, i) => (
              <button
                type="button"
                class={`block w-full px-3 py-1.5 text-left text-sm ${
                  i() === index()
                    ? 'bg-blue-50 font-medium text-blue-700 dark:bg-blue-900/30 dark:text-blue-300'
                    : 'text-gray-700 disabled:text-gray-400 dark:text-gray-300'
                }`}
                disabled={i() > index() || submitting()}
                aria-current={i() === index() ? 'step' : undefined}
                onClick={() => setIndex(i())}
              >
                {item.title}
              </button>
            )}
          </For>
        </nav>
        <div class="flex-1">
          <Show when={submitError()}>
            {(message) => (
              <div role="alert" class="m-4 mb-0 rounded-md border border-red-200 bg-red-50 p-3 text-sm text-red-800">
                {message()}
              </div>
            )}
          </Show>
          <div class={inputPanel}>{page().render(form)}</div>
        </div>
      </div>
    </Dialog>
  );
}

export default Wizard;
