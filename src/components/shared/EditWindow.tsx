import { Show, createEffect, createSignal, on } from 'solid-js';
import type { JSX } from 'solid-js';
import AlertTriangleIcon from 'lucide-solid/icons/alert-triangle';
import { Dialog } from './Dialog';
import { Button } from './Button';
import { createFormContext } from './formContext';
import type { FormContext, FormValues } from './formContext';
import { inputPanel } from './Form';
import { errorMessage, handleError } from '@/utils/errorHandler';

export interface EditWindowProps {
  isOpen: boolean;
  title: string;
  onClose: () => void;
  /** Called after a successful submit, before the window closes. */
  onDone?: () => void;
  /**
   * Loads the values of an existing item. Its presence puts the window in
   * edit mode: the submit text is `Update`, a Reset button is shown and the
   * submit needs a changed value.
   */
  loader?: () => Promise<FormValues>;
  initialValues?: FormValues;
  onSubmit: (form: FormContext) => Promise<unknown>;
  children: (form: FormContext) => JSX.Element;
  submitText?: string;
  advancedCheckbox?: boolean;
  /** Extra check across fields; returns an error text. */
  validate?: (form: FormContext) => string | null;
  panelClass?: string;
  /** Allow submitting an edit without changes. */
  submitClean?: boolean;
}

/** Form dialog for creating or editing one item. */
export function EditWindow(props: EditWindowProps) {
  const form = createFormContext(props.initialValues ?? {});
  const [loading, setLoading] = createSignal(false);
  const [submitting, setSubmitting] = createSignal(false);
  const [loadError, setLoadError] = createSignal<string | null>(null);
  const [submitError, setSubmitError] = createSignal<string | null>(null);
  const isEdit = () => props.loader !== undefined;

  const load = async () => {
    const loader = props.loader;
    if (!loader) return;
    setLoading(true);
    setLoadError(null);
    try {
      form.load(await loader());
    } catch (err) {
      handleError(err, { component: 'EditWindow', action: `load ${props.title}` });
      setLoadError(errorMessage(err));
    } finally {
      setLoading(false);
    }
  };

  createEffect(
    on(
      () => props.isOpen,
      (open) => {
        if (!open) return;
        setSubmitError(null);
        form.load({ ...(props.initialValues ?? {}) });
        void load();
      },
    ),
  );

  const crossFieldError = () => props.validate?.(form) ?? null;
  const canSubmit = () =>
    !loading() &&
    !submitting() &&
    loadError() === null &&
    form.valid() &&
    crossFieldError() === null &&
    (!isEdit() || props.submitClean || form.dirty());

  const submit = async (event?: Event) => {
    event?.preventDefault();
    if (!canSubmit()) return;
    setSubmitting(true);
    setSubmitError(null);
    try {
      await props.onSubmit(form);
      props.onDone?.();
      props.onClose();
    } catch (err) {
      handleError(err, { component: 'EditWindow', action: `submit ${props.title}` });
      setSubmitError(errorMessage(err));
    } finally {
      setSubmitting(false);
    }
  };

  const footer = (
    <>
      <Show when={props.advancedCheckbox}>
        <label class="mr-auto flex items-center gap-2 text-xs text-gray-700 dark:text-gray-300">
          <input
            type="checkbox"
            checked={form.advanced()}
            onChange={(event) => form.setAdvanced(event.currentTarget.checked)}
          />
          Advanced
        </label>
      </Show>
      <Show when={isEdit()}>
        <Button size="sm" disabled={!form.dirty() || submitting()} onClick={() => form.reset()}>
          Reset
        </Button>
      </Show>
      <Button size="sm" variant="primary" onClick={() => void submit()} isLoading={submitting()} disabled={!canSubmit()}>
        {props.submitText ?? (isEdit() ? 'Update' : 'Add')}
      </Button>
    </>
  );

  return (
    <Dialog isOpen={props.isOpen} onClose={props.onClose} title={props.title} footer={footer} panelClass={props.panelClass ?? 'max-w-2xl'}>
      <form onSubmit={(event) => void submit(event)} novalidate>
        <Show when={loadError() ?? submitError()}>
          {(message) => (
            <div role="alert" class="m-4 mb-0 flex items-start gap-2 rounded-md border border-red-200 bg-red-50 p-3 text-sm text-red-800 dark:border-red-800 dark:bg-red-900/20 dark:text-red-200">
              <AlertTriangleIcon class="mt-0.5 h-4 w-4 flex-shrink-0" />
              <span>{message()}</span>
            </div>
          )}
        </Show>
        <Show when={crossFieldError()}>
          {(message) => <p class="mx-4 mt-4 text-xs text-red-600 dark:text-red-400">{message()}</p>}
        </Show>
        <Show when={!loading()} fallback={<div class="p-6 text-center text-sm text-gray-500">Loading...</div>}>
          <div class={inputPanel}>{props.children(form)}</div>
        </Show>
      </form>
    </Dialog>
  );
}

export default EditWindow;
