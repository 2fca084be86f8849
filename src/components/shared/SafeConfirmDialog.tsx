import { Show, createSignal } from 'solid-js';
import type { JSX } from 'solid-js';
import { Dialog } from './Dialog';
import { Button } from './Button';
import { defaultConfirmRemoveMessage } from './ConfirmButton';
import { controlClass, formErrorText, formLabel } from './Form';

export interface SafeConfirmDialogProps {
  /** The user must type this value before confirming. */
  verifyId: string;
  onConfirm: () => void;
  onClose: () => void;
  title?: string;
  message?: JSX.Element;
  submitText?: string;
  /** Extra content below the ID field. */
  children?: JSX.Element;
}

/** Confirmation for destructive actions that requires typing the item ID. */
export function SafeConfirmDialog(props: SafeConfirmDialogProps) {
  const [value, setValue] = createSignal('');
  const matches = () => value() === props.verifyId;
  const inputId = `safe-confirm-${props.verifyId}`;

  const confirm = (event?: Event) => {
    event?.preventDefault();
    if (matches()) props.onConfirm();
  };

  return (
    <Dialog
      isOpen
      title={props.title ?? 'Confirm'}
      onClose={props.onClose}
      footer={
        <Button size="sm" variant="danger" disabled={!matches()} onClick={() => confirm()}>
          {props.submitText ?? 'Remove'}
        </Button>
      }
    >
      <form class="space-y-3 p-4" onSubmit={confirm}>
        <p class="text-sm text-blue-700 dark:text-blue-300">
          {props.message ?? defaultConfirmRemoveMessage(props.verifyId)}
        </p>
        <label for={inputId} class={formLabel}>
          {`Please enter the ID to confirm (${props.verifyId})`}
        </label>
        <input
          id={inputId}
          autofocus
          class={controlClass(value() !== '' && !matches())}
          value={value()}
          onInput={(event) => setValue(event.currentTarget.value)}
        />
        <Show when={value() !== '' && !matches()}>
          <p class={formErrorText}>Value does not match!</p>
        </Show>
        {props.children}
      </form>
    </Dialog>
  );
}

export default SafeConfirmDialog;
