import { createSignal } from 'solid-js';
import type { JSX } from 'solid-js';
import AlertCircleIcon from 'lucide-solid/icons/alert-circle';
import { Dialog } from './Dialog';
import { Button } from './Button';
import { errorMessage, handleError } from '@/utils/errorHandler';

export interface AlertDialogProps {
  isOpen: boolean;
  message: JSX.Element;
  title?: string;
  onClose: () => void;
}

/** Error message box with a single OK button. */
export function AlertDialog(props: AlertDialogProps) {
  return (
    <Dialog
      isOpen={props.isOpen}
      onClose={props.onClose}
      title={props.title ?? 'Alert'}
      footer={
        <Button size="sm" variant="primary" onClick={() => props.onClose()}>
          OK
        </Button>
      }
    >
      <div role="alert" class="flex items-start gap-3 p-4 text-sm text-gray-800 dark:text-gray-200">
        <AlertCircleIcon class="h-5 w-5 flex-shrink-0 text-red-500" />
        <div class="whitespace-pre-wrap break-words">{props.message}</div>
      </div>
    </Dialog>
  );
}

export interface AlertState {
  /** Log `err` and show it in an alert box titled `title`. */
  show: (title: string, err: unknown) => void;
  view: () => JSX.Element;
}

/** Alert box state for a panel that reports failed actions. */
export function createAlert(component: string): AlertState {
  const [current, setCurrent] = createSignal<{ title: string; message: string } | null>(null);

  return {
    show: (title, err) => {
      handleError(err, { component, action: title });
      setCurrent({ title, message: errorMessage(err) });
    },
    view: () => (
      <AlertDialog
        isOpen={current() !== null}
        title={current()?.title ?? 'Error'}
        message={current()?.message ?? ''}
        onClose={() => setCurrent(null)}
      />
    ),
  };
}

export default AlertDialog;
