import { createSignal } from 'solid-js';
import { Button } from '@/components/shared/Button';
import { Dialog } from '@/components/shared/Dialog';
import { controlClass, formLabel } from '@/components/shared/Form';
import type { TfaEntry } from '@/types/tfa';

export interface TfaConfirmRemoveProps {
  entry: Pick<TfaEntry, 'userId' | 'type' | 'description'>;
  /** Called with the entered password, `undefined` when left empty. */
  onConfirm: (password: string | undefined) => void;
  onClose: () => void;
}

export const tfaRemoveMessage = (entry: Pick<TfaEntry, 'userId' | 'type' | 'description'>): string =>
  `Are you sure you want to remove this ${entry.type} entry of user ${entry.userId} (${entry.description})?`;

export function TfaConfirmRemove(props: TfaConfirmRemoveProps) {
  const [password, setPassword] = createSignal('');

  const confirm = (event?: Event) => {
    event?.preventDefault();
    props.onConfirm(password() || undefined);
  };

  return (
    <Dialog
      isOpen
      title="Confirm TFA Removal"
      onClose={props.onClose}
      footer={
        <Button size="sm" variant="danger" onClick={() => confirm()}>
          Remove
        </Button>
      }
    >
      <form class="space-y-3 p-4" onSubmit={confirm}>
        <p class="text-sm text-gray-800 dark:text-gray-200">{tfaRemoveMessage(props.entry)}</p>
        <label for="tfa-remove-password" class={formLabel}>
          Password
        </label>
        <input
          id="tfa-remove-password"
          type="password"
          autocomplete="current-password"
          class={controlClass(false)}
          value={password()}
          onInput={(event) => setPassword(event.currentTarget.value)}
        />
      </form>
    </Dialog>
  );
}

export default TfaConfirmRemove;
