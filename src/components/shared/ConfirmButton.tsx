import { Show, createSignal, splitProps } from 'solid-js';
import type { JSX } from 'solid-js';
import { Button } from './Button';
import type { ButtonProps } from './Button';
import { Dialog } from './Dialog';

export function defaultConfirmRemoveMessage(name?: string): string {
  return name ? `Are you sure you want to remove entry ${name}` : 'Are you sure you want to remove this entry?';
}

export interface ConfirmButtonProps extends Omit<ButtonProps, 'onClick'> {
  /** Asked in a Yes/No box before `onActivate`; without it the button acts at once. */
  confirmMessage?: JSX.Element;
  onActivate: () => void;
}

export function ConfirmButton(props: ConfirmButtonProps) {
  const [local, rest] = splitProps(props, ['confirmMessage', 'onActivate', 'children']);
  const [asking, setAsking] = createSignal(false);

  const request = () => {
    if (local.confirmMessage === undefined) {
      local.onActivate();
      return;
    }
    setAsking(true);
  };

  const answer = (confirmed: boolean) => {
    setAsking(false);
    if (confirmed) local.onActivate();
  };

  return (
    <>
      <Button {...rest} onClick={request}>
        {local.children}
      </Button>
      <Show when={asking()}>
        <Dialog
          isOpen
          title="Confirm"
          onClose={() => answer(false)}
          footer={
            <>
              <Button size="sm" variant="primary" onClick={() => answer(true)}>
                Yes
              </Button>
              <Button size="sm" onClick={() => answer(false)}>
                No
              </Button>
            </>
          }
        >
          <p class="p-4 text-sm text-gray-800 dark:text-gray-200">{local.confirmMessage}</p>
        </Dialog>
      </Show>
    </>
  );
}

/** Standard `Remove` button asking for confirmation. */
export function RemoveButton(props: Omit<ConfirmButtonProps, 'confirmMessage'> & { name?: string }) {
  const [local, rest] = splitProps(props, ['name']);
  return (
    <ConfirmButton {...rest} confirmMessage={defaultConfirmRemoveMessage(local.name)}>
      Remove
    </ConfirmButton>
  );
}

export default ConfirmButton;
