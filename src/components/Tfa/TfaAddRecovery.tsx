import { For, Show, createSignal } from 'solid-js';
import { TfaAPI } from '@/api/tfa';
import { Button } from '@/components/shared/Button';
import { CopyButton } from '@/components/shared/CopyButton';
import { Dialog } from '@/components/shared/Dialog';
import { EditWindow } from '@/components/shared/EditWindow';
import { TextField } from '@/components/shared/FormFields';
import type { FormContext } from '@/components/shared/formContext';
import { AuthidSelector } from '@/components/Access/AuthidSelector';
import { currentUserid } from '@/stores/session';
import { showError } from '@/utils/toast';

export interface TfaAddRecoveryProps {
  baseUrl?: string;
  onClose: () => void;
  onDone?: () => void;
}

/** Keys numbered the way the login dialog refers to them. */
export const formatRecoveryKeys = (keys: readonly string[]): string =>
  keys.map((key, index) => `${index}: ${key}`).join('\n');

const escapeHtml = (text: string) =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

export function printRecoveryKeys(userid: string, keys: readonly string[]): void {
  const popup = window.open('', '_blank');
  if (!popup) {
    showError('Print failed', 'The print window was blocked.');
    return;
  }
  popup.document.write(
    `<html><head><title>Recovery Keys for ${escapeHtml(userid)}</title></head>` +
      `<body><pre style="font-size: 1.2em">${escapeHtml(formatRecoveryKeys(keys))}</pre></body></html>`,
  );
  popup.document.close();
  popup.print();
}

function RecoveryKeysDialog(props: { userid: string; keys: readonly string[]; onClose: () => void }) {
  return (
    <Dialog
      isOpen
      title="Recovery Keys"
      onClose={props.onClose}
      footer={
        <>
          <CopyButton text={formatRecoveryKeys(props.keys)} label="Copy Recovery Keys" />
          <Button size="sm" onClick={() => printRecoveryKeys(props.userid, props.keys)}>
            Print Recovery Keys
          </Button>
        </>
      }
    >
      <div class="space-y-3 p-4">
        <ol start="0" class="list-decimal pl-8 font-mono text-sm" aria-label="Recovery keys">
          <For each={props.keys}>{(key) => <li>{key}</li>}</For>
        </ol>
        <p class="text-sm text-amber-700 dark:text-amber-300">
          Please record recovery keys - they will only be displayed now
        </p>
      </div>
    </Dialog>
  );
}

/** Generate a new set of single use recovery keys. */
export function TfaAddRecovery(props: TfaAddRecoveryProps) {
  const [result, setResult] = createSignal<{ userid: string; keys: string[] } | null>(null);

  const submit = async (form: FormContext) => {
    const userid = form.text('userid');
    const keys = await TfaAPI.addRecovery(userid, form.text('password') || undefined, props.baseUrl);
    setResult({ userid, keys });
  };

  return (
    <Show
      when={result()}
      fallback={
        <EditWindow
          isOpen
          title="Add: Recovery Keys"
          onClose={() => {
            if (!result()) props.onClose();
          }}
          onDone={props.onDone}
          initialValues={{ userid: currentUserid() ?? '' }}
          onSubmit={submit}
        >
          {(form) => (
            <>
              <AuthidSelector form={form} name="userid" label="User" includeTokens={false} required />
              <TextField form={form} name="password" label="Password" type="password" />
            </>
          )}
        </EditWindow>
      }
    >
      {(shown) => <RecoveryKeysDialog userid={shown().userid} keys={shown().keys} onClose={props.onClose} />}
    </Show>
  );
}

export default TfaAddRecovery;
