import { Dialog } from '@/components/shared/Dialog';
import { DisplayField } from '@/components/shared/FormFields';
import { CopyButton } from '@/components/shared/CopyButton';
import type { TokenSecret } from '@/types/access';

/** Shows a newly created or regenerated token secret once. */
export function TokenSecretDialog(props: { secret: TokenSecret; onClose: () => void }) {
  return (
    <Dialog
      isOpen
      title="Token Secret"
      onClose={props.onClose}
      panelClass="max-w-xl"
      footer={<CopyButton text={props.secret.value} label="Copy Secret Value" />}
    >
      <div class="grid grid-cols-1 gap-3 p-4">
        <DisplayField label="Token ID" value={<code class="font-mono">{props.secret.tokenid}</code>} />
        <DisplayField label="Secret" value={<code class="font-mono">{props.secret.value}</code>} />
      </div>
      <p class="mx-4 mb-4 rounded-md bg-amber-50 p-3 text-sm text-amber-800 dark:bg-amber-900/20 dark:text-amber-200">
        Please record the API token secret - it will only be displayed now
      </p>
    </Dialog>
  );
}

export default TokenSecretDialog;
