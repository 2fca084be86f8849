import { Show, createSignal } from 'solid-js';
import TicketIcon from 'lucide-solid/icons/ticket';
import CheckSquareIcon from 'lucide-solid/icons/check-square';
import Trash2Icon from 'lucide-solid/icons/trash-2';
import StethoscopeIcon from 'lucide-solid/icons/stethoscope';
import { SubscriptionAPI } from '@/api/subscription';
import { createAlert } from '@/components/shared/AlertDialog';
import { Button, RefreshButton } from '@/components/shared/Button';
import { ConfirmButton } from '@/components/shared/ConfirmButton';
import { Dialog } from '@/components/shared/Dialog';
import { EditWindow } from '@/components/shared/EditWindow';
import { TextField } from '@/components/shared/FormFields';
import { KVGrid, renderUrl } from '@/components/shared/KVGrid';
import type { KVRecord, KVRow } from '@/components/shared/KVGrid';
import { Toolbar, ToolbarSeparator, ToolbarSpacer } from '@/components/shared/Toolbar';
import { useLoader } from '@/hooks/useLoader';
import { renderEpoch } from '@/utils/format';
import { renderSubscriptionStatus } from '@/utils/subscription';

export const SUBSCRIPTION_ROWS: readonly KVRow[] = [
  { name: 'productname', header: 'Type' },
  { name: 'key', header: 'Subscription Key' },
  {
    name: 'status',
    header: 'Status',
    required: true,
    placeholder: renderSubscriptionStatus(undefined, undefined),
    render: (value, record) => renderSubscriptionStatus(value, record.message),
  },
  { name: 'serverid', header: 'Server ID', required: true },
  {
    name: 'checktime',
    header: 'Last checked',
    render: (value) => (typeof value === 'number' ? renderEpoch(value) : '-'),
  },
  { name: 'nextduedate', header: 'Next due date' },
  { name: 'signature', header: 'Signed/Offline', render: (value) => (value === true ? 'Yes' : 'No') },
  {
    name: 'url',
    header: 'Info URL',
    render: renderUrl,
  },
];

function SystemReport(props: { onClose: () => void }) {
  const report = useLoader(() => SubscriptionAPI.systemReport());
  return (
    <Dialog isOpen title="System Report" onClose={props.onClose} panelClass="max-w-4xl">
      <Show when={report.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <Show when={report.data()} fallback={<div class="p-6 text-center text-sm text-gray-500">Loading...</div>}>
        {(text) => <pre class="max-h-[70vh] overflow-auto p-4 font-mono text-xs">{text()}</pre>}
      </Show>
    </Dialog>
  );
}

export interface SubscriptionPanelProps {
  url?: string;
}

/** Subscription details with key upload, check and removal. */
export function SubscriptionPanel(props: SubscriptionPanelProps) {
  const info = useLoader<KVRecord>(async () => ({ ...(await SubscriptionAPI.get(props.url)) }));
  const [dialog, setDialog] = createSignal<'upload' | 'report' | null>(null);
  const [checking, setChecking] = createSignal(false);
  const alert = createAlert('SubscriptionPanel');

  const check = async () => {
    setChecking(true);
    try {
      await SubscriptionAPI.check(props.url);
      await info.reload();
    } catch (err) {
      alert.show('Subscription check failed', err);
    } finally {
      setChecking(false);
    }
  };

  const remove = async () => {
    try {
      await SubscriptionAPI.remove(props.url);
      await info.reload();
    } catch (err) {
      alert.show('Error', err);
    }
  };

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <Button size="sm" icon={<TicketIcon class="h-4 w-4" />} onClick={() => setDialog('upload')}>
          Upload Subscription Key
        </Button>
        <Button size="sm" icon={<CheckSquareIcon class="h-4 w-4" />} isLoading={checking()} onClick={() => void check()}>
          Check
        </Button>
        <ConfirmButton
          size="sm"
          icon={<Trash2Icon class="h-4 w-4" />}
          confirmMessage="Are you sure you want to remove the subscription key?"
          onActivate={() => void remove()}
        >
          Remove Subscription
        </ConfirmButton>
        <ToolbarSeparator />
        <Button size="sm" icon={<StethoscopeIcon class="h-4 w-4" />} onClick={() => setDialog('report')}>
          System Report
        </Button>
        <ToolbarSpacer />
        <RefreshButton loading={info.loading()} onClick={() => void info.reload()} />
      </Toolbar>
      <Show when={info.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <div class="min-h-0 flex-1 overflow-auto">
        <KVGrid rows={SUBSCRIPTION_ROWS} data={info.data() ?? {}} />
      </div>
      <EditWindow
        isOpen={dialog() === 'upload'}
        title="Upload Subscription Key"
        onClose={() => setDialog(null)}
        onDone={() => void info.reload()}
        onSubmit={(form) => SubscriptionAPI.setKey(form.text('key').trim(), props.url)}
      >
        {(form) => <TextField form={form} name="key" label="Subscription Key" required autofocus wide />}
      </EditWindow>
      <Show when={dialog() === 'report'}>
        <SystemReport onClose={() => setDialog(null)} />
      </Show>
      {alert.view()}
    </div>
  );
}

export default SubscriptionPanel;
