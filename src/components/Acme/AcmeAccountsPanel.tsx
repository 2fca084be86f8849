import { Match, Show, Switch, createSignal } from 'solid-js';
import { ACME_URLS, AcmeAPI } from '@/api/acme';
import { Button, RefreshButton } from '@/components/shared/Button';
import { RemoveButton } from '@/components/shared/ConfirmButton';
import { DataTable } from '@/components/shared/DataTable';
import type { DataTableColumn } from '@/components/shared/DataTable';
import { Dialog } from '@/components/shared/Dialog';
import { KVGrid, renderUrl } from '@/components/shared/KVGrid';
import type { KVRow } from '@/components/shared/KVGrid';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { createAlert } from '@/components/shared/AlertDialog';
import { TaskProgress } from '@/components/Tasks/TaskProgress';
import { useLoader } from '@/hooks/useLoader';
import type { AcmeAccountEntry, AcmeAccountInfo } from '@/types/acme';
import { AcmeRegisterAccount } from './AcmeRegisterAccount';

type AccountDialog = { kind: 'add' } | { kind: 'view'; name: string } | { kind: 'task'; upid: string };

export interface AcmeAccountsPanelProps {
  url?: string;
}

const COLUMNS: DataTableColumn<AcmeAccountEntry>[] = [
  { id: 'name', header: 'Name', flex: true, render: (entry) => entry.name, sorter: (a, b) => a.name.localeCompare(b.name) },
];

/** Rows of the account view; flattened from the nested account data. */
export function accountViewRecord(info: AcmeAccountInfo): Record<string, unknown> {
  return {
    contact: info.account.contact?.join(', '),
    createdAt: info.account.createdAt,
    status: info.account.status,
    directory: info.directory,
    tos: info.tos,
  };
}

const ACCOUNT_ROWS: KVRow[] = [
  { name: 'contact', header: 'Contact' },
  { name: 'createdAt', header: 'Created' },
  { name: 'status', header: 'Status', required: true },
  { name: 'directory', header: 'Directory', required: true, render: renderUrl },
  { name: 'tos', header: 'Terms of Services', render: renderUrl },
];

function AcmeAccountView(props: { name: string; onClose: () => void }) {
  const account = useLoader(() => AcmeAPI.getAccount(props.name));

  return (
    <Dialog isOpen title={`Account: ${props.name}`} onClose={props.onClose} panelClass="max-w-xl">
      <Show when={account.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <Show when={account.data()} fallback={<div class="p-6 text-center text-sm text-gray-500">Loading...</div>}>
        {(info) => <KVGrid rows={ACCOUNT_ROWS} data={accountViewRecord(info())} />}
      </Show>
    </Dialog>
  );
}

export function AcmeAccountsPanel(props: AcmeAccountsPanelProps) {
  const accounts = useLoader(() => AcmeAPI.listAccounts(props.url ?? ACME_URLS.accounts), { initialValue: [] });
  const [selected, setSelected] = createSignal<string | null>(null);
  const [dialog, setDialog] = createSignal<AccountDialog | null>(null);
  const alert = createAlert('AcmeAccountsPanel');

  const close = () => setDialog(null);
  const view = () => {
    const name = selected();
    if (name) setDialog({ kind: 'view', name });
  };

  const deactivate = async () => {
    const name = selected();
    if (!name) return;
    try {
      setDialog({ kind: 'task', upid: await AcmeAPI.deactivateAccount(name) });
      setSelected(null);
    } catch (err) {
      alert.show('Error', err);
    }
  };

  const viewing = () => {
    const current = dialog();
    return current?.kind === 'view' ? current : undefined;
  };
  const task = () => {
    const current = dialog();
    return current?.kind === 'task' ? current : undefined;
  };

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <Button size="sm" onClick={() => setDialog({ kind: 'add' })}>
          Add
        </Button>
        <Button size="sm" disabled={!selected()} onClick={view}>
          View
        </Button>
        <RemoveButton size="sm" disabled={!selected()} name={selected() ?? undefined} onActivate={() => void deactivate()} />
        <ToolbarSpacer />
        <RefreshButton loading={accounts.loading()} onClick={() => void accounts.reload()} />
      </Toolbar>
      <Show when={accounts.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <DataTable
        class="min-h-0 flex-1"
        ariaLabel="ACME Accounts"
        columns={COLUMNS}
        rows={accounts.data() ?? []}
        getKey={(entry) => entry.name}
        selectedKey={selected()}
        onSelect={(key) => setSelected(key)}
        onRowDblClick={view}
        emptyText="No accounts"
      />
      <Switch>
        <Match when={dialog()?.kind === 'add'}>
          <AcmeRegisterAccount
            onClose={() => {
              if (dialog()?.kind === 'add') close();
            }}
            onTask={(upid) => setDialog({ kind: 'task', upid })}
          />
        </Match>
        <Match when={viewing()}>{(current) => <AcmeAccountView name={current().name} onClose={close} />}</Match>
        <Match when={task()}>
          {(current) => (
            <TaskProgress
              upid={current().upid}
              onClose={() => {
                close();
                void accounts.reload();
              }}
            />
          )}
        </Match>
      </Switch>
      {alert.view()}
    </div>
  );
}

export default AcmeAccountsPanel;
