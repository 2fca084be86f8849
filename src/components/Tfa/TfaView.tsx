import { Match, Show, Switch, createSignal } from 'solid-js';
import PlusIcon from 'lucide-solid/icons/plus';
import { TfaAPI, isEditableTfaType, tfaEnabledText } from '@/api/tfa';
import { Button, RefreshButton } from '@/components/shared/Button';
import { DataTable } from '@/components/shared/DataTable';
import type { DataTableColumn } from '@/components/shared/DataTable';
import { MenuButton } from '@/components/shared/MenuButton';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { createAlert } from '@/components/shared/AlertDialog';
import { useLoader } from '@/hooks/useLoader';
import type { TfaEntry } from '@/types/tfa';
import { renderEpoch } from '@/utils/format';
import { TfaAddRecovery } from './TfaAddRecovery';
import { TfaAddTotp } from './TfaAddTotp';
import { TfaAddWebauthn } from './TfaAddWebauthn';
import { TfaConfirmRemove } from './TfaConfirmRemove';
import { TfaEdit } from './TfaEdit';

type TfaDialog = 'totp' | 'webauthn' | 'recovery' | 'edit' | 'remove';

export interface TfaViewProps {
  baseUrl?: string;
  /** WebAuthn registration goes through this container; tests pass a fake. */
  credentials?: Pick<CredentialsContainer, 'create'>;
}

const COLUMNS: DataTableColumn<TfaEntry>[] = [
  { id: 'user', header: 'User', width: '200px', render: (entry) => entry.userId, sorter: (a, b) => a.userId.localeCompare(b.userId) },
  { id: 'enable', header: 'Enabled', width: '80px', render: tfaEnabledText },
  { id: 'type', header: 'TFA Type', width: '100px', render: (entry) => entry.type, sorter: (a, b) => a.type.localeCompare(b.type) },
  {
    id: 'created',
    header: 'Created',
    width: '170px',
    render: (entry) => renderEpoch(entry.created),
    sorter: (a, b) => a.created - b.created,
  },
  { id: 'description', header: 'Description', flex: true, render: (entry) => entry.description },
];

/** TFA entries of all users the current user may see. */
export function TfaView(props: TfaViewProps) {
  const entries = useLoader(() => TfaAPI.list(props.baseUrl), { initialValue: [] });
  const [selected, setSelected] = createSignal<string | null>(null);
  const [dialog, setDialog] = createSignal<TfaDialog | null>(null);
  const alert = createAlert('TfaView');

  const selectedEntry = () => entries.data()?.find((entry) => entry.fullId === selected());
  const canEdit = () => {
    const entry = selectedEntry();
    return entry !== undefined && isEditableTfaType(entry.type);
  };

  const close = () => setDialog(null);
  const done = () => void entries.reload();

  const remove = async (entry: TfaEntry, password: string | undefined) => {
    setDialog(null);
    try {
      await TfaAPI.remove(entry.userId, entry.entryId, password, props.baseUrl);
      setSelected(null);
    } catch (err) {
      alert.show('Unable to remove TFA entry', err);
    }
    await entries.reload();
  };

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <MenuButton
          label="Add"
          icon={<PlusIcon class="h-4 w-4" />}
          items={[
            { label: 'TOTP', onSelect: () => setDialog('totp') },
            { label: 'WebAuthn', onSelect: () => setDialog('webauthn') },
            { label: 'Recovery Keys', onSelect: () => setDialog('recovery') },
          ]}
        />
        <Button size="sm" disabled={!canEdit()} onClick={() => setDialog('edit')}>
          Edit
        </Button>
        <Button size="sm" disabled={!selectedEntry()} onClick={() => setDialog('remove')}>
          Remove
        </Button>
        <ToolbarSpacer />
        <RefreshButton loading={entries.loading()} onClick={() => void entries.reload()} />
      </Toolbar>
      <Show when={entries.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <DataTable
        class="min-h-0 flex-1"
        ariaLabel="Second Factors"
        columns={COLUMNS}
        rows={entries.data() ?? []}
        getKey={(entry) => entry.fullId}
        selectedKey={selected()}
        onSelect={(key) => setSelected(key)}
        onRowDblClick={(entry) => {
          if (isEditableTfaType(entry.type)) setDialog('edit');
        }}
        emptyText="No TFA entries"
      />
      <Switch>
        <Match when={dialog() === 'totp'}>
          <TfaAddTotp baseUrl={props.baseUrl} onClose={close} onDone={done} />
        </Match>
        <Match when={dialog() === 'webauthn'}>
          <TfaAddWebauthn baseUrl={props.baseUrl} credentials={props.credentials} onClose={close} onDone={done} />
        </Match>
        <Match when={dialog() === 'recovery'}>
          <TfaAddRecovery baseUrl={props.baseUrl} onClose={close} onDone={done} />
        </Match>
        <Match when={dialog() === 'edit' && selectedEntry()}>
          {(entry) => (
            <TfaEdit userid={entry().userId} entryId={entry().entryId} baseUrl={props.baseUrl} onClose={close} onDone={done} />
          )}
        </Match>
        <Match when={dialog() === 'remove' && selectedEntry()}>
          {(entry) => (
            <TfaConfirmRemove entry={entry()} onClose={close} onConfirm={(password) => void remove(entry(), password)} />
          )}
        </Match>
      </Switch>
      {alert.view()}
    </div>
  );
}

export default TfaView;
