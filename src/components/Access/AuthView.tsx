import { Match, Show, Switch, createSignal } from 'solid-js';
import PlusIcon from 'lucide-solid/icons/plus';
import { AccessAPI } from '@/api/access';
import { Button, RefreshButton } from '@/components/shared/Button';
import { RemoveButton } from '@/components/shared/ConfirmButton';
import { DataTable } from '@/components/shared/DataTable';
import type { DataTableColumn } from '@/components/shared/DataTable';
import { MenuButton } from '@/components/shared/MenuButton';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { createAlert } from '@/components/shared/AlertDialog';
import { TaskProgress } from '@/components/Tasks/TaskProgress';
import { useLoader } from '@/hooks/useLoader';
import type { BasicRealmInfo } from '@/types/access';
import { getAuthDomainInfo } from '@/utils/forms';
import { AuthEditLdap } from './AuthEditLdap';
import { AuthEditOpenId } from './AuthEditOpenId';

type RealmDialog =
  | { kind: 'add'; type: 'ldap' | 'ad' | 'openid' }
  | { kind: 'edit'; type: string; realm: string };

export interface AuthViewProps {
  baseUrl?: string;
}

const COLUMNS: DataTableColumn<BasicRealmInfo>[] = [
  { id: 'realm', header: 'Realm', width: '150px', render: (item) => item.realm, sorter: (a, b) => a.realm.localeCompare(b.realm) },
  { id: 'type', header: 'Type', width: '100px', render: (item) => item.type, sorter: (a, b) => a.type.localeCompare(b.type) },
  { id: 'comment', header: 'Comment', flex: true, render: (item) => item.comment ?? '' },
];

/** Authentication realms with add, edit, remove and sync. */
export function AuthView(props: AuthViewProps) {
  const baseUrl = () => props.baseUrl ?? '/access/domains';
  const realms = useLoader(() => AccessAPI.listDomains(baseUrl()), { initialValue: [] });
  const [selected, setSelected] = createSignal<string | null>(null);
  const [dialog, setDialog] = createSignal<RealmDialog | null>(null);
  const [syncTask, setSyncTask] = createSignal<string | null>(null);
  const alert = createAlert('AuthView');

  const selectedRealm = () => realms.data()?.find((item) => item.realm === selected());
  const info = () => {
    const realm = selectedRealm();
    return realm ? getAuthDomainInfo(realm.type) : undefined;
  };

  const realmOf = (current: RealmDialog) => (current.kind === 'edit' ? current.realm : undefined);
  const close = () => setDialog(null);
  const done = () => void realms.reload();

  const edit = () => {
    const realm = selectedRealm();
    if (realm && info()?.edit) setDialog({ kind: 'edit', type: realm.type, realm: realm.realm });
  };

  const remove = async () => {
    const realm = selected();
    if (!realm) return;
    try {
      await AccessAPI.deleteDomain(realm, baseUrl());
      setSelected(null);
    } catch (err) {
      alert.show('Unable to remove realm', err);
    }
    await realms.reload();
  };

  const sync = async () => {
    const realm = selected();
    if (!realm) return;
    try {
      setSyncTask(await AccessAPI.syncDomain(realm, baseUrl()));
    } catch (err) {
      alert.show('Realm sync failed', err);
    }
  };

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <MenuButton
          label="Add"
          icon={<PlusIcon class="h-4 w-4" />}
          items={[
            { label: 'LDAP server', onSelect: () => setDialog({ kind: 'add', type: 'ldap' }) },
            { label: 'Active Directory server', onSelect: () => setDialog({ kind: 'add', type: 'ad' }) },
            { label: 'OpenID Connect server', onSelect: () => setDialog({ kind: 'add', type: 'openid' }) },
          ]}
        />
        <Button size="sm" disabled={!info()?.edit} onClick={edit}>
          Edit
        </Button>
        <RemoveButton size="sm" disabled={!info()?.add} name={selected() ?? undefined} onActivate={() => void remove()} />
        <Button size="sm" disabled={!info()?.sync} onClick={() => void sync()}>
          Sync
        </Button>
        <ToolbarSpacer />
        <RefreshButton loading={realms.loading()} onClick={() => void realms.reload()} />
      </Toolbar>
      <Show when={realms.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <DataTable
        class="min-h-0 flex-1"
        ariaLabel="Realms"
        columns={COLUMNS}
        rows={realms.data() ?? []}
        getKey={(item) => item.realm}
        selectedKey={selected()}
        onSelect={(key) => setSelected(key)}
        onRowDblClick={edit}
        emptyText="No realms"
      />
      <Show when={dialog()}>
        {(current) => (
          <Switch>
            <Match when={current().type === 'openid'}>
              <AuthEditOpenId
                realm={realmOf(current())}
                baseUrl={baseUrl()}
                onClose={close}
                onDone={done}
              />
            </Match>
            <Match when={current().type === 'ldap' || current().type === 'ad'}>
              <AuthEditLdap
                realm={realmOf(current())}
                adRealm={current().type === 'ad'}
                baseUrl={baseUrl()}
                onClose={close}
                onDone={done}
              />
            </Match>
          </Switch>
        )}
      </Show>
      <Show when={syncTask()}>
        {(upid) => (
          <TaskProgress
            upid={upid()}
            onClose={() => {
              setSyncTask(null);
              void realms.reload();
            }}
          />
        )}
      </Show>
      {alert.view()}
    </div>
  );
}

export default AuthView;
