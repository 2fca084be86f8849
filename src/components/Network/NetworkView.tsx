import { Match, Show, Switch, createSignal } from 'solid-js';
import PlusIcon from 'lucide-solid/icons/plus';
import { NodeAPI } from '@/api/node';
import { Button, RefreshButton } from '@/components/shared/Button';
import { RemoveButton } from '@/components/shared/ConfirmButton';
import { DataTable } from '@/components/shared/DataTable';
import type { DataTableColumn } from '@/components/shared/DataTable';
import { MenuButton } from '@/components/shared/MenuButton';
import { Toolbar, ToolbarSeparator, ToolbarSpacer } from '@/components/shared/Toolbar';
import { createAlert } from '@/components/shared/AlertDialog';
import { TaskProgress } from '@/components/Tasks/TaskProgress';
import { useLoader } from '@/hooks/useLoader';
import type { NetworkInterface, NetworkInterfaceType } from '@/types/network';
import { renderBoolean } from '@/utils/format';
import { findNextFreeInterfaceId, formatBondMode, formatNetworkInterfaceType, formatPortsSlaves } from '@/utils/network';
import { NetworkEdit } from './NetworkEdit';

type NetworkDialog =
  /** `name` unset creates a new interface. */
  | { kind: 'edit'; type: NetworkInterfaceType; name?: string; defaultName?: string }
  | { kind: 'apply'; upid: string };

export const PENDING_CHANGES_TEXT =
  "Pending changes (Either reboot or use 'Apply Configuration' (needs ifupdown2) to activate)";

const byName = (a: NetworkInterface, b: NetworkInterface) => a.name.localeCompare(b.name);

const COLUMNS: DataTableColumn<NetworkInterface>[] = [
  { id: 'name', header: 'Name', width: '120px', render: (iface) => iface.name, sorter: byName },
  {
    id: 'type',
    header: 'Type',
    width: '120px',
    render: (iface) => formatNetworkInterfaceType(iface.type),
    sorter: (a, b) => a.type.localeCompare(b.type),
  },
  { id: 'active', header: 'Active', width: '70px', render: (iface) => renderBoolean(iface.active === true) },
  { id: 'autostart', header: 'Autostart', width: '80px', render: (iface) => renderBoolean(iface.autostart === true) },
  {
    id: 'vlan',
    header: 'VLAN aware',
    width: '90px',
    render: (iface) => renderBoolean(iface.bridge_vlan_aware === true),
  },
  { id: 'ports', header: 'Ports/Slaves', width: '150px', render: formatPortsSlaves },
  { id: 'bond_mode', header: 'Bond Mode', width: '120px', render: (iface) => formatBondMode(iface.bond_mode) },
  { id: 'hash', header: 'Hash policy', width: '100px', render: (iface) => iface.bond_xmit_hash_policy ?? '' },
  { id: 'cidr', header: 'CIDR', width: '150px', render: (iface) => [iface.cidr, iface.cidr6].filter(Boolean).join(' ') },
  {
    id: 'gateway',
    header: 'Gateway',
    width: '150px',
    render: (iface) => [iface.gateway, iface.gateway6].filter(Boolean).join(' '),
  },
  { id: 'mtu', header: 'MTU', width: '70px', align: 'right', render: (iface) => iface.mtu ?? '' },
  { id: 'comments', header: 'Comment', flex: true, render: (iface) => iface.comments ?? '' },
];

/** Network interfaces of the node with pending changes, revert and apply. */
export function NetworkView() {
  const network = useLoader(() => NodeAPI.listNetwork());
  const [selected, setSelected] = createSignal<string | null>(null);
  const [dialog, setDialog] = createSignal<NetworkDialog | null>(null);
  const alert = createAlert('NetworkView');

  const interfaces = () => network.data()?.interfaces ?? [];
  const changes = () => network.data()?.changes ?? '';
  const selectedIface = () => interfaces().find((iface) => iface.name === selected());

  const close = () => setDialog(null);
  const reload = () => void network.reload();

  const create = (type: NetworkInterfaceType, prefix: string) =>
    setDialog({ kind: 'edit', type, defaultName: findNextFreeInterfaceId(prefix, interfaces()) });

  const edit = () => {
    const iface = selectedIface();
    if (iface) setDialog({ kind: 'edit', type: iface.type, name: iface.name });
  };

  const remove = async () => {
    const name = selected();
    if (!name) return;
    try {
      await NodeAPI.deleteInterface(name);
      setSelected(null);
    } catch (err) {
      alert.show('Unable to delete item', err);
    }
    await network.reload();
  };

  const revert = async () => {
    try {
      await NodeAPI.revertNetwork();
    } catch (err) {
      alert.show('Unable to revert changes', err);
    }
    await network.reload();
  };

  const apply = async () => {
    try {
      setDialog({ kind: 'apply', upid: await NodeAPI.applyNetwork() });
    } catch (err) {
      alert.show('Unable to apply changes', err);
      await network.reload();
    }
  };

  const editDialog = () => {
    const current = dialog();
    return current?.kind === 'edit' ? current : undefined;
  };
  const applyDialog = () => {
    const current = dialog();
    return current?.kind === 'apply' ? current : undefined;
  };

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <MenuButton
          label="Create"
          icon={<PlusIcon class="h-4 w-4" />}
          items={[
            { label: 'Linux Bridge', onSelect: () => create('bridge', 'vmbr') },
            { label: 'Linux Bond', onSelect: () => create('bond', 'bond') },
          ]}
        />
        <Button size="sm" disabled={!changes()} onClick={() => void revert()}>
          Revert
        </Button>
        <ToolbarSeparator />
        <Button size="sm" disabled={!selectedIface()} onClick={edit}>
          Edit
        </Button>
        <RemoveButton size="sm" disabled={!selectedIface()} name={selected() ?? undefined} onActivate={() => void remove()} />
        <ToolbarSeparator />
        <Button size="sm" disabled={!changes()} onClick={() => void apply()}>
          Apply Configuration
        </Button>
        <ToolbarSpacer />
        <RefreshButton loading={network.loading()} onClick={reload} />
      </Toolbar>
      <Show when={network.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <DataTable
        class="min-h-0 flex-1"
        ariaLabel="Network Interfaces"
        columns={COLUMNS}
        rows={interfaces()}
        getKey={(iface) => iface.name}
        selectedKey={selected()}
        onSelect={(key) => setSelected(key)}
        onRowDblClick={edit}
        emptyText="No network interfaces"
      />
      <Show when={changes()}>
        {(diff) => (
          <section class="max-h-64 overflow-auto border-t border-gray-200 dark:border-gray-700" aria-label="Pending changes">
            <h3 class="bg-gray-50 px-3 py-1.5 text-xs font-medium text-gray-700 dark:bg-gray-800 dark:text-gray-300">
              {PENDING_CHANGES_TEXT}
            </h3>
            <pre class="px-3 py-2 font-mono text-xs text-gray-800 dark:text-gray-200">{diff()}</pre>
          </section>
        )}
      </Show>
      <Switch>
        <Match when={editDialog()}>
          {(current) => (
            <NetworkEdit
              interfaceType={current().type}
              name={current().name}
              defaultName={current().defaultName}
              onClose={close}
              onDone={reload}
            />
          )}
        </Match>
        <Match when={applyDialog()}>
          {(current) => (
            <TaskProgress
              upid={current().upid}
              onClose={() => {
                close();
                reload();
              }}
            />
          )}
        </Match>
      </Switch>
      {alert.view()}
    </div>
  );
}

export default NetworkView;
