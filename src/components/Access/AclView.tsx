import { Show, createSignal } from 'solid-js';
import type { JSX } from 'solid-js';
import PlusIcon from 'lucide-solid/icons/plus';
import { AccessAPI } from '@/api/access';
import { ConfirmButton } from '@/components/shared/ConfirmButton';
import { DataTable } from '@/components/shared/DataTable';
import type { DataTableColumn } from '@/components/shared/DataTable';
import { MenuButton } from '@/components/shared/MenuButton';
import type { MenuItem } from '@/components/shared/MenuButton';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { RefreshButton } from '@/components/shared/Button';
import { createAlert } from '@/components/shared/AlertDialog';
import type { FormContext } from '@/components/shared/formContext';
import { POLLING_INTERVALS } from '@/constants';
import { useLoader } from '@/hooks/useLoader';
import type { AclListItem } from '@/types/access';
import { renderBoolean } from '@/utils/format';
import { AclEdit, ACL_EDIT_TITLES } from './AclEdit';
import type { AclEditKind } from './AclEdit';
import { aclKey } from './accessRows';

export interface AclViewProps {
  /** Only show entries of this path. */
  aclPath?: string;
  /** Entries offered in the Add menu; all three kinds by default. */
  addKinds?: readonly AclEditKind[];
  pathField?: (form: FormContext) => JSX.Element;
}

const COLUMNS: DataTableColumn<AclListItem>[] = [
  { id: 'path', header: 'Path', width: '200px', render: (item) => item.path, sorter: (a, b) => a.path.localeCompare(b.path) },
  {
    id: 'ugid',
    header: 'User/Group/API Token',
    flex: true,
    render: (item) => item.ugid,
    sorter: (a, b) => a.ugid.localeCompare(b.ugid),
  },
  { id: 'role', header: 'Role', width: '200px', render: (item) => item.roleid, sorter: (a, b) => a.roleid.localeCompare(b.roleid) },
  { id: 'propagate', header: 'Propagate', width: '100px', render: (item) => renderBoolean(item.propagate) },
];

export function AclView(props: AclViewProps) {
  const acl = useLoader(() => AccessAPI.listAcl(props.aclPath), {
    interval: POLLING_INTERVALS.ACCESS_RELOAD,
    initialValue: [],
  });
  const [selected, setSelected] = createSignal<string | null>(null);
  const [adding, setAdding] = createSignal<AclEditKind | null>(null);
  const alert = createAlert('AclView');

  const selectedItem = () => acl.data()?.find((item) => aclKey(item) === selected());

  const remove = async () => {
    const item = selectedItem();
    if (!item) return;
    try {
      await AccessAPI.removeAcl(item);
      setSelected(null);
    } catch (err) {
      alert.show('Removing ACL failed', err);
    }
    await acl.reload();
  };

  const menuItems = (): MenuItem[] =>
    (props.addKinds ?? (['user', 'token', 'group'] as const)).map((kind) => ({
      label: ACL_EDIT_TITLES[kind],
      onSelect: () => setAdding(kind),
    }));

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <MenuButton label="Add" icon={<PlusIcon class="h-4 w-4" />} items={menuItems()} />
        <ConfirmButton
          size="sm"
          disabled={!selectedItem()}
          confirmMessage="Are you sure you want to remove this ACL entry?"
          onActivate={() => void remove()}
        >
          Remove ACL Entry
        </ConfirmButton>
        <ToolbarSpacer />
        <RefreshButton loading={acl.loading()} onClick={() => void acl.reload()} />
      </Toolbar>
      <Show when={acl.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <DataTable
        class="min-h-0 flex-1"
        ariaLabel="Access Control"
        columns={COLUMNS}
        rows={acl.data() ?? []}
        getKey={aclKey}
        selectedKey={selected()}
        onSelect={(key) => setSelected(key)}
        emptyText="No ACL entries"
      />
      <Show when={adding()}>
        {(kind) => (
          <AclEdit
            kind={kind()}
            pathField={props.pathField}
            defaultPath={props.aclPath}
            onClose={() => setAdding(null)}
            onDone={() => void acl.reload()}
          />
        )}
      </Show>
      {alert.view()}
    </div>
  );
}

export default AclView;
