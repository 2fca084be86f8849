import { For, Show, createMemo, createSignal } from 'solid-js';
import ChevronRightIcon from 'lucide-solid/icons/chevron-right';
import ChevronDownIcon from 'lucide-solid/icons/chevron-down';
import { AccessAPI } from '@/api/access';
import { Dialog } from '@/components/shared/Dialog';
import { useLoader } from '@/hooks/useLoader';
import { renderBoolean } from '@/utils/format';
import { buildPermissionTree, permissionRows } from './accessRows';

export interface PermissionPanelProps {
  /** Show the permissions of this user or token instead of the current user. */
  authId?: string;
  baseUrl?: string;
}

/** Granted privileges as a path tree with propagate flags. */
export function PermissionPanel(props: PermissionPanelProps) {
  const permissions = useLoader(() => AccessAPI.permissions(props.authId, props.baseUrl));
  const [collapsed, setCollapsed] = createSignal<ReadonlySet<string>>(new Set());

  const rows = createMemo(() => {
    const data = permissions.data();
    return data ? permissionRows(buildPermissionTree(data), collapsed()) : [];
  });

  const toggle = (path: string) => {
    const next = new Set(collapsed());
    if (next.has(path)) next.delete(path);
    else next.add(path);
    setCollapsed(next);
  };

  return (
    <div class="min-h-0 flex-1 overflow-auto">
      <Show when={permissions.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <table class="w-full text-sm" aria-label="Permissions">
        <thead class="sticky top-0 bg-gray-50 text-left text-xs font-medium text-gray-600 dark:bg-gray-800 dark:text-gray-300">
          <tr>
            <th class="px-2 py-1.5">Path/Permission</th>
            <th class="w-28 px-2 py-1.5">Propagate</th>
          </tr>
        </thead>
        <tbody>
          <For each={rows()}>
            {(row) => (
              <tr class="border-b border-gray-100 dark:border-gray-800">
                <td class="px-2 py-1" style={{ 'padding-left': `${0.5 + row.depth * 1.25}rem` }}>
                  <Show
                    when={row.kind === 'path' ? row : null}
                    fallback={<span class="text-gray-700 dark:text-gray-300">{row.kind === 'permission' ? row.name : ''}</span>}
                  >
                    {(pathRow) => (
                      <button
                        type="button"
                        class="inline-flex items-center gap-1 font-medium text-gray-900 dark:text-gray-100"
                        aria-expanded={!collapsed().has(pathRow().key)}
                        onClick={() => toggle(pathRow().key)}
                      >
                        <Show when={collapsed().has(pathRow().key)} fallback={<ChevronDownIcon class="h-3.5 w-3.5" />}>
                          <ChevronRightIcon class="h-3.5 w-3.5" />
                        </Show>
                        {pathRow().node.name}
                      </button>
                    )}
                  </Show>
                </td>
                <td class="px-2 py-1">{row.kind === 'permission' ? renderBoolean(row.propagate) : ''}</td>
              </tr>
            )}
          </For>
        </tbody>
      </table>
    </div>
  );
}

/** `{authId} - Granted Permissions` dialog. */
export function PermissionDialog(props: { authId: string; onClose: () => void; baseUrl?: string }) {
  return (
    <Dialog isOpen onClose={props.onClose} title={`${props.authId} - Granted Permissions`} panelClass="w-full max-w-3xl h-[600px] flex flex-col">
      <PermissionPanel authId={props.authId} baseUrl={props.baseUrl} />
    </Dialog>
  );
}

export default PermissionPanel;
