import { For, Show, createSignal } from 'solid-js';
import PencilIcon from 'lucide-solid/icons/pencil';
import RotateCcwIcon from 'lucide-solid/icons/rotate-ccw';
import Trash2Icon from 'lucide-solid/icons/trash-2';
import { POLLING_INTERVALS } from '@/constants';
import { useLoader } from '@/hooks/useLoader';
import type { RequestData } from '@/types/api';
import type { PendingConfig, PendingConfigValue } from '@/types/pending';
import { hasPendingChange, pendingConfigToObjects } from '@/utils/pending';
import { createAlert } from './AlertDialog';
import { Button, RefreshButton } from './Button';
import { EditWindow } from './EditWindow';
import type { FormValues } from './formContext';
import { renderKVValue } from './KVGrid';
import type { KVRecord } from './KVGrid';
import { toFormValue } from './ObjectGrid';
import type { ObjectGridRow } from './ObjectGrid';
import { Toolbar, ToolbarSpacer } from './Toolbar';

export interface PendingPropertyRow extends ObjectGridRow {
  /** Properties reverted together with this one; defaults to the row name. */
  revertKeys?: readonly string[];
  deletable?: boolean;
  /** Request data of a submitted edit; defaults to the form values. */
  submitData?: (values: FormValues) => RequestData;
}

export interface PendingPropertyGridProps {
  rows: readonly PendingPropertyRow[];
  loader: () => Promise<PendingConfigValue[]>;
  /** Send an edit, `{ revert }` or `{ delete }` to the config. */
  onSubmit: (data: RequestData) => Promise<unknown>;
  interval?: number;
  class?: string;
}

const EMPTY_CONFIG: PendingConfig = { current: {}, pending: {}, keys: new Set() };

/**
 * Property grid over a config with pending changes. A pending value that
 * differs from the current one is shown below it and can be reverted.
 */
export function PendingPropertyGrid(props: PendingPropertyGridProps) {
  const loader = useLoader(async () => pendingConfigToObjects(await props.loader()), {
    interval: props.interval ?? POLLING_INTERVALS.PENDING_RELOAD,
  });
  const [selected, setSelected] = createSignal<string | null>(null);
  const [editing, setEditing] = createSignal<PendingPropertyRow | null>(null);
  const alert = createAlert('PendingPropertyGrid');

  const config = () => loader.data() ?? EMPTY_CONFIG;
  const visibleRows = () => props.rows.filter((row) => row.required || config().keys.has(row.name));
  const rowByName = (name: string | null) => props.rows.find((row) => row.name === name);
  const selectedRow = () => rowByName(selected());

  const edit = (name: string | null) => {
    const row = rowByName(name);
    if (row?.editor) setEditing(row);
  };

  const editValues = (row: PendingPropertyRow): FormValues =>
    row.editValues ? row.editValues(config().pending) : { [row.name]: toFormValue(config().pending[row.name]) };

  const run = async (data: RequestData, failure: string) => {
    try {
      await props.onSubmit(data);
    } catch (err) {
      alert.show(failure, err);
    }
    await loader.reload();
  };

  const revert = (row: PendingPropertyRow) =>
    run({ revert: (row.revertKeys ?? [row.name]).join(',') }, 'Revert property failed');

  const remove = (row: PendingPropertyRow) => run({ delete: row.name }, 'Delete property failed');

  const show = (row: PendingPropertyRow, value: unknown, record: KVRecord) =>
    row.render ? row.render(value, record) : renderKVValue(value);

  return (
    <div class={`flex flex-col ${props.class ?? ''}`.trim()}>
      <Toolbar>
        <Button size="sm" icon={<PencilIcon class="h-4 w-4" />} disabled={!selectedRow()?.editor} onClick={() => edit(selected())}>
          Edit
        </Button>
        <Button
          size="sm"
          icon={<RotateCcwIcon class="h-4 w-4" />}
          disabled={!selectedRow() || !hasPendingChange(config(), selected() ?? '')}
          onClick={() => {
            const row = selectedRow();
            if (row) void revert(row);
          }}
        >
          Revert
        </Button>
        <Button
          size="sm"
          icon={<Trash2Icon class="h-4 w-4" />}
          disabled={!selectedRow()?.deletable || !config().keys.has(selected() ?? '')}
          onClick={() => {
            const row = selectedRow();
            if (row) void remove(row);
          }}
        >
          Delete
        </Button>
        <ToolbarSpacer />
        <RefreshButton loading={loader.loading()} onClick={() => void loader.reload()} />
      </Toolbar>
      <Show when={loader.error()}>
        {(message) => (
          <div role="alert" class="m-2 rounded border border-red-200 bg-red-50 p-2 text-sm text-red-800">
            {message()}
          </div>
        )}
      </Show>
      <table
        tabIndex={0}
        class="w-full border-collapse text-sm"
        onKeyDown={(event) => {
          if (event.key !== ' ') return;
          event.preventDefault();
          edit(selected());
        }}
      >
        <tbody class="divide-y divide-gray-100 dark:divide-gray-800">
          <For each={visibleRows()}>
            {(row) => {
              const current = () => config().current[row.name];
              const pending = () => config().pending[row.name];
              return (
                <tr
                  data-name={row.name}
                  aria-selected={selected() === row.name ? 'true' : 'false'}
                  class={selected() === row.name ? 'bg-blue-100 dark:bg-blue-900/40' : 'hover:bg-gray-50 dark:hover:bg-gray-800/60'}
                  onClick={() => setSelected(row.name)}
                  onDblClick={() => edit(row.name)}
                >
                  <th scope="row" class="w-1/3 px-3 py-1.5 text-left font-medium text-gray-600 dark:text-gray-400">
                    {row.header}
                  </th>
                  <td class="px-3 py-1.5 text-gray-900 dark:text-gray-100 break-all">
                    <Show when={current() !== undefined} fallback={<span class="text-gray-400">{row.placeholder ?? ''}</span>}>
                      {show(row, current(), config().current)}
                    </Show>
                    <Show when={hasPendingChange(config(), row.name)}>
                      <div data-pending class="text-amber-600 dark:text-amber-400">
                        <Show when={pending() !== undefined} fallback={<span class="line-through">{renderKVValue(current())}</span>}>
                          {show(row, pending(), config().pending)}
                        </Show>
                      </div>
                    </Show>
                  </td>
                </tr>
              );
            }}
          </For>
        </tbody>
      </table>
      <Show when={editing()}>
        {(row) => (
          <EditWindow
            isOpen
            title={row().editorTitle ?? row().header}
            loader={async () => editValues(row())}
            onClose={() => setEditing(null)}
            onDone={() => void loader.reload()}
            onSubmit={(form) => {
              const values = form.snapshot();
              const submitData = row().submitData;
              return props.onSubmit(submitData ? submitData(values) : values);
            }}
          >
            {(form) => {
              const editor = row().editor;
              return editor ? editor(form) : null;
            }}
          </EditWindow>
        )}
      </Show>
      {alert.view()}
    </div>
  );
}

export default PendingPropertyGrid;
