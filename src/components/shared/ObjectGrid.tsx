import { Show, createSignal } from 'solid-js';
import type { JSX } from 'solid-js';
import PencilIcon from 'lucide-solid/icons/pencil';
import { KVGrid } from './KVGrid';
import type { KVRecord, KVRow } from './KVGrid';
import { Toolbar, ToolbarSpacer } from './Toolbar';
import { Button, RefreshButton } from './Button';
import { EditWindow } from './EditWindow';
import type { FormContext, FormValue, FormValues } from './formContext';
import { useLoader } from '@/hooks/useLoader';

export interface ObjectGridRow extends KVRow {
  editor?: (form: FormContext) => JSX.Element;
  editorTitle?: string;
  /** Values the editor starts with; defaults to this row's value. */
  editValues?: (data: KVRecord) => FormValues;
}

export interface ObjectGridProps {
  rows: readonly ObjectGridRow[];
  loader: () => Promise<KVRecord>;
  /** Save the values of an edited row. */
  onSubmit?: (form: FormContext, row: ObjectGridRow) => Promise<unknown>;
  interval?: number;
  /** Extra toolbar items left of the reload button. */
  tools?: JSX.Element;
  /** Hide the Edit button (rows can still be edited by double-click). */
  hideEdit?: boolean;
  class?: string;
}

export function toFormValue(value: unknown): FormValue {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.map((item) => String(item));
  return JSON.stringify(value);
}

/** Key/value grid over a loaded record, with one edit window per row. */
export function ObjectGrid(props: ObjectGridProps) {
  const loader = useLoader(props.loader, { interval: props.interval });
  const [selected, setSelected] = createSignal<string | null>(null);
  const [editing, setEditing] = createSignal<ObjectGridRow | null>(null);

  const rowByName = (name: string | null) => props.rows.find((row) => row.name === name);
  const data = () => loader.data() ?? {};

  const edit = (name: string | null) => {
    const row = rowByName(name);
    if (row?.editor && props.onSubmit) setEditing(row);
  };

  const editValues = (row: ObjectGridRow): FormValues =>
    row.editValues ? row.editValues(data()) : { [row.name]: toFormValue(data()[row.name]) };

  return (
    <div class={`flex flex-col ${props.class ?? ''}`.trim()}>
      <Toolbar>
        <Show when={!props.hideEdit}>
          <Button
            size="sm"
            icon={<PencilIcon class="h-4 w-4" />}
            disabled={!rowByName(selected())?.editor || !props.onSubmit}
            onClick={() => edit(selected())}
          >
            Edit
          </Button>
        </Show>
        {props.tools}
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
      <KVGrid rows={props.rows} data={data()} selected={selected()} onSelect={setSelected} onRowDblClick={edit} />
      <Show when={editing()}>
        {(row) => (
          <EditWindow
            isOpen
            title={row().editorTitle ?? row().header}
            loader={async () => editValues(row())}
            onClose={() => setEditing(null)}
            onDone={() => void loader.reload()}
            onSubmit={(form) => {
              const submit = props.onSubmit;
              return submit ? submit(form, row()) : Promise.resolve();
            }}
          >
            {(form) => {
              const editor = row().editor;
              return editor ? editor(form) : null;
            }}
          </EditWindow>
        )}
      </Show>
    </div>
  );
}

export default ObjectGrid;
