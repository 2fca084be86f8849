import { Show, createSignal } from 'solid-js';
import PencilIcon from 'lucide-solid/icons/pencil';
import { NodeAPI } from '@/api/node';
import { Button, RefreshButton } from '@/components/shared/Button';
import { EditWindow } from '@/components/shared/EditWindow';
import { TextAreaField } from '@/components/shared/FormFields';
import { Markdown } from '@/components/shared/Markdown';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { useLoader } from '@/hooks/useLoader';

export interface NotesViewProps {
  baseUrl?: string;
}

/** Markdown notes stored in the `description` config property. */
export function NotesView(props: NotesViewProps) {
  const baseUrl = () => props.baseUrl ?? '/nodes/localhost/config';
  const config = useLoader(() => NodeAPI.getConfig(baseUrl()));
  const [editing, setEditing] = createSignal(false);

  const notes = () => config.data()?.description ?? '';

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <span class="text-sm font-medium text-gray-800 dark:text-gray-200">Notes</span>
        <ToolbarSpacer />
        <Button size="sm" icon={<PencilIcon class="h-4 w-4" />} onClick={() => setEditing(true)}>
          Edit
        </Button>
        <RefreshButton loading={config.loading()} onClick={() => void config.reload()} />
      </Toolbar>
      <Show when={config.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <div class="min-h-0 flex-1 overflow-auto p-4">
        <Show when={notes()} fallback={<p class="text-sm text-gray-500">No notes</p>}>
          <Markdown text={notes()} />
        </Show>
      </div>
      <Show when={editing()}>
        <EditWindow
          isOpen
          title="Edit: Notes"
          panelClass="max-w-3xl"
          loader={async () => {
            const data = await NodeAPI.getConfig(baseUrl());
            return { description: data.description ?? '', digest: data.digest };
          }}
          onClose={() => setEditing(false)}
          onDone={() => void config.reload()}
          onSubmit={(form) =>
            NodeAPI.updateConfig(
              { description: form.text('description'), ...(form.text('digest') ? { digest: form.text('digest') } : {}) },
              baseUrl(),
            )
          }
        >
          {(form) => <TextAreaField form={form} name="description" label="Notes" rows={16} mono wide />}
        </EditWindow>
      </Show>
    </div>
  );
}

export default NotesView;
