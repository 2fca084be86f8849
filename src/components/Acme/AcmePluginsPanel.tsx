import { For, Match, Show, Switch, createSignal } from 'solid-js';
import { ACME_URLS, AcmeAPI } from '@/api/acme';
import { Button, RefreshButton } from '@/components/shared/Button';
import { RemoveButton } from '@/components/shared/ConfirmButton';
import { DataTable } from '@/components/shared/DataTable';
import type { DataTableColumn } from '@/components/shared/DataTable';
import { EditWindow } from '@/components/shared/EditWindow';
import { DisplayField, NumberField, SelectField, TextAreaField, TextField } from '@/components/shared/FormFields';
import type { FormContext, FormValues } from '@/components/shared/formContext';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { createAlert } from '@/components/shared/AlertDialog';
import { useLoader } from '@/hooks/useLoader';
import type { RequestData } from '@/types/api';
import type { AcmeChallengeSchema, AcmePluginConfig } from '@/types/acme';
import { assemblePluginData, decodeBase64, parsePluginData } from '@/utils/acme';
import { deleteEmptyValues } from '@/utils/forms';

export interface AcmePluginsPanelProps {
  url?: string;
  schemaUrl?: string;
}

type PluginDialog = { kind: 'add' } | { kind: 'edit'; id: string };

const DATA_PREFIX = 'data_';

const COLUMNS: DataTableColumn<AcmePluginConfig>[] = [
  { id: 'plugin', header: 'Plugin', width: '200px', render: (item) => item.plugin, sorter: (a, b) => a.plugin.localeCompare(b.plugin) },
  { id: 'api', header: 'API', flex: true, render: (item) => item.api ?? '' },
];

const schemaFields = (schema: AcmeChallengeSchema | undefined) => Object.entries(schema?.schema.fields ?? {});

/** Form values of a stored plugin; API data is split into one field per `key=value` line. */
export function pluginToForm(config: AcmePluginConfig): FormValues {
  const raw = config.data ? decodeBase64(config.data) : '';
  const values: FormValues = {
    plugin: config.plugin,
    api: config.api,
    'validation-delay': config['validation-delay'],
    data: raw,
    digest: config.digest,
  };
  for (const [key, value] of Object.entries(parsePluginData(raw))) values[`${DATA_PREFIX}${key}`] = value;
  return values;
}

export function pluginSubmitData(form: FormContext, schema: AcmeChallengeSchema | undefined, create: boolean): RequestData {
  const fieldValues: Record<string, string> = {};
  for (const [name] of schemaFields(schema)) fieldValues[name] = form.text(`${DATA_PREFIX}${name}`);

  const delay = form.text('validation-delay').trim();
  const data: RequestData = {
    api: form.text('api'),
    data: assemblePluginData(schema, fieldValues, form.text('data')),
    'validation-delay': delay ? Number(delay) : undefined,
  };
  if (create) return { ...data, id: form.text('plugin').trim(), type: 'dns' };

  const digest = form.text('digest');
  return deleteEmptyValues({ ...data, ...(digest ? { digest } : {}) }, ['validation-delay'], true);
}

function PluginFields(props: { form: FormContext; id?: string; schemas: readonly AcmeChallengeSchema[] }) {
  const schema = () => props.schemas.find((item) => item.id === props.form.text('api'));

  return (
    <>
      <Show
        when={props.id}
        fallback={<TextField form={props.form} name="plugin" label="Plugin ID" required />}
      >
        {(id) => <DisplayField label="Plugin ID" value={id()} />}
      </Show>
      <NumberField form={props.form} name="validation-delay" label="Validation Delay" min={0} max={48} placeholder="30" />
      <SelectField
        form={props.form}
        name="api"
        label="DNS API"
        required
        emptyText=""
        options={props.schemas.map((item) => ({ value: item.id, label: item.name }))}
      />
      <Show when={schema()?.schema.description}>
        {(hint) => <DisplayField label="Hint" value={hint()} wide />}
      </Show>
      <Show
        when={schema()?.schema.fields}
        fallback={<TextAreaField form={props.form} name="data" label="API Data" mono wide />}
      >
        <For each={schemaFields(schema())}>
          {([name, field]) => (
            <TextField
              form={props.form}
              name={`${DATA_PREFIX}${name}`}
              label={`${name}=`}
              placeholder={field.default}
              help={field.description}
              mono
            />
          )}
        </For>
      </Show>
    </>
  );
}

/** DNS challenge plugins. */
export function AcmePluginsPanel(props: AcmePluginsPanelProps) {
  const url = () => props.url ?? ACME_URLS.plugins;
  const plugins = useLoader(
    async () => (await AcmeAPI.listPlugins(url())).filter((plugin) => plugin.type === 'dns'),
    { initialValue: [] },
  );
  const schemas = useLoader(() => AcmeAPI.challengeSchema(props.schemaUrl), { initialValue: [] });
  const [selected, setSelected] = createSignal<string | null>(null);
  const [dialog, setDialog] = createSignal<PluginDialog | null>(null);
  const alert = createAlert('AcmePluginsPanel');

  const schemaFor = (form: FormContext) => schemas.data()?.find((item) => item.id === form.text('api'));
  const close = () => setDialog(null);
  const done = () => void plugins.reload();

  const edit = () => {
    const id = selected();
    if (id) setDialog({ kind: 'edit', id });
  };

  const remove = async () => {
    const id = selected();
    if (!id) return;
    try {
      await AcmeAPI.deletePlugin(id, url());
      setSelected(null);
    } catch (err) {
      alert.show('Error', err);
    }
    await plugins.reload();
  };

  const editing = () => {
    const current = dialog();
    return current?.kind === 'edit' ? current : undefined;
  };

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <Button size="sm" onClick={() => setDialog({ kind: 'add' })}>
          Add
        </Button>
        <Button size="sm" disabled={!selected()} onClick={edit}>
          Edit
        </Button>
        <RemoveButton size="sm" disabled={!selected()} name={selected() ?? undefined} onActivate={() => void remove()} />
        <ToolbarSpacer />
        <RefreshButton loading={plugins.loading()} onClick={() => void plugins.reload()} />
      </Toolbar>
      <Show when={plugins.error() ?? schemas.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <DataTable
        class="min-h-0 flex-1"
        ariaLabel="ACME DNS Plugins"
        columns={COLUMNS}
        rows={plugins.data() ?? []}
        getKey={(item) => item.plugin}
        selectedKey={selected()}
        onSelect={(key) => setSelected(key)}
        onRowDblClick={edit}
        emptyText="No DNS plugins"
      />
      <Switch>
        <Match when={dialog()?.kind === 'add'}>
          <EditWindow
            isOpen
            title="Add: ACME DNS Plugin"
            panelClass="max-w-3xl"
            onClose={close}
            onDone={done}
            onSubmit={(form) => AcmeAPI.createPlugin(pluginSubmitData(form, schemaFor(form), true), url())}
          >
            {(form) => <PluginFields form={form} schemas={schemas.data() ?? []} />}
          </EditWindow>
        </Match>
        <Match when={editing()}>
          {(current) => (
            <EditWindow
              isOpen
              title="Edit: ACME DNS Plugin"
              panelClass="max-w-3xl"
              loader={async () => pluginToForm((await AcmeAPI.getPlugin(current().id, url())).data)}
              onClose={close}
              onDone={done}
              onSubmit={(form) =>
                AcmeAPI.updatePlugin(current().id, pluginSubmitData(form, schemaFor(form), false), url())
              }
            >
              {(form) => <PluginFields form={form} id={current().id} schemas={schemas.data() ?? []} />}
            </EditWindow>
          )}
        </Match>
      </Switch>
      {alert.view()}
    </div>
  );
}

export default AcmePluginsPanel;
