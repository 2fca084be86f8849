import { Match, Show, Switch, createSignal } from 'solid-js';
import PencilIcon from 'lucide-solid/icons/pencil';
import { AcmeAPI } from '@/api/acme';
import { NodeAPI } from '@/api/node';
import { Button, RefreshButton } from '@/components/shared/Button';
import { RemoveButton } from '@/components/shared/ConfirmButton';
import { DataTable } from '@/components/shared/DataTable';
import type { DataTableColumn } from '@/components/shared/DataTable';
import { EditWindow } from '@/components/shared/EditWindow';
import { TextField } from '@/components/shared/FormFields';
import type { FormContext, FormValues } from '@/components/shared/formContext';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { createAlert } from '@/components/shared/AlertDialog';
import { TaskProgress } from '@/components/Tasks/TaskProgress';
import { LIMITS } from '@/constants';
import { useLoader } from '@/hooks/useLoader';
import type { AcmeConfig, AcmeDomain } from '@/types/acme';
import {
  acmeDomainsFromConfig,
  createAcmeConfigString,
  createAcmeDomainString,
  nextFreeAcmeDomainKey,
  parseAcmeConfigString,
} from '@/utils/acme';
import type { AcmeDomainEntry } from '@/utils/acme';
import { optionalText } from '@/utils/forms';
import { AcmeAccountSelector, AcmeChallengeTypeSelector, AcmePluginSelector } from './AcmeSelectors';

type DomainDialog =
  | { kind: 'add'; configKey: string }
  | { kind: 'edit'; entry: AcmeDomainEntry }
  | { kind: 'account' }
  | { kind: 'task'; upid: string };

interface DomainsState {
  domains: AcmeDomainEntry[];
  account: AcmeConfig | null;
}

const COLUMNS: DataTableColumn<AcmeDomainEntry>[] = [
  {
    id: 'domain',
    header: 'Name',
    flex: true,
    render: (entry) => entry.config.domain,
    sorter: (a, b) => a.config.domain.localeCompare(b.config.domain),
  },
  { id: 'type', header: 'Type', width: '120px', render: (entry) => entry.type },
  { id: 'plugin', header: 'Plugin', width: '150px', render: (entry) => entry.config.plugin ?? '' },
];

export function domainToForm(entry: AcmeDomainEntry): FormValues {
  return {
    type: entry.type === 'dns' ? 'DNS' : 'HTTP',
    domain: entry.config.domain,
    plugin: entry.config.plugin,
    alias: entry.config.alias,
  };
}

/** Plugin and alias only apply to DNS validation. */
export function domainFromForm(form: FormContext): AcmeDomain {
  const dns = form.text('type') === 'DNS';
  return {
    domain: form.text('domain').trim(),
    plugin: dns ? optionalText(form.text('plugin')) : undefined,
    alias: dns ? optionalText(form.text('alias')) : undefined,
  };
}

async function loadDomains(): Promise<DomainsState> {
  const config = await NodeAPI.getConfig();
  return {
    domains: acmeDomainsFromConfig(config),
    account: typeof config.acme === 'string' ? parseAcmeConfigString(config.acme) : null,
  };
}

function DomainFields(props: { form: FormContext }) {
  return (
    <>
      <AcmeChallengeTypeSelector form={props.form} name="type" label="Challenge Type" required />
      <Show when={props.form.text('type') === 'DNS'}>
        <AcmePluginSelector form={props.form} name="plugin" label="Plugin" required />
      </Show>
      <TextField form={props.form} name="domain" label="Domain" required />
      <Show when={props.form.text('type') === 'DNS'}>
        <TextField form={props.form} name="alias" label="Alias" advanced />
      </Show>
    </>
  );
}

/** Domains of the node certificate, stored as `acmedomainN` node config keys. */
export function AcmeDomainsPanel() {
  const state = useLoader(loadDomains);
  const [selected, setSelected] = createSignal<string | null>(null);
  const [dialog, setDialog] = createSignal<DomainDialog | null>(null);
  const alert = createAlert('AcmeDomainsPanel');

  const domains = () => state.data()?.domains ?? [];
  const accountName = () => state.data()?.account?.account ?? 'default';
  const selectedEntry = () => domains().find((entry) => entry.configKey === selected());

  const close = () => setDialog(null);
  const done = () => void state.reload();

  const add = () => {
    const configKey = nextFreeAcmeDomainKey(domains());
    if (!configKey) {
      alert.show('Error', new Error(`It is not possible to configure more than ${LIMITS.ACME_DOMAIN_SLOTS} ACME domains.`));
      return;
    }
    setDialog({ kind: 'add', configKey });
  };

  const edit = () => {
    const entry = selectedEntry();
    if (entry) setDialog({ kind: 'edit', entry });
  };

  const saveDomain = (configKey: string) => (form: FormContext) =>
    NodeAPI.updateConfig({ [configKey]: createAcmeDomainString(domainFromForm(form)) });

  const remove = async () => {
    const key = selected();
    if (!key) return;
    try {
      await NodeAPI.updateConfig({ delete: [key] });
      setSelected(null);
    } catch (err) {
      alert.show('Error', err);
    }
    await state.reload();
  };

  const order = async () => {
    try {
      setDialog({ kind: 'task', upid: await AcmeAPI.orderCertificate() });
    } catch (err) {
      alert.show('Error', err);
    }
  };

  const adding = () => {
    const current = dialog();
    return current?.kind === 'add' ? current : undefined;
  };
  const editing = () => {
    const current = dialog();
    return current?.kind === 'edit' ? current : undefined;
  };
  const task = () => {
    const current = dialog();
    return current?.kind === 'task' ? current : undefined;
  };

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <Button size="sm" onClick={add}>
          Add
        </Button>
        <Button size="sm" disabled={!selectedEntry()} onClick={edit}>
          Edit
        </Button>
        <RemoveButton size="sm" disabled={!selectedEntry()} name={selectedEntry()?.config.domain} onActivate={() => void remove()} />
        <ToolbarSpacer />
        <span class="text-sm text-gray-700 dark:text-gray-300">{`Using Account: ${accountName()}`}</span>
        <Button
          size="sm"
          variant="ghost"
          icon={<PencilIcon class="h-4 w-4" />}
          title="Edit account settings"
          aria-label="Edit account settings"
          onClick={() => setDialog({ kind: 'account' })}
        />
        <Button size="sm" disabled={domains().length === 0} onClick={() => void order()}>
          Order Certificate Now
        </Button>
        <RefreshButton loading={state.loading()} onClick={() => void state.reload()} />
      </Toolbar>
      <Show when={state.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <DataTable
        class="min-h-0 flex-1"
        ariaLabel="ACME Domains"
        columns={COLUMNS}
        rows={domains()}
        getKey={(entry) => entry.configKey}
        selectedKey={selected()}
        onSelect={(key) => setSelected(key)}
        onRowDblClick={edit}
        emptyText="No domains configured"
      />
      <Switch>
        <Match when={adding()}>
          {(current) => (
            <EditWindow
              isOpen
              title="Add: ACME Domain"
              advancedCheckbox
              initialValues={{ type: 'HTTP' }}
              onClose={close}
              onDone={done}
              onSubmit={saveDomain(current().configKey)}
            >
              {(form) => <DomainFields form={form} />}
            </EditWindow>
          )}
        </Match>
        <Match when={editing()}>
          {(current) => (
            <EditWindow
              isOpen
              title="Edit: ACME Domain"
              advancedCheckbox
              loader={async () => domainToForm(current().entry)}
              onClose={close}
              onDone={done}
              onSubmit={saveDomain(current().entry.configKey)}
            >
              {(form) => <DomainFields form={form} />}
            </EditWindow>
          )}
        </Match>
        <Match when={dialog()?.kind === 'account'}>
          <EditWindow
            isOpen
            title="Edit account settings"
            loader={async () => ({ account: state.data()?.account?.account ?? '' })}
            onClose={close}
            onDone={done}
            onSubmit={(form) => NodeAPI.updateConfig({ acme: createAcmeConfigString({ account: form.text('account') }) })}
          >
            {(form) => <AcmeAccountSelector form={form} name="account" label="Account Name" required />}
          </EditWindow>
        </Match>
        <Match when={task()}>
          {(current) => (
            <TaskProgress
              upid={current().upid}
              onClose={() => {
                close();
                void state.reload();
              }}
            />
          )}
        </Match>
      </Switch>
      {alert.view()}
    </div>
  );
}

export default AcmeDomainsPanel;
