import { For, Match, Show, Switch, createMemo, createSignal } from 'solid-js';
import CheckIcon from 'lucide-solid/icons/check';
import MinusIcon from 'lucide-solid/icons/minus';
import XIcon from 'lucide-solid/icons/x';
import AlertCircleIcon from 'lucide-solid/icons/alert-circle';
import { AptAPI } from '@/api/apt';
import { SubscriptionAPI } from '@/api/subscription';
import { createAlert } from '@/components/shared/AlertDialog';
import { Button, RefreshButton } from '@/components/shared/Button';
import { EditWindow } from '@/components/shared/EditWindow';
import { DisplayField, SelectField } from '@/components/shared/FormFields';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { SubscriptionAlert } from '@/components/Subscription/SubscriptionAlert';
import { PRODUCTS } from '@/config/product';
import type { ProxmoxProduct } from '@/config/product';
import { useLoader } from '@/hooks/useLoader';
import type { AptRepositoryEntry, AptStatusLine } from '@/utils/aptRepositories';
import { aptConfigurationToTree, aptStatusLines, componentWarning, standardRepoInfo } from '@/utils/aptRepositories';
import { apiClient } from '@/utils/apiClient';
import { isSubscriptionOk } from '@/utils/subscription';

export const STANDARD_REPOSITORY_OPTIONS = [
  { value: 'enterprise', label: 'Enterprise' },
  { value: 'no-subscription', label: 'No-Subscription' },
  { value: 'test', label: 'Test' },
] as const;

export interface AptRepositoriesProps {
  baseUrl?: string;
  /** Product whose name appears in the status lines; defaults to the client's product. */
  product?: ProxmoxProduct;
}

const repositoryCount = (count: number) => (count === 1 ? 'One repository' : `${count} repositories`);

function StatusLineView(props: { line: AptStatusLine }) {
  return (
    <li
      class={`flex items-center gap-2 ${
        props.line.status === 'error' ? 'text-red-700' : props.line.status === 'warning' ? 'text-amber-700' : ''
      }`}
    >
      <Switch>
        <Match when={props.line.status === 'ok'}>
          <CheckIcon class="h-4 w-4 text-green-600" />
        </Match>
        <Match when={props.line.status === 'warning'}>
          <AlertCircleIcon class="h-4 w-4" />
        </Match>
        <Match when={props.line.status === 'error'}>
          <XIcon class="h-4 w-4" />
        </Match>
      </Switch>
      {props.line.message}
    </li>
  );
}

function TextWithWarnings(props: { text: string; warnings: readonly string[] }) {
  return (
    <Show when={props.warnings.length > 0} fallback={<span>{props.text}</span>}>
      <span class="inline-flex items-center gap-1 text-amber-700" title={props.warnings.join('\n')}>
        {props.text}
        <AlertCircleIcon class="h-3.5 w-3.5" aria-label={props.warnings.length === 1 ? 'Warning' : 'Warnings'} />
      </span>
    </Show>
  );
}

function RepositoryCells(props: { entry: AptRepositoryEntry }) {
  const repo = () => props.entry.repo;
  const suiteWarnings = () =>
    props.entry.warnings.filter((info) => info.property === 'Suites').map((info) => info.message);

  return (
    <>
      <td class="px-3 py-1.5">{repo().Types.join(' ')}</td>
      <td class="px-3 py-1.5 break-all">{repo().URIs.join(' ')}</td>
      <td class="px-3 py-1.5">
        <TextWithWarnings text={repo().Suites.join(' ')} warnings={suiteWarnings()} />
      </td>
      <td class="px-3 py-1.5">
        <span class="flex flex-wrap gap-2">
          <For each={repo().Components}>
            {(component) => {
              const warning = componentWarning(props.entry.origin, component);
              return <TextWithWarnings text={component} warnings={warning ? [warning] : []} />;
            }}
          </For>
        </span>
      </td>
      <td class="px-3 py-1.5">{props.entry.origin}</td>
      <td class="px-3 py-1.5">{repo().Comment ?? ''}</td>
    </>
  );
}

/** APT sources of the node, with a status summary and the standard repositories. */
export function AptRepositories(props: AptRepositoriesProps) {
  const config = useLoader(() => AptAPI.repositories(props.baseUrl));
  const subscription = useLoader(() => SubscriptionAPI.get());
  const [selected, setSelected] = createSignal<string | null>(null);
  const [dialog, setDialog] = createSignal<'subscription' | 'add' | null>(null);
  const alert = createAlert('AptRepositories');

  const projectText = () => PRODUCTS[props.product ?? apiClient.getProduct()].projectText;
  const subscriptionStatus = () => subscription.data()?.status ?? 'unknown';
  const activeSubscription = () => subscriptionStatus().toLowerCase() === 'active';

  const tree = createMemo(() => {
    const data = config.data();
    return data ? aptConfigurationToTree(data) : [];
  });

  const statusLines = createMemo(() => {
    const data = config.data();
    return data ? aptStatusLines(data, activeSubscription(), projectText()) : [];
  });

  const selectedRepository = () => {
    const key = selected();
    for (const file of tree()) {
      const entry = file.repositories.find((repo) => repo.key === key);
      if (entry) return entry;
    }
    return undefined;
  };

  const standardRepos = () => config.data()?.['standard-repos'] ?? [];

  const toggle = async () => {
    const entry = selectedRepository();
    if (!entry) return;
    try {
      await AptAPI.setRepositoryEnabled(entry.path, entry.index, !entry.repo.Enabled, config.data()?.digest, props.baseUrl);
      await config.reload();
    } catch (err) {
      alert.show('API call failed', err);
    }
  };

  const openAdd = () => setDialog(isSubscriptionOk(subscriptionStatus()) ? 'add' : 'subscription');

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <Button size="sm" onClick={openAdd}>
          Add
        </Button>
        <Button size="sm" disabled={!selectedRepository()} onClick={() => void toggle()}>
          {selectedRepository()?.repo.Enabled ? 'Disable' : 'Enable'}
        </Button>
        <ToolbarSpacer />
        <RefreshButton loading={config.loading()} onClick={() => void config.reload()} />
      </Toolbar>
      <Show when={config.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <ul class="space-y-1 p-4 text-sm" aria-label="Repository status">
        <For each={statusLines()}>{(line) => <StatusLineView line={line} />}</For>
      </ul>
      <div class="min-h-0 flex-1 overflow-auto border-t border-gray-200 dark:border-gray-700">
        <table class="w-full border-collapse text-left text-sm" aria-label="Repositories">
          <thead class="sticky top-0 border-b border-gray-200 bg-gray-50 text-xs text-gray-600 dark:border-gray-700 dark:bg-gray-800 dark:text-gray-300">
            <tr>
              <th class="w-20 px-3 py-1.5">Enabled</th>
              <th class="w-24 px-3 py-1.5">Types</th>
              <th class="px-3 py-1.5">URIs</th>
              <th class="w-36 px-3 py-1.5">Suites</th>
              <th class="w-48 px-3 py-1.5">Components</th>
              <th class="w-28 px-3 py-1.5">Origin</th>
              <th class="px-3 py-1.5">Comment</th>
            </tr>
          </thead>
          <tbody class="divide-y divide-gray-100 dark:divide-gray-800">
            <For each={tree()}>
              {(file) => (
                <>
                  <tr class="bg-gray-50 font-medium dark:bg-gray-800/60">
                    <td colspan="7" class="px-3 py-1.5">
                      {`${file.path} (${repositoryCount(file.repositories.length)})`}
                    </td>
                  </tr>
                  <For each={file.repositories}>
                    {(entry) => (
                      <tr
                        aria-selected={selected() === entry.key ? 'true' : 'false'}
                        class={selected() === entry.key ? 'bg-blue-100 dark:bg-blue-900/40' : 'hover:bg-gray-50 dark:hover:bg-gray-800/60'}
                        onClick={() => setSelected(entry.key)}
                      >
                        <td class="px-3 py-1.5 pl-6">
                          <Show when={entry.repo.Enabled} fallback={<MinusIcon class="h-4 w-4" aria-label="disabled" />}>
                            <CheckIcon class="h-4 w-4" aria-label="enabled" />
                          </Show>
                        </td>
                        <RepositoryCells entry={entry} />
                      </tr>
                    )}
                  </For>
                </>
              )}
            </For>
          </tbody>
        </table>
      </div>
      <Show when={dialog() === 'subscription'}>
        <SubscriptionAlert
          status={subscriptionStatus()}
          url={subscription.data()?.url}
          onClose={() => setDialog('add')}
        />
      </Show>
      <EditWindow
        isOpen={dialog() === 'add'}
        title="Add: Repository"
        initialValues={{ handle: 'enterprise' }}
        onClose={() => setDialog(null)}
        onDone={() => void config.reload()}
        validate={(form) => (standardRepoInfo(standardRepos(), form.text('handle')).enabled ? 'Already configured' : null)}
        onSubmit={(form) => AptAPI.addStandardRepository(form.text('handle'), props.baseUrl)}
      >
        {(form) => {
          const info = () => standardRepoInfo(standardRepos(), form.text('handle'));
          return (
            <>
              <SelectField form={form} name="handle" label="Repository" options={STANDARD_REPOSITORY_OPTIONS} wide />
              <DisplayField label="Description" value={info().description} wide />
              <DisplayField label="Status" value={info().status} wide />
            </>
          );
        }}
      </EditWindow>
      {alert.view()}
    </div>
  );
}

export default AptRepositories;
