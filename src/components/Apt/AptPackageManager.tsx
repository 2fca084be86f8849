import { For, Show, createSignal } from 'solid-js';
import ChevronDownIcon from 'lucide-solid/icons/chevron-down';
import ChevronRightIcon from 'lucide-solid/icons/chevron-right';
import { AptAPI } from '@/api/apt';
import { Button, RefreshButton } from '@/components/shared/Button';
import { Dialog } from '@/components/shared/Dialog';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { TaskProgress } from '@/components/Tasks/TaskProgress';
import { useLoader } from '@/hooks/useLoader';
import type { AptUpdateInfo } from '@/types/apt';
import { groupUpdatesByOrigin, originLabel, splitTitle } from '@/utils/aptRepositories';

export interface AptPackageManagerProps {
  baseUrl?: string;
  /** Start the upgrade, e.g. by opening a console; the button is hidden without it. */
  onUpgrade?: () => void;
}

function ChangelogView(props: { packageName: string; baseUrl?: string; onClose: () => void }) {
  const changelog = useLoader(() => AptAPI.changelog(props.packageName, props.baseUrl));

  return (
    <Dialog isOpen title={`Changelog: ${props.packageName}`} onClose={props.onClose} panelClass="max-w-4xl">
      <Show when={changelog.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <Show when={changelog.data()} fallback={<div class="p-6 text-center text-sm text-gray-500">Loading...</div>}>
        {(text) => <pre class="max-h-[70vh] overflow-auto p-4 font-mono text-xs">{text()}</pre>}
      </Show>
    </Dialog>
  );
}

/** Pending package updates grouped by origin. */
export function AptPackageManager(props: AptPackageManagerProps) {
  const updates = useLoader(() => AptAPI.listUpdates(props.baseUrl), { initialValue: [] });
  const [selected, setSelected] = createSignal<string | null>(null);
  const [collapsed, setCollapsed] = createSignal<ReadonlySet<string>>(new Set());
  const [changelog, setChangelog] = createSignal<string | null>(null);
  const [refreshTask, setRefreshTask] = createSignal<string | null>(null);
  const [refreshError, setRefreshError] = createSignal<string | null>(null);

  const groups = () => groupUpdatesByOrigin(updates.data() ?? []);

  const toggle = (origin: string) => {
    const next = new Set(collapsed());
    if (next.has(origin)) next.delete(origin);
    else next.add(origin);
    setCollapsed(next);
  };

  const refresh = async () => {
    setRefreshError(null);
    try {
      setRefreshTask(await AptAPI.refresh(props.baseUrl));
    } catch (err) {
      setRefreshError(err instanceof Error ? err.message : String(err));
    }
  };

  const row = (info: AptUpdateInfo) => {
    const description = () => splitTitle(info.Description);
    return (
      <tr
        aria-selected={selected() === info.Package ? 'true' : 'false'}
        class={selected() === info.Package ? 'bg-blue-100 dark:bg-blue-900/40' : 'hover:bg-gray-50 dark:hover:bg-gray-800/60'}
        onClick={() => setSelected(info.Package)}
        onDblClick={() => setChangelog(info.Package)}
      >
        <td class="px-3 py-1.5 pl-8">{info.Package}</td>
        <td class="px-3 py-1.5">{info.OldVersion}</td>
        <td class="px-3 py-1.5">{info.Version}</td>
        <td class="px-3 py-1.5" title={description().body}>
          {description().title}
        </td>
      </tr>
    );
  };

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <Button size="sm" onClick={() => void refresh()}>
          Refresh
        </Button>
        <Show when={props.onUpgrade}>
          {(upgrade) => (
            <Button size="sm" disabled={(updates.data() ?? []).length === 0} onClick={() => upgrade()()}>
              Upgrade
            </Button>
          )}
        </Show>
        <Button size="sm" disabled={!selected()} onClick={() => setChangelog(selected())}>
          Changelog
        </Button>
        <ToolbarSpacer />
        <RefreshButton loading={updates.loading()} onClick={() => void updates.reload()} />
      </Toolbar>
      <Show when={updates.error() ?? refreshError()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <div class="min-h-0 flex-1 overflow-auto">
        <table class="w-full border-collapse text-left text-sm" aria-label="Updates">
          <thead class="sticky top-0 border-b border-gray-200 bg-gray-50 text-xs text-gray-600 dark:border-gray-700 dark:bg-gray-800 dark:text-gray-300">
            <tr>
              <th rowspan="2" class="px-3 py-1.5">Package</th>
              <th colspan="2" class="px-3 py-1 text-center">Version</th>
              <th rowspan="2" class="px-3 py-1.5">Description</th>
            </tr>
            <tr>
              <th class="w-32 px-3 py-1">current</th>
              <th class="w-32 px-3 py-1">new</th>
            </tr>
          </thead>
          <tbody class="divide-y divide-gray-100 dark:divide-gray-800">
            <Show
              when={groups().length > 0}
              fallback={
                <tr>
                  <td colspan="4" class="px-3 py-6 text-center text-gray-500">
                    No updates available.
                  </td>
                </tr>
              }
            >
              <For each={groups()}>
                {(group) => (
                  <>
                    <tr class="cursor-pointer bg-gray-50 font-medium dark:bg-gray-800/60" onClick={() => toggle(group.origin)}>
                      <td colspan="4" class="px-3 py-1.5">
                        <span class="inline-flex items-center gap-1">
                          <Show when={collapsed().has(group.origin)} fallback={<ChevronDownIcon class="h-4 w-4" />}>
                            <ChevronRightIcon class="h-4 w-4" />
                          </Show>
                          {originLabel(group)}
                        </span>
                      </td>
                    </tr>
                    <Show when={!collapsed().has(group.origin)}>
                      <For each={group.packages}>{row}</For>
                    </Show>
                  </>
                )}
              </For>
            </Show>
          </tbody>
        </table>
      </div>
      <Show when={changelog()}>
        {(name) => <ChangelogView packageName={name()} baseUrl={props.baseUrl} onClose={() => setChangelog(null)} />}
      </Show>
      <Show when={refreshTask()}>
        {(upid) => (
          <TaskProgress
            upid={upid()}
            onClose={() => {
              setRefreshTask(null);
              void updates.reload();
            }}
          />
        )}
      </Show>
    </div>
  );
}

export default AptPackageManager;
