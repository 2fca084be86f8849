import { For, Show, createSignal } from 'solid-js';
import type { JSX } from 'solid-js';

export interface Tab {
  id: string;
  label: string;
  icon?: JSX.Element;
  render: () => JSX.Element;
}

export interface TabPanelProps {
  tabs: readonly Tab[];
  /** Controlled active tab. */
  active?: string;
  defaultActive?: string;
  onChange?: (id: string) => void;
  class?: string;
}

export function TabPanel(props: TabPanelProps) {
  const [internal, setInternal] = createSignal(props.defaultActive ?? props.tabs[0]?.id ?? '');
  const active = () => props.active ?? internal();

  const activate = (id: string) => {
    setInternal(id);
    props.onChange?.(id);
  };

  return (
    <div class={`flex min-h-0 flex-col ${props.class ?? ''}`.trim()}>
      <div role="tablist" class="flex gap-1 border-b border-gray-200 px-2 dark:border-gray-700">
        <For each={props.tabs}>
          {(tab) => (
            <button
              type="button"
              role="tab"
              aria-selected={tab.id === active() ? 'true' : 'false'}
              class={`inline-flex items-center gap-1.5 border-b-2 px-3 py-2 text-sm ${
                tab.id === active()
                  ? 'border-blue-600 font-medium text-blue-700 dark:text-blue-300'
                  : 'border-transparent text-gray-600 hover:text-gray-900 dark:text-gray-400'
              }`}
              onClick={() => activate(tab.id)}
            >
              {tab.icon}
              {tab.label}
            </button>
          )}
        </For>
      </div>
      <For each={props.tabs}>
        {(tab) => (
          <Show when={tab.id === active()}>
            <div role="tabpanel" class="min-h-0 flex-1 overflow-auto">
              {tab.render()}
            </div>
          </Show>
        )}
      </For>
    </div>
  );
}

export default TabPanel;
