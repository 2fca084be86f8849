import { For, Show, createEffect, on } from 'solid-js';
import { AccessAPI } from '@/api/access';
import { formSelect } from '@/components/shared/Form';
import { useLoader } from '@/hooks/useLoader';
import type { BasicRealmInfo } from '@/types/access';

export interface RealmSelectorProps {
  id?: string;
  value: string;
  onChange: (realm: string, info: BasicRealmInfo | undefined) => void;
  /** Realm list url, defaults to `/access/domains`. */
  path?: string;
  disabled?: boolean;
}

/** Sorted with the default realm first, then by name. */
export function sortRealms(realms: readonly BasicRealmInfo[]): BasicRealmInfo[] {
  return [...realms].sort((a, b) => {
    if (a.default !== b.default) return a.default ? -1 : 1;
    return a.realm.localeCompare(b.realm);
  });
}

export const realmLabel = (realm: BasicRealmInfo) => (realm.comment ? `${realm.comment} (${realm.realm})` : realm.realm);

/**
 * Authentication realm select box. When `value` is empty or unknown the
 * default realm (or the first one) is chosen once the list has loaded.
 */
export function RealmSelector(props: RealmSelectorProps) {
  const realms = useLoader(async () => sortRealms(await AccessAPI.listDomains(props.path)), { initialValue: [] });

  const find = (realm: string) => realms.data()?.find((info) => info.realm === realm);

  createEffect(
    on(realms.data, (list) => {
      if (!list || list.length === 0) return;
      const current = find(props.value);
      if (current) {
        props.onChange(current.realm, current);
        return;
      }
      const fallback = list.find((info) => info.default) ?? list[0];
      props.onChange(fallback.realm, fallback);
    }),
  );

  return (
    <>
      <select
        id={props.id}
        name="realm"
        class={formSelect}
        disabled={props.disabled || realms.loading()}
        value={props.value}
        onChange={(event) => props.onChange(event.currentTarget.value, find(event.currentTarget.value))}
      >
        <For each={realms.data() ?? []}>
          {(realm) => (
            <option value={realm.realm} selected={realm.realm === props.value}>
              {realmLabel(realm)}
            </option>
          )}
        </For>
      </select>
      <Show when={realms.error()}>
        {(message) => <span class="text-xs text-red-600 dark:text-red-400">{message()}</span>}
      </Show>
    </>
  );
}

export default RealmSelector;
