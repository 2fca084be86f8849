import { Match, Show, Switch } from 'solid-js';
import CheckCircleIcon from 'lucide-solid/icons/check-circle';
import XCircleIcon from 'lucide-solid/icons/x-circle';
import AlertTriangleIcon from 'lucide-solid/icons/alert-triangle';
import { SubscriptionAPI } from '@/api/subscription';
import { HelpButton } from '@/components/shared/HelpButton';
import { useLoader } from '@/hooks/useLoader';
import { isSubscriptionOk, subscriptionLevel, subscriptionStatusText, subscriptionUrl } from '@/utils/subscription';

export function SubscriptionIcon(props: { status: string; class?: string }) {
  const cls = () => props.class ?? 'h-12 w-12';
  return (
    <Switch>
      <Match when={subscriptionLevel(props.status) === 'ok'}>
        <CheckCircleIcon class={`${cls()} text-green-600`} aria-label="ok" />
      </Match>
      <Match when={subscriptionLevel(props.status) === 'error'}>
        <XCircleIcon class={`${cls()} text-red-600`} aria-label="error" />
      </Match>
      <Match when={subscriptionLevel(props.status) === 'warning'}>
        <AlertTriangleIcon class={`${cls()} text-amber-500`} aria-label="warning" />
      </Match>
    </Switch>
  );
}

export function SubscriptionNote(props: { url?: string | null }) {
  return (
    <p class="text-sm">
      You do not have a valid subscription for this server. Please visit{' '}
      <a class="text-blue-600 underline" target="_blank" rel="noreferrer" href={subscriptionUrl(props.url)}>
        www.proxmox.com
      </a>{' '}
      to get a list of available options.
    </p>
  );
}

/** Status text, plus the note about available options when not subscribed. */
export function SubscriptionStatusMessage(props: { status: string; url?: string | null }) {
  return (
    <Show when={!isSubscriptionOk(props.status)} fallback={<span class="text-sm">{subscriptionStatusText(props.status)}</span>}>
      <div class="flex flex-1 flex-col items-center justify-center gap-2 text-center">
        <h3 class="text-base font-semibold">{subscriptionStatusText(props.status)}</h3>
        <SubscriptionNote url={props.url} />
      </div>
    </Show>
  );
}

export interface SubscriptionInfoProps {
  url?: string;
}

/** Dashboard panel with the subscription status of the server. */
export function SubscriptionInfo(props: SubscriptionInfoProps) {
  const info = useLoader(() => SubscriptionAPI.get(props.url));

  return (
    <section class="flex min-h-[200px] flex-col rounded-md border border-gray-200 dark:border-gray-700">
      <header class="flex items-center justify-between border-b border-gray-200 px-3 py-2 text-sm font-semibold dark:border-gray-700">
        Subscription
        <HelpButton section="subscription" />
      </header>
      <Show when={info.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <Show when={info.data()}>
        {(data) => (
          <div class="flex flex-1 items-center gap-6 p-4">
            <SubscriptionIcon status={data().status} />
            <SubscriptionStatusMessage status={data().status} url={data().url} />
          </div>
        )}
      </Show>
    </section>
  );
}

export default SubscriptionInfo;
