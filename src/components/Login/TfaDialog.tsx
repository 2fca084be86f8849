import { Show, createSignal, onCleanup, onMount } from 'solid-js';
import type { JSX } from 'solid-js';
import KeyRoundIcon from 'lucide-solid/icons/key-round';
import { Dialog } from '@/components/shared/Dialog';
import { Button } from '@/components/shared/Button';
import { TabPanel } from '@/components/shared/TabPanel';
import type { Tab } from '@/components/shared/TabPanel';
import { formControl } from '@/components/shared/Form';
import { LIMITS } from '@/constants';
import type { TfaResponse } from '@/types/access';
import type { TfaChallenge } from '@/types/tfa';
import { errorMessage } from '@/utils/errorHandler';
import { logger } from '@/utils/logger';
import { encodeAssertionResponse, prepareAssertionChallenge } from '@/utils/webauthn';

export interface TfaDialogProps {
  challenge: TfaChallenge;
  onResponse: (response: TfaResponse) => void;
  onClose: () => void;
  /** Injected for tests; defaults to `navigator.credentials`. */
  credentials?: CredentialsContainer;
}

/** Warning shown below the recovery key input, `null` while enough keys remain. */
export function recoveryKeyWarning(available: readonly number[]): string | null {
  if (available.length > LIMITS.RECOVERY_KEY_WARN_THRESHOLD) return null;
  return `Less than ${available.length + 1} recovery keys available. Please generate a new set after login!`;
}

function CodeForm(props: {
  prompt: string;
  children?: JSX.Element;
  onSubmit: (value: string) => void;
}) {
  const [value, setValue] = createSignal('');
  const submit = (event: Event) => {
    event.preventDefault();
    if (value().trim()) props.onSubmit(value().trim());
  };

  return (
    <form class="flex h-full flex-col gap-2 p-3" onSubmit={submit}>
      <p class="text-sm text-gray-700 dark:text-gray-300">{props.prompt}</p>
      {props.children}
      <input
        class={formControl}
        autofocus
        autocomplete="one-time-code"
        aria-label={props.prompt}
        value={value()}
        onInput={(event) => setValue(event.currentTarget.value)}
      />
      <div class="flex-1" />
      <div class="flex justify-end">
        <Button type="submit" variant="primary" disabled={!value().trim()}>
          Confirm
        </Button>
      </div>
    </form>
  );
}

function WebAuthnForm(props: {
  challenge: Record<string, unknown>;
  credentials?: CredentialsContainer;
  onResponse: (response: string) => void;
}) {
  const [error, setError] = createSignal<string | null>(null);
  const [running, setRunning] = createSignal(false);
  let abort: AbortController | undefined;

  const start = async () => {
    abort?.abort();
    const controller = new AbortController();
    abort = controller;
    setError(null);
    setRunning(true);
    try {
      const prepared = prepareAssertionChallenge(props.challenge);
      const credentials = props.credentials ?? navigator.credentials;
      const credential = await credentials.get({ ...prepared.options, signal: controller.signal });
      if (controller.signal.aborted) return;
      props.onResponse(encodeAssertionResponse(credential, prepared.challenge));
    } catch (err) {
      if (controller.signal.aborted) return;
      logger.warn('WebAuthn authentication failed', err);
      setError(errorMessage(err));
    } finally {
      if (abort === controller) setRunning(false);
    }
  };

  onMount(() => void start());
  onCleanup(() => abort?.abort());

  return (
    <div class="flex h-full flex-col gap-2 p-3">
      <p class="text-sm text-gray-700 dark:text-gray-300">
        Please insert your authentication device and press its button.
      </p>
      <Show when={error()}>
        {(message) => (
          <p role="alert" class="text-sm text-red-600 dark:text-red-400">
            {message()}
          </p>
        )}
      </Show>
      <div class="flex-1" />
      <div class="flex justify-end">
        <Button variant="primary" isLoading={running()} disabled={running()} onClick={() => void start()}>
          Retry
        </Button>
      </div>
    </div>
  );
}

/** Asks for one of the second factors offered by a login challenge. */
export function TfaDialog(props: TfaDialogProps) {
  const tabs = (): Tab[] => {
    const challenge = props.challenge;
    const result: Tab[] = [];
    if (challenge.totp) {
      result.push({
        id: 'totp',
        label: 'TOTP App',
        render: () => (
          <CodeForm
            prompt="Please enter your TOTP verification code"
            onSubmit={(code) => props.onResponse({ type: 'totp', code })}
          />
        ),
      });
    }
    if (challenge.yubico) {
      result.push({
        id: 'yubico',
        label: 'Yubico OTP',
        render: () => (
          <CodeForm
            prompt="Please enter your Yubico OTP code"
            onSubmit={(otp) => props.onResponse({ type: 'yubico', otp })}
          />
        ),
      });
    }
    if (challenge.recovery.length > 0 || (!challenge.totp && !challenge.yubico && !challenge.webauthn)) {
      result.push({
        id: 'recovery',
        label: 'Recovery Key',
        render: () => (
          <Show
            when={challenge.recovery.length > 0}
            fallback={
              <p role="alert" class="p-3 text-sm text-red-600 dark:text-red-400">
                No more recovery keys available.
              </p>
            }
          >
            <CodeForm
              prompt="Please enter one of your single-use recovery keys"
              onSubmit={(key) => props.onResponse({ type: 'recovery', key })}
            >
              <p class="text-sm text-gray-700 dark:text-gray-300">
                {`Available recovery keys: ${challenge.recovery.join(', ')}`}
              </p>
              <Show when={recoveryKeyWarning(challenge.recovery)}>
                {(warning) => <p class="text-sm text-amber-700 dark:text-amber-400">{warning()}</p>}
              </Show>
            </CodeForm>
          </Show>
        ),
      });
    }
    const webauthn = challenge.webauthn;
    if (webauthn) {
      result.push({
        id: 'webauthn',
        label: 'WebAuthn',
        render: () => (
          <WebAuthnForm
            challenge={webauthn}
            credentials={props.credentials}
            onResponse={(response) => props.onResponse({ type: 'webauthn', response })}
          />
        ),
      });
    }
    return result;
  };

  return (
    <Dialog
      isOpen
      onClose={props.onClose}
      title={
        <span class="inline-flex items-center gap-2">
          <KeyRoundIcon class="h-4 w-4" />
          Second login factor required
        </span>
      }
      panelClass="w-full max-w-xl min-h-[300px]"
    >
      <TabPanel tabs={tabs()} class="min-h-[240px]" />
    </Dialog>
  );
}

export default TfaDialog;
