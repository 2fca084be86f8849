import { Show, createSignal, onMount } from 'solid-js';
import AlertTriangleIcon from 'lucide-solid/icons/alert-triangle';
import { completeTfa, login, openidAuthUrl, openidLogin, openidRedirectParams } from '@/api/access';
import { Button } from '@/components/shared/Button';
import { formCheckbox, formControl, formField, formLabel } from '@/components/shared/Form';
import { STORAGE_KEYS } from '@/constants';
import { usePersistentSignal } from '@/hooks/usePersistentSignal';
import type { BasicRealmInfo, LoginResult, SecondFactorChallenge, TfaResponse } from '@/types/access';
import { errorMessage } from '@/utils/errorHandler';
import { logger } from '@/utils/logger';
import { consoleOrigin, setLocationHref } from '@/utils/url';
import { RealmSelector } from './RealmSelector';
import { TfaDialog } from './TfaDialog';

export type AuthenticatedLogin = Extract<LoginResult, { kind: 'authenticated' }>;

export interface LoginPanelProps {
  onLogin?: (auth: AuthenticatedLogin) => void;
  defaultRealm?: string;
  /** Show the realm box; otherwise the user name is entered as `user@realm`. */
  realmSelectable?: boolean;
  /** Realm list url, defaults to `/access/domains`. */
  domainPath?: string;
  title?: string;
  /** Injected for tests; defaults to `navigator.credentials`. */
  credentials?: CredentialsContainer;
}

/** Split `user@realm` at the last `@`; `null` when there is no realm part. */
export function splitUserid(userid: string): { username: string; realm: string } | null {
  const pos = userid.lastIndexOf('@');
  if (pos <= 0 || pos === userid.length - 1) return null;
  return { username: userid.slice(0, pos), realm: userid.slice(pos + 1) };
}

export const loginErrorText = (message: string) => `Login failed. Please try again (${message})`;

// an OpenID state is only valid for one round trip
let openidLoginStarted = false;

export function LoginPanel(props: LoginPanelProps) {
  const realmSelectable = () => props.realmSelectable ?? true;
  const [saveUsername, setSaveUsername] = usePersistentSignal(STORAGE_KEYS.LOGIN_SAVE_USERNAME, false, {
    deserialize: (value) => value === 'true',
  });
  const [lastUserid, setLastUserid] = usePersistentSignal(STORAGE_KEYS.LOGIN_USERNAME, '', {
    deserialize: (value) => value,
  });

  const saved = saveUsername() ? splitUserid(lastUserid()) : null;
  const [username, setUsername] = createSignal(saved?.username ?? 'root');
  const [realm, setRealm] = createSignal(saved?.realm ?? props.defaultRealm ?? '');
  const [realmInfo, setRealmInfo] = createSignal<BasicRealmInfo | undefined>();
  const [password, setPassword] = createSignal('');
  const [loading, setLoading] = createSignal(false);
  const [error, setError] = createSignal<string | null>(null);
  const [challenge, setChallenge] = createSignal<SecondFactorChallenge | null>(null);

  const isOpenid = () => realmInfo()?.type === 'openid';

  const finish = (result: LoginResult) => {
    if (result.kind === 'tfa') {
      setChallenge(result.challenge);
      return;
    }
    setLoading(false);
    setPassword('');
    if (saveUsername()) setLastUserid(result.userid);
    props.onLogin?.(result);
  };

  const fail = (err: unknown) => {
    logger.warn('Login failed', err);
    setLoading(false);
    setChallenge(null);
    setError(loginErrorText(errorMessage(err)));
  };

  const credentialsFromForm = () => {
    if (realmSelectable()) return { user: username().trim(), realmName: realm() };
    const parts = splitUserid(username().trim());
    return { user: parts?.username ?? username().trim(), realmName: parts?.realm ?? '' };
  };

  const submit = async (event?: Event) => {
    event?.preventDefault();
    if (loading()) return;
    setError(null);
    setLoading(true);
    const { user, realmName } = credentialsFromForm();
    try {
      finish(await login(user, realmName, password()));
    } catch (err) {
      fail(err);
    }
  };

  const answerTfa = async (response: TfaResponse) => {
    const current = challenge();
    if (!current) return;
    setChallenge(null);
    try {
      finish(await completeTfa(current, response));
    } catch (err) {
      fail(err);
    }
  };

  const abortTfa = () => {
    setChallenge(null);
    setLoading(false);
  };

  const openidRedirect = async () => {
    setError(null);
    setLoading(true);
    try {
      const url = await openidAuthUrl(realm(), consoleOrigin());
      setLocationHref(url);
    } catch (err) {
      fail(err);
    }
  };

  onMount(() => {
    const params = openidRedirectParams();
    if (!params || openidLoginStarted) return;
    openidLoginStarted = true;
    setLoading(true);
    const origin = consoleOrigin();
    void openidLogin(params.state, params.code, origin)
      .then((result) => {
        finish(result);
        setLocationHref(origin);
      })
      .catch(fail);
  });

  return (
    <div class="w-full max-w-md rounded-lg border border-gray-200 bg-white p-6 shadow-sm dark:border-gray-700 dark:bg-gray-800">
      <Show when={props.title}>
        <h2 class="mb-4 text-center text-xl font-semibold text-gray-900 dark:text-white">{props.title}</h2>
      </Show>
      <form class="flex flex-col gap-3" onSubmit={(event) => void submit(event)}>
        <Show when={!isOpenid()}>
          <div class={formField}>
            <label for="login-username" class={formLabel}>
              User name
            </label>
            <input
              id="login-username"
              name="username"
              class={formControl}
              autocomplete="username"
              autofocus
              value={username()}
              onInput={(event) => {
                setUsername(event.currentTarget.value);
                setError(null);
              }}
            />
          </div>
          <div class={formField}>
            <label for="login-password" class={formLabel}>
              Password
            </label>
            <input
              id="login-password"
              name="password"
              type="password"
              class={formControl}
              autocomplete="current-password"
              value={password()}
              onInput={(event) => {
                setPassword(event.currentTarget.value);
                setError(null);
              }}
            />
          </div>
        </Show>
        <Show when={realmSelectable()}>
          <div class={formField}>
            <label for="login-realm" class={formLabel}>
              Realm
            </label>
            <RealmSelector
              id="login-realm"
              path={props.domainPath}
              value={realm()}
              onChange={(value, info) => {
                setRealm(value);
                setRealmInfo(info);
              }}
            />
          </div>
        </Show>
        <div class="flex items-center justify-between gap-2">
          <label class="inline-flex select-none items-center gap-2 text-sm text-gray-700 dark:text-gray-300">
            <input
              type="checkbox"
              class={formCheckbox}
              checked={saveUsername()}
              onChange={(event) => setSaveUsername(event.currentTarget.checked)}
            />
            Save User name
          </label>
          <Show
            when={isOpenid()}
            fallback={
              <Button type="submit" variant="primary" isLoading={loading()} disabled={loading() || !username().trim()}>
                Login
              </Button>
            }
          >
            <Button variant="primary" isLoading={loading()} disabled={loading()} onClick={() => void openidRedirect()}>
              Login (OpenID redirect)
            </Button>
          </Show>
        </div>
        <Show when={error()}>
          {(message) => (
            <div role="alert" class="flex items-start gap-2 rounded-md bg-red-50 p-3 dark:bg-red-900/20">
              <AlertTriangleIcon class="mt-0.5 h-4 w-4 flex-shrink-0 text-red-500" />
              <p class="break-words text-sm text-red-800 dark:text-red-200">{message()}</p>
            </div>
          )}
        </Show>
      </form>
      <Show when={challenge()}>
        {(current) => (
          <TfaDialog
            challenge={current().challenge}
            credentials={props.credentials}
            onResponse={(response) => void answerTfa(response)}
            onClose={abortTfa}
          />
        )}
      </Show>
    </div>
  );
}

export default LoginPanel;
