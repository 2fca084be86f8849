import { Match, Switch, createEffect, createSignal, on } from 'solid-js';
import { AcmeAPI } from '@/api/acme';
import { Wizard } from '@/components/shared/Wizard';
import { CheckboxField, DisplayField, TextField } from '@/components/shared/FormFields';
import type { FormContext } from '@/components/shared/formContext';
import type { RequestData } from '@/types/api';
import { errorMessage } from '@/utils/errorHandler';
import { AcmeDirectorySelector } from './AcmeSelectors';

export interface AcmeRegisterAccountProps {
  onClose: () => void;
  /** Receives the UPID of the registration task. */
  onTask?: (upid: string) => void;
}

type TosState =
  | { state: 'loading' }
  | { state: 'none' }
  | { state: 'loaded'; url: string }
  | { state: 'error'; message: string };

export function registerAccountData(values: { name: string; contact: string; directory: string }, tosUrl?: string): RequestData {
  const data: RequestData = { contact: values.contact.trim(), directory: values.directory };
  const name = values.name.trim();
  if (name) data.name = name;
  if (tosUrl) data.tos_url = tosUrl;
  return data;
}

/** Two page wizard: account data, then the directory's terms of service. */
export function AcmeRegisterAccount(props: AcmeRegisterAccountProps) {
  const [tos, setTos] = createSignal<TosState>({ state: 'loading' });
  let requested = '';

  const loadTos = (url: string) => {
    requested = url;
    setTos({ state: 'loading' });
    AcmeAPI.termsOfService(url)
      .then((tosUrl) => {
        if (requested === url) setTos(tosUrl ? { state: 'loaded', url: tosUrl } : { state: 'none' });
      })
      .catch((err: unknown) => {
        if (requested === url) setTos({ state: 'error', message: errorMessage(err) });
      });
  };

  const tosError = () => {
    const current = tos();
    return current.state === 'error' ? current.message : undefined;
  };
  const tosUrl = () => {
    const current = tos();
    return current.state === 'loaded' ? current.url : undefined;
  };

  const tosAccepted = (form: FormContext) => {
    const current = tos();
    return current.state === 'none' || (current.state === 'loaded' && form.checked('tos_checkbox'));
  };

  const submit = async (form: FormContext) => {
    const current = tos();
    const upid = await AcmeAPI.registerAccount(
      registerAccountData(
        { name: form.text('name'), contact: form.text('contact'), directory: form.text('directory') },
        current.state === 'loaded' ? current.url : undefined,
      ),
    );
    props.onTask?.(upid);
  };

  return (
    <Wizard
      title="Register Account"
      submitText="Register"
      onClose={props.onClose}
      onSubmit={submit}
      pages={[
        {
          id: 'account',
          title: 'Account',
          valid: (form) => form.text('contact').trim() !== '' && form.text('directory') !== '',
          render: (form) => (
            <>
              <TextField form={form} name="name" label="Account Name" placeholder="default" />
              <TextField form={form} name="contact" label="E-Mail" type="email" required />
              <AcmeDirectorySelector form={form} name="directory" label="Directory" required />
            </>
          ),
        },
        {
          id: 'tos',
          title: 'Terms Of Service',
          valid: tosAccepted,
          render: (form) => {
            createEffect(on(() => form.text('directory'), loadTos));
            return (
              <Switch>
                <Match when={tos().state === 'loading'}>
                  <DisplayField label="Terms Of Service" value="Loading" wide />
                </Match>
                <Match when={tos().state === 'none'}>
                  <DisplayField label="Terms Of Service" value="This directory has no terms of service." wide />
                </Match>
                <Match when={tosError()}>
                  {(message) => (
                    <DisplayField
                      label="Terms Of Service"
                      value={<span class="text-red-600">{`Loading TOS failed: ${message()}`}</span>}
                      wide
                    />
                  )}
                </Match>
                <Match when={tosUrl()}>
                  {(url) => (
                    <>
                      <DisplayField
                        label="Terms Of Service"
                        value={
                          <a href={url()} target="_blank" rel="noreferrer" class="text-blue-600 hover:underline">
                            {url()}
                          </a>
                        }
                        wide
                      />
                      <CheckboxField form={form} name="tos_checkbox" label="Accept TOS" wide />
                    </>
                  )}
                </Match>
              </Switch>
            );
          },
        },
      ]}
    />
  );
}

export default AcmeRegisterAccount;
