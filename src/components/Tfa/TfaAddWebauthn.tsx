import { TfaAPI } from '@/api/tfa';
import { EditWindow } from '@/components/shared/EditWindow';
import { TextField } from '@/components/shared/FormFields';
import type { FormContext } from '@/components/shared/formContext';
import { AuthidSelector } from '@/components/Access/AuthidSelector';
import { currentUserid } from '@/stores/session';

export interface TfaAddWebauthnProps {
  baseUrl?: string;
  onClose: () => void;
  onDone?: () => void;
  credentials?: Pick<CredentialsContainer, 'create'>;
}

export function TfaAddWebauthn(props: TfaAddWebauthnProps) {
  const submit = (form: FormContext) =>
    TfaAPI.addWebauthn(
      form.text('userid'),
      form.text('description').trim(),
      form.text('password') || undefined,
      props.baseUrl,
      props.credentials ?? navigator.credentials,
    );

  return (
    <EditWindow
      isOpen
      title="Add: WebAuthn"
      submitText="Register WebAuthn Device"
      onClose={props.onClose}
      onDone={props.onDone}
      initialValues={{ userid: currentUserid() ?? '' }}
      onSubmit={submit}
    >
      {(form) => (
        <>
          <AuthidSelector form={form} name="userid" label="User" includeTokens={false} required />
          <TextField form={form} name="description" label="Description" required />
          <TextField form={form} name="password" label="Password" type="password" />
          <p class="text-xs text-gray-500 sm:col-span-2 dark:text-gray-400">
            Your browser will ask you to touch the security key after the registration started.
          </p>
        </>
      )}
    </EditWindow>
  );
}

export default TfaAddWebauthn;
