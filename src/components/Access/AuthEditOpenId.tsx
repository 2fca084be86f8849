import { AccessAPI } from '@/api/access';
import { EditWindow } from '@/components/shared/EditWindow';
import { CheckboxField, TextField } from '@/components/shared/FormFields';
import type { FormContext, FormValues } from '@/components/shared/formContext';
import { toFormValue } from '@/components/shared/ObjectGrid';
import { OPENID_DELETABLE_KEYS, realmUpdateData } from '@/utils/authRealm';

export interface AuthEditOpenIdProps {
  realm?: string;
  baseUrl?: string;
  sendType?: boolean;
  onClose: () => void;
  onDone?: () => void;
}

const USERNAME_CLAIMS = ['subject', 'username', 'email'];
const PROMPTS = ['none', 'login', 'consent', 'select_account'];

/** Non-empty submit values; the username claim can only be set on create. */
export function openidSubmitData(values: FormValues, isEdit: boolean): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined || value === null || value === '') continue;
    if (isEdit && key === 'username-claim') continue;
    data[key] = value;
  }
  return data;
}

/** Add or edit an OpenID Connect realm. */
export function AuthEditOpenId(props: AuthEditOpenIdProps) {
  const isEdit = () => props.realm !== undefined;
  const baseUrl = () => props.baseUrl ?? '/access/domains';

  const loader = () => {
    const realm = props.realm;
    if (realm === undefined) return undefined;
    return async () => {
      const response = await AccessAPI.getDomain(realm, baseUrl());
      return Object.fromEntries(Object.entries(response.data).map(([key, value]) => [key, toFormValue(value)]));
    };
  };

  const submit = (form: FormContext) => {
    const data = openidSubmitData(form.snapshot(), isEdit());
    const realm = props.realm;
    if (realm !== undefined) return AccessAPI.updateDomain(realm, realmUpdateData(data, OPENID_DELETABLE_KEYS), baseUrl());
    if (props.sendType ?? baseUrl() === '/access/domains') data.type = 'openid';
    return AccessAPI.createDomain(data, baseUrl());
  };

  return (
    <EditWindow
      isOpen
      title={`${isEdit() ? 'Edit' : 'Add'}: OpenID Connect Server`}
      advancedCheckbox
      onClose={props.onClose}
      onDone={props.onDone}
      loader={loader()}
      onSubmit={submit}
    >
      {(form) => (
        <>
          <TextField form={form} name="issuer-url" label="Issuer URL" required wide />
          <TextField form={form} name="realm" label="Realm" required disabled={isEdit()} />
          <CheckboxField form={form} name="autocreate" label="Autocreate Users" />
          <CheckboxField form={form} name="default" label="Default Realm" />
          <TextField
            form={form}
            name="username-claim"
            label="Username Claim"
            suggestions={USERNAME_CLAIMS}
            placeholder="Default"
            disabled={isEdit()}
          />
          <TextField form={form} name="client-id" label="Client ID" required />
          <TextField form={form} name="scopes" label="Scopes" placeholder="Default (email profile)" />
          <TextField form={form} name="client-key" label="Client Key" />
          <TextField form={form} name="prompt" label="Prompt" suggestions={PROMPTS} placeholder="Auth-Provider Default" />
          <TextField form={form} name="comment" label="Comment" wide />
          <TextField form={form} name="acr-values" label="ACR Values" wide advanced />
        </>
      )}
    </EditWindow>
  );
}

export default AuthEditOpenId;
