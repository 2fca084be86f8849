import { Show, createSignal } from 'solid-js';
import { AccessAPI } from '@/api/access';
import { EditWindow } from '@/components/shared/EditWindow';
import { CheckboxField, NumberField, SelectField, TextField } from '@/components/shared/FormFields';
import type { FormContext } from '@/components/shared/formContext';
import { toFormValue } from '@/components/shared/ObjectGrid';
import { TabPanel } from '@/components/shared/TabPanel';
import { inputPanel } from '@/components/shared/Form';
import { LDAP_DELETABLE_KEYS, LDAP_MODES, ldapConfigToForm, ldapFormToConfig, realmUpdateData } from '@/utils/authRealm';

export interface AuthEditLdapProps {
  /** Edit this realm; a new one is created otherwise. */
  realm?: string;
  /** Active Directory instead of a generic LDAP server. */
  adRealm?: boolean;
  baseUrl?: string;
  /** Add `type` to the create request (needed by `/access/domains`). */
  sendType?: boolean;
  onClose: () => void;
  onDone?: () => void;
}

const tlsMode = (mode: string) => mode === 'ldap+starttls' || mode === 'ldaps';

function GeneralFields(props: { form: FormContext; isEdit: boolean; adRealm: boolean }) {
  const anonymous = () => props.form.checked('anonymous_search', true);

  return (
    <>
      <TextField form={props.form} name="realm" label="Realm" required disabled={props.isEdit} />
      <TextField form={props.form} name="server1" label="Server" required />
      <CheckboxField form={props.form} name="default" label="Default Realm" />
      <TextField form={props.form} name="server2" label="Fallback Server" />
      <Show when={!props.adRealm}>
        <TextField form={props.form} name="base-dn" label="Base Domain Name" required placeholder="cn=Users,dc=company,dc=net" />
        <TextField form={props.form} name="user-attr" label="User Attribute Name" required placeholder="uid / sAMAccountName" />
      </Show>
      <NumberField form={props.form} name="port" label="Port" placeholder="Default" min={1} max={65535} />
      <SelectField form={props.form} name="mode" label="Mode" required options={LDAP_MODES} />
      <CheckboxField form={props.form} name="anonymous_search" label="Anonymous Search" default />
      <CheckboxField form={props.form} name="verify" label="Verify Certificate" disabled={!tlsMode(props.form.text('mode'))} />
      <TextField
        form={props.form}
        name="bind-dn"
        label="Bind Domain Name"
        required={!anonymous()}
        disabled={anonymous()}
        placeholder={props.adRealm ? 'user@company.net' : 'cn=user,dc=company,dc=net'}
      />
      <TextField
        form={props.form}
        name="password"
        label="Bind Password"
        type="password"
        disabled={anonymous()}
        placeholder={props.isEdit ? 'Unchanged' : undefined}
      />
      <TextField form={props.form} name="comment" label="Comment" wide />
    </>
  );
}

function SyncFields(props: { form: FormContext }) {
  return (
    <>
      <TextField form={props.form} name="firstname" label="First Name attribute" />
      <TextField form={props.form} name="user-classes" label="User classes" placeholder="inetorgperson, posixaccount, person, user" />
      <TextField form={props.form} name="lastname" label="Last Name attribute" />
      <TextField form={props.form} name="filter" label="User Filter" />
      <TextField form={props.form} name="email" label="E-Mail attribute" />
      <h4 class="sm:col-span-2 mt-2 text-sm font-medium text-gray-800 dark:text-gray-200">Default Sync Options</h4>
      <SelectField
        form={props.form}
        name="enable-new"
        label="Enable new users"
        emptyText="Default (Yes)"
        options={[
          { value: 'true', label: 'Yes' },
          { value: 'false', label: 'No' },
        ]}
      />
      <h4 class="sm:col-span-2 mt-2 text-sm font-medium text-gray-800 dark:text-gray-200">Remove Vanished Options</h4>
      <CheckboxField form={props.form} name="remove-vanished-acl" label="Remove ACLs of vanished users" />
      <CheckboxField form={props.form} name="remove-vanished-entry" label="Remove vanished user" />
      <CheckboxField form={props.form} name="remove-vanished-properties" label="Remove vanished properties" />
    </>
  );
}

/** Add or edit a LDAP or Active Directory realm. */
export function AuthEditLdap(props: AuthEditLdapProps) {
  const [tab, setTab] = createSignal('general');
  const isEdit = () => props.realm !== undefined;
  const baseUrl = () => props.baseUrl ?? '/access/domains';
  const title = () => `${isEdit() ? 'Edit' : 'Add'}: ${props.adRealm ? 'Active Directory Server' : 'LDAP Server'}`;

  const loader = () => {
    const realm = props.realm;
    if (realm === undefined) return undefined;
    return async () => {
      const response = await AccessAPI.getDomain(realm, baseUrl());
      const values = ldapConfigToForm(response.data);
      return Object.fromEntries(Object.entries(values).map(([key, value]) => [key, toFormValue(value)]));
    };
  };

  const submit = (form: FormContext) => {
    const data = ldapFormToConfig(form.snapshot());
    const realm = props.realm;
    if (realm !== undefined) return AccessAPI.updateDomain(realm, realmUpdateData(data, LDAP_DELETABLE_KEYS), baseUrl());
    if (props.sendType ?? baseUrl() === '/access/domains') data.type = props.adRealm ? 'ad' : 'ldap';
    return AccessAPI.createDomain(data, baseUrl());
  };

  return (
    <EditWindow
      isOpen
      title={title()}
      onClose={props.onClose}
      onDone={props.onDone}
      loader={loader()}
      initialValues={{ mode: 'ldap', anonymous_search: true }}
      onSubmit={submit}
      panelClass="max-w-3xl"
    >
      {(form) => (
        <div class="sm:col-span-2 -m-4">
          <TabPanel
            active={tab()}
            onChange={setTab}
            tabs={[
              {
                id: 'general',
                label: 'General',
                render: () => (
                  <div class={inputPanel}>
                    <GeneralFields form={form} isEdit={isEdit()} adRealm={props.adRealm ?? false} />
                  </div>
                ),
              },
              {
                id: 'sync',
                label: 'Sync Options',
                render: () => (
                  <div class={inputPanel}>
                    <SyncFields form={form} />
                  </div>
                ),
              },
            ]}
          />
        </div>
      )}
    </EditWindow>
  );
}

export default AuthEditLdap;
