import { Show } from 'solid-js';
import type { JSX } from 'solid-js';
import { AccessAPI } from '@/api/access';
import { EditWindow } from '@/components/shared/EditWindow';
import { CheckboxField, TextField } from '@/components/shared/FormFields';
import type { FormContext } from '@/components/shared/formContext';
import type { AclUpdate } from '@/types/access';
import { AuthidSelector } from './AuthidSelector';
import { RoleSelector } from './RoleSelector';

export type AclEditKind = 'user' | 'token' | 'group';

export const ACL_EDIT_TITLES: Record<AclEditKind, string> = {
  user: 'User Permission',
  token: 'API Token Permission',
  group: 'Group Permission',
};

export interface AclEditProps {
  kind: AclEditKind;
  onClose: () => void;
  onDone?: () => void;
  /** Custom path field; a text field named `path` otherwise. */
  pathField?: (form: FormContext) => JSX.Element;
  defaultPath?: string;
}

/** The request data for an ACL entry from the edit form. */
export function aclUpdateFromForm(kind: AclEditKind, form: FormContext): AclUpdate {
  const update: AclUpdate = {
    path: form.text('path').trim(),
    role: form.text('role'),
    propagate: form.checked('propagate', true),
  };
  if (kind === 'group') update.group = form.text('group').trim();
  else update['auth-id'] = form.text('auth-id');
  return update;
}

export function AclEdit(props: AclEditProps) {
  return (
    <EditWindow
      isOpen
      title={ACL_EDIT_TITLES[props.kind]}
      onClose={props.onClose}
      onDone={props.onDone}
      initialValues={{ path: props.defaultPath ?? '', propagate: true }}
      onSubmit={(form) => AccessAPI.updateAcl(aclUpdateFromForm(props.kind, form))}
    >
      {(form) => (
        <>
          <Show when={props.pathField} fallback={<TextField form={form} name="path" label="Path" required />}>
            {(field) => field()(form)}
          </Show>
          <Show when={props.kind === 'group'}>
            <TextField form={form} name="group" label="Group" required />
          </Show>
          <Show when={props.kind !== 'group'}>
            <AuthidSelector
              form={form}
              name="auth-id"
              label={props.kind === 'token' ? 'API Token' : 'User'}
              includeUsers={props.kind === 'user'}
              includeTokens={props.kind === 'token'}
              required
            />
          </Show>
          <RoleSelector form={form} name="role" label="Role" required />
          <CheckboxField form={form} name="propagate" label="Propagate" default />
        </>
      )}
    </EditWindow>
  );
}

export default AclEdit;
