import { Match, Show, Switch, createSignal } from 'solid-js';
import { AccessAPI } from '@/api/access';
import { Button, RefreshButton } from '@/components/shared/Button';
import { RemoveButton } from '@/components/shared/ConfirmButton';
import { DataTable } from '@/components/shared/DataTable';
import type { DataTableColumn } from '@/components/shared/DataTable';
import { EditWindow } from '@/components/shared/EditWindow';
import { CheckboxField, DisplayField, SelectField, TextField } from '@/components/shared/FormFields';
import type { FormContext } from '@/components/shared/formContext';
import { toFormValue } from '@/components/shared/ObjectGrid';
import { Toolbar, ToolbarSeparator, ToolbarSpacer } from '@/components/shared/Toolbar';
import { createAlert } from '@/components/shared/AlertDialog';
import { useLoader } from '@/hooks/useLoader';
import type { UserWithTokens } from '@/types/access';
import { renderBoolean } from '@/utils/format';
import { PermissionDialog } from './PermissionPanel';
import {
  compareExpire,
  expireText,
  expireToForm,
  passwordMismatch,
  splitUserRealm,
  tfaLockText,
  userCreateData,
  userFullName,
  userUpdateData,
} from './accessRows';

type UserDialog = 'add' | 'edit' | 'password' | 'permissions';

const COLUMNS: DataTableColumn<UserWithTokens>[] = [
  {
    id: 'username',
    header: 'User name',
    width: '200px',
    render: (user) => splitUserRealm(user.userid).username,
    sorter: (a, b) => a.userid.localeCompare(b.userid),
  },
  { id: 'realm', header: 'Realm', width: '100px', render: (user) => splitUserRealm(user.userid).realm },
  { id: 'enable', header: 'Enabled', width: '80px', render: (user) => renderBoolean(user.enable !== false) },
  {
    id: 'expire',
    header: 'Expire',
    width: '150px',
    render: (user) => expireText(user.expire),
    sorter: (a, b) => compareExpire(a.expire, b.expire),
  },
  {
    id: 'name',
    header: 'Name',
    flex: true,
    render: (user) => userFullName(user),
    sorter: (a, b) => userFullName(a).localeCompare(userFullName(b)),
  },
  { id: 'tfa-lock', header: 'TFA lock', width: '150px', render: (user) => tfaLockText(user) },
  { id: 'comment', header: 'Comment', flex: true, render: (user) => user.comment ?? '' },
];

function UserFields(props: { form: FormContext; create: boolean; realms?: readonly string[] }) {
  return (
    <>
      <Show
        when={props.create}
        fallback={<DisplayField label="User name" value={props.form.text('userid')} />}
      >
        <TextField form={props.form} name="username" label="User name" required autofocus />
        <Show when={props.realms} fallback={<TextField form={props.form} name="realm" label="Realm" required />}>
          {(realms) => (
            <SelectField
              form={props.form}
              name="realm"
              label="Realm"
              required
              options={realms().map((realm) => ({ value: realm, label: realm }))}
            />
          )}
        </Show>
        <TextField form={props.form} name="password" label="Password" type="password" />
        <TextField form={props.form} name="confirm_password" label="Confirm password" type="password" />
      </Show>
      <TextField form={props.form} name="expire" label="Expire" type="datetime-local" placeholder="never" />
      <CheckboxField form={props.form} name="enable" label="Enabled" default />
      <TextField form={props.form} name="firstname" label="First name" />
      <TextField form={props.form} name="lastname" label="Last name" />
      <TextField form={props.form} name="email" label="EMail" type="email" />
      <TextField form={props.form} name="comment" label="Comment" wide />
    </>
  );
}

export interface UserPanelProps {
  /** Realms offered when adding a user; a free text field otherwise. */
  realms?: readonly string[];
}

export function UserPanel(props: UserPanelProps) {
  const users = useLoader(() => AccessAPI.listUsers(), { initialValue: [] });
  const [selected, setSelected] = createSignal<string | null>(null);
  const [dialog, setDialog] = createSignal<UserDialog | null>(null);
  const alert = createAlert('UserPanel');

  const selectedUser = () => users.data()?.find((user) => user.userid === selected());
  const selectedLocked = () => {
    const user = selectedUser();
    return user !== undefined && tfaLockText(user) !== '';
  };

  const close = () => setDialog(null);
  const done = () => void users.reload();

  const loadUser = async () => {
    const userid = selected() ?? '';
    const response = await AccessAPI.getUser(userid);
    const data: Record<string, unknown> = expireToForm({ ...response.data });
    return Object.fromEntries(Object.entries(data).map(([key, value]) => [key, toFormValue(value)]));
  };

  const remove = async () => {
    const userid = selected();
    if (!userid) return;
    try {
      await AccessAPI.deleteUser(userid);
      setSelected(null);
    } catch (err) {
      alert.show('Unable to delete user', err);
    }
    await users.reload();
  };

  const unlockTfa = async () => {
    const userid = selected();
    if (!userid) return;
    try {
      await AccessAPI.unlockTfa(userid);
    } catch (err) {
      alert.show('Unlock TFA failed', err);
    }
    await users.reload();
  };

  const submitCreate = (form: FormContext) => AccessAPI.createUser(userCreateData(form.snapshot()));
  const submitUpdate = (form: FormContext) => AccessAPI.updateUser(form.text('userid'), userUpdateData(form.snapshot()));
  const submitPassword = (form: FormContext) => AccessAPI.changePassword(selected() ?? '', form.text('password'));

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <Button size="sm" onClick={() => setDialog('add')}>
          Add
        </Button>
        <Button size="sm" disabled={!selectedUser()} onClick={() => setDialog('edit')}>
          Edit
        </Button>
        <RemoveButton size="sm" disabled={!selectedUser()} name={selected() ?? undefined} onActivate={() => void remove()} />
        <ToolbarSeparator />
        <Button size="sm" disabled={!selectedUser()} onClick={() => setDialog('password')}>
          Change Password
        </Button>
        <Button size="sm" disabled={!selectedUser()} onClick={() => setDialog('permissions')}>
          Show Permissions
        </Button>
        <Button size="sm" disabled={!selectedLocked()} onClick={() => void unlockTfa()}>
          Unlock TFA
        </Button>
        <ToolbarSpacer />
        <RefreshButton loading={users.loading()} onClick={() => void users.reload()} />
      </Toolbar>
      <Show when={users.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <DataTable
        class="min-h-0 flex-1"
        ariaLabel="Users"
        columns={COLUMNS}
        rows={users.data() ?? []}
        getKey={(user) => user.userid}
        selectedKey={selected()}
        onSelect={(key) => setSelected(key)}
        onRowDblClick={() => setDialog('edit')}
        emptyText="No users"
      />
      <Switch>
        <Match when={dialog() === 'add'}>
          <EditWindow
            isOpen
            title="Add: User"
            onClose={close}
            onDone={done}
            initialValues={{ enable: true, realm: props.realms?.[0] ?? '' }}
            validate={(form) => passwordMismatch(form.values)}
            onSubmit={submitCreate}
          >
            {(form) => <UserFields form={form} create realms={props.realms} />}
          </EditWindow>
        </Match>
        <Match when={dialog() === 'edit'}>
          <EditWindow isOpen title="Edit: User" onClose={close} onDone={done} loader={loadUser} onSubmit={submitUpdate}>
            {(form) => <UserFields form={form} create={false} />}
          </EditWindow>
        </Match>
        <Match when={dialog() === 'password'}>
          <EditWindow
            isOpen
            title="Change Password"
            onClose={close}
            onDone={done}
            submitText="OK"
            validate={(form) => passwordMismatch(form.values)}
            onSubmit={submitPassword}
          >
            {(form) => (
              <>
                <DisplayField label="User name" value={selected() ?? ''} wide />
                <TextField form={form} name="password" label="Password" type="password" required autofocus />
                <TextField form={form} name="confirm_password" label="Confirm password" type="password" required />
              </>
            )}
          </EditWindow>
        </Match>
        <Match when={dialog() === 'permissions' ? selected() : null}>
          {(userid) => <PermissionDialog authId={userid()} onClose={close} />}
        </Match>
      </Switch>
      {alert.view()}
    </div>
  );
}

export default UserPanel;
