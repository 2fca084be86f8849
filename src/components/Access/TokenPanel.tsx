import { Match, Show, Switch, createSignal } from 'solid-js';
import { AccessAPI, splitTokenId } from '@/api/access';
import { Button, RefreshButton } from '@/components/shared/Button';
import { ConfirmButton, RemoveButton } from '@/components/shared/ConfirmButton';
import { DataTable } from '@/components/shared/DataTable';
import type { DataTableColumn } from '@/components/shared/DataTable';
import { EditWindow } from '@/components/shared/EditWindow';
import { CheckboxField, DisplayField, TextField } from '@/components/shared/FormFields';
import type { FormContext, FormValues } from '@/components/shared/formContext';
import { toFormValue } from '@/components/shared/ObjectGrid';
import { Toolbar, ToolbarSeparator, ToolbarSpacer } from '@/components/shared/Toolbar';
import { createAlert } from '@/components/shared/AlertDialog';
import { POLLING_INTERVALS } from '@/constants';
import { useLoader } from '@/hooks/useLoader';
import type { ApiToken, TokenSecret } from '@/types/access';
import { renderBoolean } from '@/utils/format';
import { AuthidSelector } from './AuthidSelector';
import { PermissionDialog } from './PermissionPanel';
import { TokenSecretDialog } from './TokenSecretDialog';
import { compareExpire, expireText, expireToForm, tokenSubmitData } from './accessRows';

type TokenDialog = 'add' | 'edit' | 'permissions';

const tokenParts = (tokenid: string) => splitTokenId(tokenid) ?? { userid: tokenid, tokenname: '' };

const COLUMNS: DataTableColumn<ApiToken>[] = [
  {
    id: 'user',
    header: 'User',
    width: '200px',
    render: (token) => tokenParts(token.tokenid).userid,
    sorter: (a, b) => a.tokenid.localeCompare(b.tokenid),
  },
  { id: 'tokenname', header: 'Token name', width: '150px', render: (token) => tokenParts(token.tokenid).tokenname },
  { id: 'enable', header: 'Enable', width: '80px', render: (token) => renderBoolean(token.enable !== false) },
  {
    id: 'expire',
    header: 'Expire',
    width: '150px',
    render: (token) => expireText(token.expire),
    sorter: (a, b) => compareExpire(a.expire, b.expire),
  },
  { id: 'comment', header: 'Comment', flex: true, render: (token) => token.comment ?? '' },
];

export function TokenPanel() {
  const tokens = useLoader(() => AccessAPI.listTokens(), { interval: POLLING_INTERVALS.ACCESS_RELOAD, initialValue: [] });
  const [selected, setSelected] = createSignal<string | null>(null);
  const [dialog, setDialog] = createSignal<TokenDialog | null>(null);
  const [secret, setSecret] = createSignal<TokenSecret | null>(null);
  const alert = createAlert('TokenPanel');

  const selectedParts = () => {
    const tokenid = selected();
    return tokenid ? splitTokenId(tokenid) : null;
  };

  const close = () => setDialog(null);
  const done = () => void tokens.reload();

  const loadToken = async (): Promise<FormValues> => {
    const parts = selectedParts();
    if (!parts) throw new Error('no API token selected');
    const response = await AccessAPI.getToken(parts.userid, parts.tokenname);
    const data = expireToForm({ ...response.data, userid: parts.userid, tokenname: parts.tokenname });
    return Object.fromEntries(Object.entries(data).map(([key, value]) => [key, toFormValue(value)]));
  };

  const create = async (form: FormContext) => {
    const result = await AccessAPI.createToken(
      form.text('userid'),
      form.text('tokenname').trim(),
      tokenSubmitData(form.snapshot(), true),
    );
    setSecret(result);
  };

  const update = (form: FormContext) =>
    AccessAPI.updateToken(form.text('userid'), form.text('tokenname'), tokenSubmitData(form.snapshot(), false));

  const remove = async () => {
    const parts = selectedParts();
    if (!parts) return;
    try {
      await AccessAPI.deleteToken(parts.userid, parts.tokenname);
      setSelected(null);
    } catch (err) {
      alert.show('Unable to delete API token', err);
    }
    await tokens.reload();
  };

  const regenerate = async () => {
    const parts = selectedParts();
    if (!parts) return;
    try {
      setSecret(await AccessAPI.regenerateToken(parts.userid, parts.tokenname));
    } catch (err) {
      alert.show('Regenerate Secret failed', err);
    }
    await tokens.reload();
  };

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <Button size="sm" onClick={() => setDialog('add')}>
          Add
        </Button>
        <Button size="sm" disabled={!selectedParts()} onClick={() => setDialog('edit')}>
          Edit
        </Button>
        <RemoveButton size="sm" disabled={!selectedParts()} name={selected() ?? undefined} onActivate={() => void remove()} />
        <ConfirmButton
          size="sm"
          disabled={!selectedParts()}
          confirmMessage="Do you want to regenerate the secret of the selected API token? All current usage sites will lose access!"
          onActivate={() => void regenerate()}
        >
          Regenerate Secret
        </ConfirmButton>
        <ToolbarSeparator />
        <Button size="sm" disabled={!selectedParts()} onClick={() => setDialog('permissions')}>
          Show Permissions
        </Button>
        <ToolbarSpacer />
        <RefreshButton loading={tokens.loading()} onClick={() => void tokens.reload()} />
      </Toolbar>
      <Show when={tokens.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <DataTable
        class="min-h-0 flex-1"
        ariaLabel="API Tokens"
        columns={COLUMNS}
        rows={tokens.data() ?? []}
        getKey={(token) => token.tokenid}
        selectedKey={selected()}
        onSelect={(key) => setSelected(key)}
        onRowDblClick={() => setDialog('edit')}
        emptyText="No API tokens"
      />
      <Switch>
        <Match when={dialog() === 'add'}>
          <EditWindow isOpen title="Add: Token" onClose={close} onDone={done} initialValues={{ enable: true }} onSubmit={create}>
            {(form) => (
              <>
                <AuthidSelector form={form} name="userid" label="User" includeTokens={false} required />
                <TextField form={form} name="expire" label="Expire" type="datetime-local" placeholder="never" />
                <TextField form={form} name="tokenname" label="Token Name" required />
                <CheckboxField form={form} name="enable" label="Enabled" default />
                <TextField form={form} name="comment" label="Comment" wide />
              </>
            )}
          </EditWindow>
        </Match>
        <Match when={dialog() === 'edit'}>
          <EditWindow isOpen title="Edit: Token" onClose={close} onDone={done} loader={loadToken} onSubmit={update}>
            {(form) => (
              <>
                <DisplayField label="User" value={form.text('userid')} />
                <TextField form={form} name="expire" label="Expire" type="datetime-local" placeholder="never" />
                <DisplayField label="Token Name" value={form.text('tokenname')} />
                <CheckboxField form={form} name="enable" label="Enabled" default />
                <TextField form={form} name="comment" label="Comment" wide />
              </>
            )}
          </EditWindow>
        </Match>
        <Match when={dialog() === 'permissions' ? selected() : null}>
          {(tokenid) => <PermissionDialog authId={tokenid()} onClose={close} />}
        </Match>
      </Switch>
      <Show when={secret()}>{(value) => <TokenSecretDialog secret={value()} onClose={() => setSecret(null)} />}</Show>
      {alert.view()}
    </div>
  );
}

export default TokenPanel;
