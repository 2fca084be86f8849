import { For, Match, Show, Switch, createSignal } from 'solid-js';
import { AcmeAPI } from '@/api/acme';
import { AlertDialog, createAlert } from '@/components/shared/AlertDialog';
import { Button, RefreshButton } from '@/components/shared/Button';
import { ConfirmButton } from '@/components/shared/ConfirmButton';
import { DataTable } from '@/components/shared/DataTable';
import type { DataTableColumn } from '@/components/shared/DataTable';
import { Dialog } from '@/components/shared/Dialog';
import { EditWindow } from '@/components/shared/EditWindow';
import { TextAreaField } from '@/components/shared/FormFields';
import type { FormContext } from '@/components/shared/formContext';
import { KVGrid } from '@/components/shared/KVGrid';
import type { KVRow } from '@/components/shared/KVGrid';
import { Toolbar, ToolbarSpacer } from '@/components/shared/Toolbar';
import { useLoader } from '@/hooks/useLoader';
import type { CertificateInfo } from '@/types/acme';
import { renderEpoch } from '@/utils/format';
import { logger } from '@/utils/logger';

export interface CertificateListProps {
  /** File name of the custom certificate on the node. */
  customFile?: string;
}

type CertificateDialog = 'upload' | 'view' | 'reload';

export const RELOAD_MESSAGE = 'API server will be restarted to use new certificates, please reload web-interface!';

const renderDate = (value: unknown) => (typeof value === 'number' ? renderEpoch(value) : '');
const renderSan = (value: unknown) => (Array.isArray(value) ? value.join(', ') : '');

const COLUMNS: DataTableColumn<CertificateInfo>[] = [
  { id: 'filename', header: 'File', width: '150px', render: (cert) => cert.filename },
  { id: 'issuer', header: 'Issuer', width: '200px', render: (cert) => cert.issuer },
  { id: 'subject', header: 'Subject', width: '200px', render: (cert) => cert.subject },
  { id: 'public-key-type', header: 'Public Key Algorithm', width: '150px', render: (cert) => cert['public-key-type'] },
  { id: 'public-key-bits', header: 'Public Key Size', width: '100px', align: 'right', render: (cert) => cert['public-key-bits'] ?? '' },
  { id: 'notbefore', header: 'Valid Since', width: '170px', render: (cert) => renderDate(cert.notbefore) },
  { id: 'notafter', header: 'Expires', width: '170px', render: (cert) => renderDate(cert.notafter) },
  { id: 'san', header: 'Subject Alternative Names', flex: true, render: (cert) => renderSan(cert.san) },
  { id: 'fingerprint', header: 'Fingerprint', width: '200px', render: (cert) => cert.fingerprint ?? '' },
];

const DETAIL_ROWS: KVRow[] = [
  { name: 'filename', header: 'File' },
  { name: 'fingerprint', header: 'Fingerprint' },
  { name: 'issuer', header: 'Issuer' },
  { name: 'subject', header: 'Subject' },
  { name: 'public-key-type', header: 'Public Key Algorithm' },
  { name: 'public-key-bits', header: 'Public Key Size' },
  { name: 'notbefore', header: 'Valid Since', render: renderDate },
  { name: 'notafter', header: 'Expires', render: renderDate },
  {
    name: 'san',
    header: 'Subject Alternative Names',
    render: (value) => (
      <ul>
        <For each={Array.isArray(value) ? value.map(String) : []}>{(name) => <li>{name}</li>}</For>
      </ul>
    ),
  },
  { name: 'pem', header: 'Certificate', render: (value) => <pre class="whitespace-pre text-xs">{String(value)}</pre> },
];

/** Load a text file into a form field. */
function FileButton(props: { form: FormContext; name: string }) {
  let input: HTMLInputElement | undefined;

  const load = async (file: File | undefined) => {
    if (!file) return;
    try {
      props.form.set(props.name, await file.text());
    } catch (err) {
      logger.error('[CertificateList] Failed to read file', err);
    }
  };

  return (
    <>
      <input
        ref={(el) => (input = el)}
        type="file"
        class="hidden"
        onChange={(event) => void load(event.currentTarget.files?.[0])}
      />
      <Button size="sm" onClick={() => input?.click()}>
        From File
      </Button>
    </>
  );
}

export function CertificateList(props: CertificateListProps) {
  const certificates = useLoader(() => AcmeAPI.certificateInfo(), { initialValue: [] });
  const [selected, setSelected] = createSignal<string | null>(null);
  const [dialog, setDialog] = createSignal<CertificateDialog | null>(null);
  const alert = createAlert('CertificateList');
  const customFile = () => props.customFile ?? 'proxy.pem';

  const selectedCert = () => certificates.data()?.find((cert) => cert.filename === selected());
  const close = () => setDialog(null);

  const upload = async (form: FormContext) => {
    await AcmeAPI.uploadCustomCertificate(form.text('certificates'), form.text('key').trim() || undefined);
  };

  const deleteCustom = async () => {
    try {
      await AcmeAPI.deleteCustomCertificate();
      setDialog('reload');
    } catch (err) {
      alert.show('Error', err);
    }
    await certificates.reload();
  };

  return (
    <div class="flex h-full flex-col">
      <Toolbar>
        <Button size="sm" onClick={() => setDialog('upload')}>
          Upload Custom Certificate
        </Button>
        <ConfirmButton
          size="sm"
          confirmMessage={`Are you sure you want to remove the certificate used for ${customFile()}`}
          onActivate={() => void deleteCustom()}
        >
          Delete Custom Certificate
        </ConfirmButton>
        <Button size="sm" disabled={!selectedCert()} onClick={() => setDialog('view')}>
          View Certificate
        </Button>
        <ToolbarSpacer />
        <RefreshButton loading={certificates.loading()} onClick={() => void certificates.reload()} />
      </Toolbar>
      <Show when={certificates.error()}>
        {(message) => <div role="alert" class="m-2 rounded bg-red-50 p-2 text-sm text-red-800">{message()}</div>}
      </Show>
      <DataTable
        class="min-h-0 flex-1"
        ariaLabel="Certificates"
        columns={COLUMNS}
        rows={certificates.data() ?? []}
        getKey={(cert) => cert.filename}
        selectedKey={selected()}
        onSelect={(key) => setSelected(key)}
        onRowDblClick={() => setDialog('view')}
        emptyText="No certificates"
      />
      <Switch>
        <Match when={dialog() === 'upload'}>
          <EditWindow
            isOpen
            title="Upload Custom Certificate"
            submitText="Upload"
            onClose={() => {
              if (dialog() === 'upload') close();
            }}
            onDone={() => {
              setDialog('reload');
              void certificates.reload();
            }}
            onSubmit={upload}
          >
            {(form) => (
              <>
                <TextAreaField form={form} name="key" label="Private Key (Optional)" placeholder="No change" mono wide />
                <div class="sm:col-span-2">
                  <FileButton form={form} name="key" />
                </div>
                <TextAreaField form={form} name="certificates" label="Certificate Chain" required mono wide rows={8} />
                <div class="sm:col-span-2">
                  <FileButton form={form} name="certificates" />
                </div>
              </>
            )}
          </EditWindow>
        </Match>
        <Match when={dialog() === 'view' && selectedCert()}>
          {(cert) => (
            <Dialog isOpen title="Certificate" onClose={close} panelClass="max-w-3xl">
              <KVGrid rows={DETAIL_ROWS} data={{ ...cert() }} />
            </Dialog>
          )}
        </Match>
        <Match when={dialog() === 'reload'}>
          <AlertDialog isOpen title="Please Reload" message={RELOAD_MESSAGE} onClose={close} />
        </Match>
      </Switch>
      {alert.view()}
    </div>
  );
}

export default CertificateList;
