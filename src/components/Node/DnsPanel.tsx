import { NodeAPI } from '@/api/node';
import { ObjectGrid } from '@/components/shared/ObjectGrid';
import type { ObjectGridRow } from '@/components/shared/ObjectGrid';
import { TextField } from '@/components/shared/FormFields';
import type { FormContext, FormValues } from '@/components/shared/formContext';
import type { KVRecord } from '@/components/shared/KVGrid';
import { deleteEmptyValues } from '@/utils/forms';
import { validateIpV4OrV6 } from '@/utils/network';

const DNS_KEYS = ['search', 'dns1', 'dns2', 'dns3', 'digest'] as const;

const text = (value: unknown) => (typeof value === 'string' ? value : '');

/** All DNS rows share one editor holding every value. */
export function dnsEditValues(data: KVRecord): FormValues {
  return Object.fromEntries(DNS_KEYS.map((key) => [key, text(data[key])]));
}

export function dnsSubmitData(values: FormValues): Record<string, unknown> {
  return deleteEmptyValues({ ...values }, ['dns1', 'dns2', 'dns3'], true);
}

function DnsEditor(props: { form: FormContext }) {
  return (
    <>
      <TextField form={props.form} name="search" label="Search domain" required autofocus />
      <TextField form={props.form} name="dns1" label="DNS server 1" required validate={validateIpV4OrV6} />
      <TextField form={props.form} name="dns2" label="DNS server 2" validate={validateIpV4OrV6} />
      <TextField form={props.form} name="dns3" label="DNS server 3" validate={validateIpV4OrV6} />
    </>
  );
}

const editor = (form: FormContext) => <DnsEditor form={form} />;

const ROWS: ObjectGridRow[] = [
  { name: 'search', header: 'Search domain', required: true, editor, editorTitle: 'Edit: DNS', editValues: dnsEditValues },
  { name: 'dns1', header: 'DNS server 1', required: true, editor, editorTitle: 'Edit: DNS', editValues: dnsEditValues },
  { name: 'dns2', header: 'DNS server 2', editor, editorTitle: 'Edit: DNS', editValues: dnsEditValues },
  { name: 'dns3', header: 'DNS server 3', editor, editorTitle: 'Edit: DNS', editValues: dnsEditValues },
];

export function DnsPanel() {
  return (
    <ObjectGrid
      rows={ROWS}
      loader={async () => ({ ...(await NodeAPI.getDns()) })}
      onSubmit={(form) => NodeAPI.updateDns(dnsSubmitData(form.snapshot()))}
    />
  );
}

export default DnsPanel;
