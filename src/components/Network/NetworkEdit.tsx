import { Show } from 'solid-js';
import { NodeAPI } from '@/api/node';
import { EditWindow } from '@/components/shared/EditWindow';
import { CheckboxField, NumberField, SelectField, TextField } from '@/components/shared/FormFields';
import type { FormContext, FormValues } from '@/components/shared/formContext';
import { toFormValue } from '@/components/shared/ObjectGrid';
import type { RequestData } from '@/types/api';
import type { NetworkInterfaceType } from '@/types/network';
import {
  BOND_MODES,
  XMIT_HASH_POLICIES,
  allowBondPrimary,
  allowXmitHashPolicy,
  createInterfaceData,
  formatBondMode,
  formatNetworkInterfaceType,
  interfaceToFormValues,
  updateInterfaceData,
  validateCidrV4,
  validateCidrV6,
  validateIpV4,
  validateIpV6,
} from '@/utils/network';

export interface NetworkEditProps {
  interfaceType: NetworkInterfaceType;
  /** Edit this interface; create a new one when unset. */
  name?: string;
  /** Suggested name in create mode. */
  defaultName?: string;
  onClose: () => void;
  onDone?: () => void;
}

const PORTS_HELP = 'Space-separated list of interfaces, for example: enp0s0 enp1s0';

/** Values sent to the server; fields the bond mode disables are dropped. */
export function networkSubmitData(values: FormValues, type: NetworkInterfaceType, create: boolean): RequestData {
  const data: RequestData = {};
  for (const [key, value] of Object.entries(values)) {
    if (create && key !== 'comments' && (value === '' || value === undefined || value === null)) continue;
    data[key] = value;
  }
  if (type === 'bond') {
    const mode = typeof values.bond_mode === 'string' ? values.bond_mode : '';
    if (!allowXmitHashPolicy(mode)) delete data.bond_xmit_hash_policy;
    if (!allowBondPrimary(mode)) delete data['bond-primary'];
  }
  if (create) return createInterfaceData(data, type);

  const { name: _name, ...rest } = data;
  return updateInterfaceData(rest);
}

function AddressFields(props: { form: FormContext }) {
  return (
    <>
      <TextField form={props.form} name="cidr" label="IPv4/CIDR" validate={validateCidrV4} />
      <TextField form={props.form} name="gateway" label="Gateway (IPv4)" validate={validateIpV4} />
      <TextField form={props.form} name="cidr6" label="IPv6/CIDR" validate={validateCidrV6} />
      <TextField form={props.form} name="gateway6" label="Gateway (IPv6)" validate={validateIpV6} />
    </>
  );
}

function NetworkFields(props: { form: FormContext; type: NetworkInterfaceType; isEdit: boolean }) {
  const mode = () => props.form.text('bond_mode');
  const nameHelp = () =>
    props.type === 'bridge' ? 'For example, vmbr0, vmbr0.100, vmbr1, ...' : props.type === 'bond' ? 'For example, bond0, bond0.100, bond1, ...' : undefined;

  return (
    <>
      <TextField form={props.form} name="name" label="Name" required disabled={props.isEdit} help={nameHelp()} />
      <CheckboxField form={props.form} name="autostart" label="Autostart" />
      <AddressFields form={props.form} />
      <Show when={props.type === 'bridge'}>
        <CheckboxField form={props.form} name="bridge_vlan_aware" label="VLAN aware" />
        <TextField form={props.form} name="bridge_ports" label="Bridge ports" help={PORTS_HELP} />
      </Show>
      <Show when={props.type === 'bond'}>
        <TextField form={props.form} name="slaves" label="Slaves" help={PORTS_HELP} />
        <SelectField
          form={props.form}
          name="bond_mode"
          label="Mode"
          options={BOND_MODES.map((value) => ({ value, label: formatBondMode(value) }))}
        />
        <SelectField
          form={props.form}
          name="bond_xmit_hash_policy"
          label="Hash policy"
          emptyText=""
          disabled={!allowXmitHashPolicy(mode())}
          options={XMIT_HASH_POLICIES.map((value) => ({ value, label: value }))}
        />
        <TextField form={props.form} name="bond-primary" label="bond-primary" disabled={!allowBondPrimary(mode())} />
      </Show>
      <TextField form={props.form} name="comments" label="Comment" />
      <NumberField form={props.form} name="mtu" label="MTU" min={1} placeholder="1500" advanced />
    </>
  );
}

/** Create or edit a bridge, bond or plain interface. */
export function NetworkEdit(props: NetworkEditProps) {
  const isEdit = () => props.name !== undefined;
  const typeText = () => formatNetworkInterfaceType(props.interfaceType);

  const load = async (): Promise<FormValues> => {
    const name = props.name;
    if (name === undefined) return {};
    const data = interfaceToFormValues(await NodeAPI.getInterface(name));
    return Object.fromEntries(Object.entries(data).map(([key, value]) => [key, toFormValue(value)]));
  };

  const submit = (form: FormContext) => {
    const data = networkSubmitData(form.snapshot(), props.interfaceType, !isEdit());
    const name = props.name;
    return name === undefined ? NodeAPI.createInterface(data) : NodeAPI.updateInterface(name, data);
  };

  return (
    <EditWindow
      isOpen
      title={`${isEdit() ? 'Edit' : 'Create'}: ${typeText()}`}
      advancedCheckbox
      loader={isEdit() ? load : undefined}
      initialValues={
        isEdit()
          ? undefined
          : {
              name: props.defaultName,
              autostart: true,
              ...(props.interfaceType === 'bond' ? { bond_mode: 'balance-rr' } : {}),
            }
      }
      onClose={props.onClose}
      onDone={props.onDone}
      onSubmit={submit}
    >
      {(form) => <NetworkFields form={form} type={props.interfaceType} isEdit={isEdit()} />}
    </EditWindow>
  );
}

export default NetworkEdit;
