import { TfaAPI } from '@/api/tfa';
import { EditWindow } from '@/components/shared/EditWindow';
import { CheckboxField, DisplayField, TextField } from '@/components/shared/FormFields';
import type { FormContext, FormValues } from '@/components/shared/formContext';

export interface TfaEditProps {
  userid: string;
  entryId: string;
  baseUrl?: string;
  onClose: () => void;
  onDone?: () => void;
}

/** Change description and enabled state of a TFA entry. */
export function TfaEdit(props: TfaEditProps) {
  const load = async (): Promise<FormValues> => {
    const { data } = await TfaAPI.get(props.userid, props.entryId, props.baseUrl);
    return { description: data.description, enable: data.enable };
  };

  const submit = (form: FormContext) =>
    TfaAPI.update(
      props.userid,
      props.entryId,
      {
        description: form.text('description').trim(),
        enable: form.checked('enable', true),
        password: form.text('password') || undefined,
      },
      props.baseUrl,
    );

  return (
    <EditWindow isOpen title="Edit: TFA Entry" loader={load} onClose={props.onClose} onDone={props.onDone} onSubmit={submit}>
      {(form) => (
        <>
          <DisplayField label="User" value={props.userid} />
          <TextField form={form} name="description" label="Description" required />
          <CheckboxField form={form} name="enable" label="Enabled" />
          <TextField form={form} name="password" label="Password" type="password" />
        </>
      )}
    </EditWindow>
  );
}

export default TfaEdit;
