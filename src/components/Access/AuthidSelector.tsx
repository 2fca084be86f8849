import { AccessAPI } from '@/api/access';
import { SelectField } from '@/components/shared/FormFields';
import type { FormContext } from '@/components/shared/formContext';
import { useLoader } from '@/hooks/useLoader';
import { authidList } from './accessRows';
import type { AuthidOptions } from './accessRows';

export interface AuthidSelectorProps extends AuthidOptions {
  form: FormContext;
  name: string;
  label: string;
  required?: boolean;
  disabled?: boolean;
}

/** User and/or API token id selector, loaded from `/access/users?include_tokens=1`. */
export function AuthidSelector(props: AuthidSelectorProps) {
  const ids = useLoader(
    async () =>
      authidList(await AccessAPI.listUsers(true), {
        includeUsers: props.includeUsers,
        includeTokens: props.includeTokens,
      }),
    { initialValue: [] },
  );

  return (
    <SelectField
      form={props.form}
      name={props.name}
      label={props.label}
      required={props.required}
      disabled={props.disabled}
      emptyText=""
      options={(ids.data() ?? []).map((id) => ({ value: id, label: id }))}
      help={ids.error() ?? undefined}
    />
  );
}

export default AuthidSelector;
