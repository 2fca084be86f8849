import { AccessAPI } from '@/api/access';
import { SelectField } from '@/components/shared/FormFields';
import type { FormContext } from '@/components/shared/formContext';
import { useLoader } from '@/hooks/useLoader';
import { roleLabel, sortRoles } from './accessRows';

export interface RoleSelectorProps {
  form: FormContext;
  name: string;
  label: string;
  required?: boolean;
}

export function RoleSelector(props: RoleSelectorProps) {
  const roles = useLoader(async () => sortRoles(await AccessAPI.listRoles()), { initialValue: [] });

  return (
    <SelectField
      form={props.form}
      name={props.name}
      label={props.label}
      required={props.required}
      emptyText=""
      options={(roles.data() ?? []).map((role) => ({ value: role.roleid, label: roleLabel(role) }))}
      help={roles.error() ?? undefined}
    />
  );
}

export default RoleSelector;
