import { AcmeAPI } from '@/api/acme';
import { SelectField } from '@/components/shared/FormFields';
import type { FormContext } from '@/components/shared/formContext';
import { useLoader } from '@/hooks/useLoader';

interface SelectorProps {
  form: FormContext;
  name: string;
  label: string;
  required?: boolean;
  url?: string;
}

/** ACME directories; the value is the directory URL. */
export function AcmeDirectorySelector(props: SelectorProps) {
  const directories = useLoader(() => AcmeAPI.listDirectories(props.url), { initialValue: [] });

  return (
    <SelectField
      form={props.form}
      name={props.name}
      label={props.label}
      required={props.required}
      emptyText=""
      options={(directories.data() ?? []).map((dir) => ({ value: dir.url, label: `${dir.name} (${dir.url})` }))}
      help={directories.error() ?? undefined}
    />
  );
}

export function AcmeAccountSelector(props: SelectorProps) {
  const accounts = useLoader(() => AcmeAPI.listAccounts(props.url), { initialValue: [] });

  return (
    <SelectField
      form={props.form}
      name={props.name}
      label={props.label}
      required={props.required}
      emptyText=""
      options={(accounts.data() ?? []).map((account) => ({ value: account.name, label: account.name }))}
      help={accounts.error() ?? undefined}
    />
  );
}

/** DNS plugins only; standalone validation needs no plugin entry. */
export function AcmePluginSelector(props: SelectorProps) {
  const plugins = useLoader(
    async () => (await AcmeAPI.listPlugins(props.url)).filter((plugin) => plugin.type === 'dns'),
    { initialValue: [] },
  );

  return (
    <SelectField
      form={props.form}
      name={props.name}
      label={props.label}
      required={props.required}
      emptyText=""
      options={(plugins.data() ?? []).map((plugin) => ({
        value: plugin.plugin,
        label: plugin.api ? `${plugin.plugin} (${plugin.api})` : plugin.plugin,
      }))}
      help={plugins.error() ?? undefined}
    />
  );
}

export const CHALLENGE_TYPES = [
  { value: 'HTTP', label: 'HTTP' },
  { value: 'DNS', label: 'DNS' },
] as const;

export function AcmeChallengeTypeSelector(props: Omit<SelectorProps, 'url'>) {
  return (
    <SelectField
      form={props.form}
      name={props.name}
      label={props.label}
      required={props.required}
      options={CHALLENGE_TYPES}
    />
  );
}
