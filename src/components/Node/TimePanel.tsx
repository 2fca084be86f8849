import { NodeAPI } from '@/api/node';
import { ObjectGrid } from '@/components/shared/ObjectGrid';
import type { ObjectGridRow } from '@/components/shared/ObjectGrid';
import { SelectField } from '@/components/shared/FormFields';
import type { FormContext } from '@/components/shared/formContext';
import { renderEpoch } from '@/utils/format';

const timezones = (): string[] => {
  const zones = Intl.supportedValuesOf('timeZone');
  return zones.includes('UTC') ? zones : ['UTC', ...zones];
};

/**
 * `localtime` is an epoch shifted into the server's zone; undo the browser
 * offset so the server's wall clock is shown.
 */
export function serverTimeText(localtime: unknown, now: Date = new Date()): string {
  if (typeof localtime !== 'number') return 'NaN';
  return renderEpoch(localtime + now.getTimezoneOffset() * 60);
}

function TimezoneSelector(props: { form: FormContext }) {
  return (
    <SelectField
      form={props.form}
      name="timezone"
      label="Time zone"
      required
      options={timezones().map((zone) => ({ value: zone, label: zone }))}
    />
  );
}

const ROWS: ObjectGridRow[] = [
  {
    name: 'timezone',
    header: 'Time zone',
    required: true,
    editor: (form) => <TimezoneSelector form={form} />,
  },
  { name: 'localtime', header: 'Server time', required: true, render: (value) => serverTimeText(value) },
];

export function TimePanel() {
  return (
    <ObjectGrid
      rows={ROWS}
      loader={async () => ({ ...(await NodeAPI.getTime()) })}
      onSubmit={(form) => NodeAPI.setTimezone(form.text('timezone'))}
    />
  );
}

export default TimePanel;
