import CalendarClockIcon from 'lucide-solid/icons/calendar-clock';
import { CALENDAR_EVENT_PRESETS, verifyCalendarEvent } from '@/utils/calendarEvent';
import { MenuButton } from './MenuButton';
import { TextField, type FieldBaseProps } from './FormFields';

export interface CalendarEventSelectorProps extends FieldBaseProps {
  required?: boolean;
  placeholder?: string;
}

/** Schedule input; the menu fills in one of the common schedules. */
export function CalendarEventSelector(props: CalendarEventSelectorProps) {
  const items = () =>
    CALENDAR_EVENT_PRESETS.map((preset) => ({
      label: `${preset.comment} (${preset.value})`,
      onSelect: () => props.form.set(props.name, preset.value),
    }));

  return (
    <TextField
      {...props}
      mono
      validate={verifyCalendarEvent}
      trailing={
        <MenuButton label="Examples" icon={<CalendarClockIcon class="h-4 w-4" />} disabled={props.disabled} items={items()} />
      }
    />
  );
}

export default CalendarEventSelector;
