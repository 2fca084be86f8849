// Calendar event schedules: `[weekdays] [[year-]month-day] [hour:minute[:second]]`

export interface CalendarEventPreset {
  value: string;
  comment: string;
}

export const CALENDAR_EVENT_PRESETS: readonly CalendarEventPreset[] = [
  { value: '*:0/30', comment: 'Every 30 minutes' },
  { value: 'hourly', comment: 'Every hour' },
  { value: '0/2:00', comment: 'Every two hours' },
  { value: '2,22:30', comment: 'Every day 02:30, 22:30' },
  { value: '21:00', comment: 'Every day 21:00' },
  { value: 'daily', comment: 'Every day 00:00' },
  { value: 'mon..fri 00:00', comment: 'Monday to Friday 00:00' },
  { value: 'mon..fri *:00', comment: 'Monday to Friday, hourly' },
  { value: 'sat 18:15', comment: 'Every Saturday 18:15' },
  { value: 'monthly', comment: 'Every first day of the Month 00:00' },
  { value: 'sat *-1..7 02:00', comment: 'Every first Saturday of the month 02:00' },
  { value: 'yearly', comment: 'First day of the year 00:00' },
];

const KEYWORDS = new Set([
  'minutely',
  'hourly',
  'daily',
  'weekly',
  'monthly',
  'yearly',
  'annually',
  'quarterly',
  'semiannually',
]);

const WEEKDAYS = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'];
const WEEKDAY_NAMES = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];

interface FieldRange {
  name: string;
  min: number;
  max: number;
}

const YEAR: FieldRange = { name: 'year', min: 1970, max: 9999 };
const MONTH: FieldRange = { name: 'month', min: 1, max: 12 };
const DAY: FieldRange = { name: 'day', min: 1, max: 31 };
const HOUR: FieldRange = { name: 'hour', min: 0, max: 23 };
const MINUTE: FieldRange = { name: 'minute', min: 0, max: 59 };
const SECOND: FieldRange = { name: 'second', min: 0, max: 59 };

const isWeekday = (text: string) => WEEKDAYS.includes(text) || WEEKDAY_NAMES.includes(text);

function checkWeekdays(part: string): void {
  for (const item of part.split(',')) {
    const days = item.split('..');
    if (days.length > 2 || !days.every(isWeekday)) throw new Error(`invalid weekday specification '${item}'`);
  }
}

function checkValue(text: string, range: FieldRange): number {
  if (!/^\d+$/.test(text)) throw new Error(`invalid ${range.name} '${text}'`);
  const value = Number(text);
  if (value < range.min || value > range.max) throw new Error(`${range.name} value out of range '${text}'`);
  return value;
}

// `*`, `v`, `a..b`, each optionally followed by `/repeat`
function checkComponent(part: string, range: FieldRange): void {
  for (const item of part.split(',')) {
    const [base, repeat, ...rest] = item.split('/');
    if (rest.length > 0) throw new Error(`invalid ${range.name} '${item}'`);
    if (repeat !== undefined && (!/^\d+$/.test(repeat) || Number(repeat) === 0)) {
      throw new Error(`invalid repetition '${repeat}'`);
    }
    if (base === '*') continue;
    const bounds = base.split('..');
    if (bounds.length > 2) throw new Error(`invalid ${range.name} '${item}'`);
    const [start, end] = bounds.map((bound) => checkValue(bound, range));
    if (end !== undefined && end < start) throw new Error(`invalid ${range.name} range '${base}'`);
  }
}

function checkDate(part: string): void {
  const parts = part.split('-');
  if (parts.length === 2) {
    checkComponent(parts[0], MONTH);
    checkComponent(parts[1], DAY);
  } else if (parts.length === 3) {
    checkComponent(parts[0], YEAR);
    checkComponent(parts[1], MONTH);
    checkComponent(parts[2], DAY);
  } else {
    throw new Error(`invalid date specification '${part}'`);
  }
}

function checkTime(part: string): void {
  const parts = part.split(':');
  if (parts.length < 2 || parts.length > 3) throw new Error(`invalid time specification '${part}'`);
  checkComponent(parts[0], HOUR);
  checkComponent(parts[1], MINUTE);
  if (parts.length === 3) checkComponent(parts[2], SECOND);
}

/** Throws an error naming the first invalid part. */
export function parseCalendarEvent(text: string): void {
  const event = text.trim().toLowerCase();
  if (!event) throw new Error('empty calendar event');
  if (KEYWORDS.has(event)) return;

  const tokens = event.split(/\s+/);
  if (/^[a-z]/.test(tokens[0])) {
    checkWeekdays(tokens[0]);
    tokens.shift();
  }

  const first = tokens.shift();
  if (first !== undefined && first.includes('-')) {
    checkDate(first);
    const time = tokens.shift();
    if (time !== undefined) checkTime(time);
  } else if (first !== undefined) {
    checkTime(first);
  }

  if (tokens.length > 0) throw new Error(`unexpected '${tokens.join(' ')}'`);
}

/** Validator for form fields: the error text, or null when valid. */
export function verifyCalendarEvent(text: string): string | null {
  try {
    parseCalendarEvent(text);
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}
