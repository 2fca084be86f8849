import { describe, expect, it } from 'vitest';
import { CALENDAR_EVENT_PRESETS, parseCalendarEvent, verifyCalendarEvent } from '../calendarEvent';

describe('verifyCalendarEvent', () => {
  it('accepts every preset', () => {
    for (const preset of CALENDAR_EVENT_PRESETS) {
      expect(verifyCalendarEvent(preset.value)).toBeNull();
    }
  });

  it('accepts keywords, weekday names and seconds', () => {
    expect(verifyCalendarEvent('Weekly')).toBeNull();
    expect(verifyCalendarEvent('monday,wed..fri')).toBeNull();
    expect(verifyCalendarEvent('2024-*-01 12:00:30')).toBeNull();
  });

  it('names the invalid part', () => {
    expect(verifyCalendarEvent('')).toBe('empty calendar event');
    expect(verifyCalendarEvent('funday 10:00')).toBe("invalid weekday specification 'funday'");
    expect(verifyCalendarEvent('25:00')).toBe("hour value out of range '25'");
    expect(verifyCalendarEvent('*:0/0')).toBe("invalid repetition '0'");
    expect(verifyCalendarEvent('12-32')).toBe("day value out of range '32'");
    expect(verifyCalendarEvent('10:00 12:00')).toBe("unexpected '12:00'");
    expect(verifyCalendarEvent('5..2:00')).toBe("invalid hour range '5..2'");
  });

  it('throws from the parser', () => {
    expect(() => parseCalendarEvent('noon')).toThrow("invalid weekday specification 'noon'");
  });
});
