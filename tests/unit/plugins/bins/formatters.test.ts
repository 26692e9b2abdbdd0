import { describe, it, expect } from 'vitest';
import { formatCollectionDate, formatReminder, formatSchedule } from '../../../../src/plugins/bins/formatters.js';

describe('bin formatters', () => {
  it('should spell out the collection day', () => {
    expect(formatCollectionDate('2026-03-10')).toBe('Tuesday 10 March');
  });

  it('should escape item names in reminders', () => {
    expect(formatReminder('morning-of', ['Paper & Card'])).toBe(
      '☀️ <b>Morning of</b> bin reminder\nItems: <b>Paper &amp; Card</b>',
    );
  });

  it('should list the schedule', () => {
    expect(formatSchedule([{ type: 'Recycling', date: '2026-03-10' }])).toBe(
      '🚛 <b>Upcoming collections</b>\n\n• <b>Recycling</b>: Tuesday 10 March',
    );
  });

  it('should say when no dates are known', () => {
    expect(formatSchedule([])).toBe('⚠️ No collection dates available yet.');
  });
});
