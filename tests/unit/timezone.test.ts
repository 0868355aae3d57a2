import { describe, it, expect } from 'vitest';
import { formatTimestamp, parseTimestamp } from '../../src/utils/timezone';

describe('formatTimestamp', () => {
  it('форматирует полночь как 00, а не 24', () => {
    expect(formatTimestamp(new Date(Date.UTC(2024, 0, 5, 0, 0, 7)), 'UTC')).toBe('2024-01-05 00:00:07');
  });

  it('без часового пояса использует локальное время процесса', () => {
    expect(formatTimestamp(new Date(Date.UTC(2024, 5, 1, 9, 8, 7)), undefined)).toBe('2024-06-01 09:08:07');
  });
});

describe('parseTimestamp', () => {
  it('разбирает 29 февраля високосного года', () => {
    expect(parseTimestamp('2024-02-29 12:00:00', 'UTC')?.getTime()).toBe(Date.UTC(2024, 1, 29, 12));
  });

  it('учитывает летнее время часового пояса', () => {
    expect(parseTimestamp('2024-07-01 10:00:00', 'America/New_York')?.getTime()).toBe(Date.UTC(2024, 6, 1, 14));
    expect(parseTimestamp('2024-11-03 12:00:00', 'America/New_York')?.getTime()).toBe(Date.UTC(2024, 10, 3, 17));
  });

  it.each(['2023-02-29 12:00:00', '2024-01-05 24:00:00', '2024-01-05T00:00:00', '2024-1-05 00:00:00', ''])(
    'отклоняет %j',
    value => {
      expect(parseTimestamp(value, 'UTC')).toBeNull();
    }
  );
});
