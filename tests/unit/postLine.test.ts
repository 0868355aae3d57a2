import { describe, it, expect } from 'vitest';
import { encodePostLine, parsePostedContent, parsePostedLine, sanitizeField } from '../../src/utils/postLine';
import type { PostRecord } from '../../src/types';

const timestamp = new Date(Date.UTC(2024, 2, 15, 14, 30, 0));

function record(overrides: Partial<PostRecord> = {}): PostRecord {
  return {
    timestamp,
    url: null,
    headline: null,
    image: null,
    summary: null,
    commentary: null,
    ...overrides,
  };
}

describe('encodePostLine', () => {
  it('пишет метку времени и пять полей, отсутствующие как NULL', () => {
    const line = encodePostLine(
      record({ url: 'https://example.com/a', headline: 'Title', image: 'link_1.jpg', summary: 'About', commentary: 'Nice' })
    );
    expect(line).toBe('[2024-03-15 14:30:00]|https://example.com/a|Title|link_1.jpg|About|Nice\n');
  });

  it('заменяет разделитель и переводы строк, пустые значения пишет как NULL', () => {
    const line = encodePostLine(record({ headline: 'Title | Sub', summary: 'Line1\nLine2', commentary: '' }));
    expect(line).toBe('[2024-03-15 14:30:00]|NULL|Title - Sub|NULL|Line1 Line2|NULL\n');
  });

  it('форматирует время в указанном часовом поясе', () => {
    const line = encodePostLine(record({ commentary: 'hi' }), 'Europe/Moscow');
    expect(line).toBe('[2024-03-15 17:30:00]|NULL|NULL|NULL|NULL|hi\n');
  });
});

describe('sanitizeField', () => {
  it('убирает символы, ломающие формат строки', () => {
    expect(sanitizeField('a|b\r\nc')).toBe('a-b c');
  });
});

describe('parsePostedLine', () => {
  it('восстанавливает закодированную запись', () => {
    const original = record({ url: 'https://example.com/a', headline: 'Title', summary: 'About', commentary: 'Nice' });
    expect(parsePostedLine(encodePostLine(original))).toEqual(original);
  });

  it('превращает NULL и пустые поля в null', () => {
    const parsed = parsePostedLine('[2024-03-15 14:30:00]|NULL| |NULL|NULL|hello');
    expect(parsed).toEqual(record({ commentary: 'hello' }));
  });

  it('допускает пробелы между скобкой и разделителем', () => {
    const parsed = parsePostedLine('[2024-03-15 14:30:00] |u|h|i|s|c');
    expect(parsed).toEqual(record({ url: 'u', headline: 'h', image: 'i', summary: 's', commentary: 'c' }));
  });

  it('игнорирует поля после пятого', () => {
    const parsed = parsePostedLine('[2024-03-15 14:30:00]|u|h|i|s|c|extra');
    expect(parsed?.commentary).toBe('c');
  });

  it.each([
    ['строка без скобки', 'no bracket here'],
    ['пустая строка', '   '],
    ['нет закрывающей скобки', '[2024-03-15 14:30:00|a|b|c|d|e'],
    ['старый формат', '[2024-03-15 14:30:00] old style post'],
    ['несуществующий месяц', '[2024-13-01 00:00:00]|a|b|c|d|e'],
    ['30 февраля', '[2024-02-30 00:00:00]|a|b|c|d|e'],
    ['неточный формат времени', '[2024-3-15 14:30:00]|a|b|c|d|e'],
    ['меньше пяти полей', '[2024-03-15 14:30:00]|a|b|c|d'],
  ])('возвращает null: %s', (_, line) => {
    expect(parsePostedLine(line)).toBeNull();
  });
});

describe('parsePostedContent', () => {
  it('пропускает неразобранные строки и сохраняет порядок файла', () => {
    const content = [
      'garbage',
      '[2024-01-01 00:00:00]|NULL|NULL|NULL|NULL|a\r',
      '',
      '[2024-01-02 00:00:00]|NULL|NULL|NULL|NULL|b',
      '',
    ].join('\n');

    const records = parsePostedContent(content);
    expect(records.map(r => r.commentary)).toEqual(['a', 'b']);
  });
});
