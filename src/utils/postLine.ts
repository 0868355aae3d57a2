import type { PostRecord } from '../types';
import { formatTimestamp, parseTimestamp } from './timezone';

// Разделитель полей записи и маркер отсутствующего значения
export const FIELD_SEPARATOR = '|';
export const NULL_MARKER = 'NULL';

// Минимальное число полей после метки времени
const MIN_FIELDS = 5;

/**
 * Готовит значение поля к записи: разделитель заменяется на '-',
 * переводы строк на пробел (одна запись всегда занимает одну строку)
 */
export function sanitizeField(value: string): string {
  return value
    .replace(/\|/g, '-')
    .replace(/\r?\n|\r/g, ' ');
}

function encodeField(value: string | null): string {
  if (value === null) {
    return NULL_MARKER;
  }
  const sanitized = sanitizeField(value).trim();
  return sanitized.length > 0 ? sanitized : NULL_MARKER;
}

function decodeField(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  if (trimmed.length === 0 || trimmed === NULL_MARKER) {
    return null;
  }
  return trimmed;
}

/**
 * Кодирует запись в строку posted.txt:
 * [YYYY-MM-DD HH:MM:SS]|url|headline|image|summary|commentary
 */
export function encodePostLine(record: PostRecord, timeZone?: string): string {
  const timestamp = formatTimestamp(record.timestamp, timeZone);
  const fields = [record.url, record.headline, record.image, record.summary, record.commentary].map(encodeField);
  return `[${timestamp}]${FIELD_SEPARATOR}${fields.join(FIELD_SEPARATOR)}\n`;
}

/**
 * Разбирает строку posted.txt. Возвращает null для строк, которые не удалось разобрать:
 * без метки времени в скобках, со старым форматом без полей или с недостающими полями.
 */
export function parsePostedLine(line: string, timeZone?: string): PostRecord | null {
  if (line.trim().length === 0 || !line.startsWith('[')) {
    return null;
  }

  const bracketEnd = line.indexOf(']');
  if (bracketEnd === -1) {
    return null;
  }

  const timestampText = line.substring(1, bracketEnd);
  const timestamp = parseTimestamp(timestampText, timeZone);
  if (!timestamp) {
    return null;
  }

  const rest = line.substring(bracketEnd + 1).trim();
  // Старый формат "[время] текст" без структурированных полей не поддерживается
  if (!rest.startsWith(FIELD_SEPARATOR)) {
    return null;
  }

  const parts = rest.substring(1).split(FIELD_SEPARATOR);
  if (parts.length < MIN_FIELDS) {
    return null;
  }

  return {
    timestamp,
    url: decodeField(parts[0]),
    headline: decodeField(parts[1]),
    image: decodeField(parts[2]),
    summary: decodeField(parts[3]),
    commentary: decodeField(parts[4]),
  };
}

/**
 * Разбирает содержимое posted.txt целиком, пропуская неразобранные строки.
 * Порядок записей совпадает с порядком в файле.
 */
export function parsePostedContent(content: string, timeZone?: string): PostRecord[] {
  const records: PostRecord[] = [];
  for (const line of content.split('\n')) {
    const record = parsePostedLine(line.replace(/\r$/, ''), timeZone);
    if (record) {
      records.push(record);
    }
  }
  return records;
}
