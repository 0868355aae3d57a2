// Утилиты для работы с временем записей в часовом поясе блога

export interface DateComponents {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

// Формат метки времени в posted.txt: YYYY-MM-DD HH:MM:SS
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Часовой пояс блога из TIMEZONE. Пустое значение означает локальное время процесса.
 */
export function getBlogTimeZone(): string | undefined {
  const zone = process.env.TIMEZONE?.trim();
  return zone ? zone : undefined;
}

/**
 * Получает компоненты даты в указанном часовом поясе
 */
export function getDateComponents(date: Date, timeZone?: string): DateComponents {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    // h23 вместо hour12: false, иначе полночь форматируется как 24
    hourCycle: 'h23',
  });

  const parts = formatter.formatToParts(date);
  const getPart = (type: Intl.DateTimeFormatPartTypes) => {
    const part = parts.find(p => p.type === type);
    return part ? parseInt(part.value, 10) : 0;
  };

  return {
    year: getPart('year'),
    month: getPart('month'),
    day: getPart('day'),
    hour: getPart('hour'),
    minute: getPart('minute'),
    second: getPart('second'),
  };
}

function componentsToUtc(c: DateComponents): number {
  return Date.UTC(c.year, c.month - 1, c.day, c.hour, c.minute, c.second);
}

/**
 * Создает Date по компонентам времени в указанном часовом поясе.
 * Смещение пояса вычисляется дважды, чтобы корректно пройти переход на летнее время.
 */
export function createZonedDate(components: DateComponents, timeZone?: string): Date {
  const { year, month, day, hour, minute, second } = components;

  if (!timeZone) {
    return new Date(year, month - 1, day, hour, minute, second);
  }

  const guess = componentsToUtc(components);
  const offset = componentsToUtc(getDateComponents(new Date(guess), timeZone)) - guess;
  let candidate = guess - offset;

  const correctedOffset = componentsToUtc(getDateComponents(new Date(candidate), timeZone)) - candidate;
  if (correctedOffset !== offset) {
    candidate = guess - correctedOffset;
  }

  return new Date(candidate);
}

function pad(value: number, length: number = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * Форматирует дату как метку записи: YYYY-MM-DD HH:MM:SS
 */
export function formatTimestamp(date: Date, timeZone: string | undefined = getBlogTimeZone()): string {
  const c = getDateComponents(date, timeZone);
  return `${pad(c.year, 4)}-${pad(c.month)}-${pad(c.day)} ${pad(c.hour)}:${pad(c.minute)}:${pad(c.second)}`;
}

/**
 * Разбирает метку записи. Возвращает null, если строка не в точном формате
 * или описывает несуществующую дату.
 */
export function parseTimestamp(value: string, timeZone: string | undefined = getBlogTimeZone()): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(part => parseInt(part, 10));

  // Последний день месяца: нулевой день следующего месяца
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  return createZonedDate({ year, month, day, hour, minute, second }, timeZone);
}

/**
 * Форматирует дату для сообщений бота в формате DD.MM.YYYY HH:MM
 */
export function formatDisplayTime(date: Date, timeZone: string | undefined = getBlogTimeZone()): string {
  return date.toLocaleString('ru-RU', {
    timeZone,
    day: '2-digit',
    month: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
  });
}
