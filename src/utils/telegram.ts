/**
 * Утилиты для безопасной отправки сообщений в Telegram
 */

import { Markup } from 'telegraf';
import type { PostRecord, PostsPage } from '../types';
import { formatDisplayTime } from './timezone';

// Кнопки постоянной клавиатуры
export const BUTTONS = {
  queue: '📋 Очередь',
  archive: '📚 Архив',
  digest: '📰 Дайджест',
  help: '❓ Помощь',
} as const;

/**
 * Экранирует специальные символы HTML для безопасной отправки
 */
export function escapeHTML(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Разбивает текст на части для отправки (Telegram лимит 4096 символов).
 * По возможности режет по переводу строки, чтобы не разрывать HTML-теги.
 */
export function splitMessage(text: string, maxLength: number = 4000): string[] {
  const chunks: string[] = [];
  let rest = text;

  while (rest.length > maxLength) {
    const newline = rest.lastIndexOf('\n', maxLength);
    const cut = newline > 0 ? newline : maxLength;
    chunks.push(rest.substring(0, cut));
    rest = rest.substring(newline > 0 ? cut + 1 : cut);
  }

  if (rest.length > 0) {
    chunks.push(rest);
  }

  return chunks;
}

/**
 * Создает постоянную клавиатуру с кнопками команд
 */
export function getMainKeyboard() {
  return Markup.keyboard([
    [BUTTONS.queue, BUTTONS.archive],
    [BUTTONS.digest, BUTTONS.help],
  ])
    .resize() // Кнопки будут автоматически подстраиваться под размер экрана
    .persistent(); // Клавиатура будет оставаться видимой
}

/**
 * Текст после команды: "/now@my_bot текст" -> "текст"
 */
export function getCommandArgs(text: string): string {
  const match = /^\/\S+\s*([\s\S]*)$/.exec(text);
  return match ? match[1].trim() : text.trim();
}

/**
 * Разбирает аргументы /archive: необязательный номер страницы, затем поисковый запрос
 */
export function parseArchiveArgs(args: string): { page: number; query: string | null } {
  const trimmed = args.trim();
  const match = /^(\d+)(?:\s+([\s\S]*))?$/.exec(trimmed);
  if (match) {
    const query = match[2]?.trim();
    return { page: Math.max(1, parseInt(match[1], 10)), query: query ? query : null };
  }
  return { page: 1, query: trimmed ? trimmed : null };
}

export function formatQueue(entries: string[]): string {
  if (entries.length === 0) {
    return '📭 Очередь пуста';
  }
  const lines = entries.map((entry, index) => `${index + 1}. ${escapeHTML(entry)}`);
  return `📋 <b>Очередь (${entries.length}):</b>\n\n${lines.join('\n')}`;
}

/**
 * Одна запись архива в HTML-разметке Telegram
 */
export function formatRecord(record: PostRecord): string {
  const lines = [`<b>${escapeHTML(formatDisplayTime(record.timestamp))}</b>`];

  if (record.url) {
    const title = escapeHTML(record.headline ?? record.url);
    lines.push(`🔗 <a href="${escapeHTML(record.url)}">${title}</a>`);
  }
  if (record.summary) {
    lines.push(`<i>${escapeHTML(record.summary)}</i>`);
  }
  if (record.image && !record.url) {
    lines.push(`🖼 ${escapeHTML(record.image)}`);
  }
  if (record.commentary) {
    lines.push(escapeHTML(record.commentary));
  }

  return lines.join('\n');
}

export function formatArchivePage(page: PostsPage, query: string | null): string {
  const header = query ? `🔎 Поиск «${escapeHTML(query)}»` : '📚 Архив';

  if (page.total === 0) {
    return query ? `${header}: ничего не найдено` : `${header} пуст`;
  }
  if (page.entries.length === 0) {
    return `${header}: страницы ${page.page} нет, всего страниц ${page.totalPages}`;
  }

  const body = page.entries.map(formatRecord).join('\n\n');
  const footer = `Страница ${page.page} из ${page.totalPages}, записей: ${page.total}`;
  return `${header}\n\n${body}\n\n${footer}`;
}
