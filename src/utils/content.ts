import type { ParsedContent } from '../types';

const URL_PREFIXES = ['http://', 'https://', 'www.'];

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.webp', '.bmp', '.tiff'];

export function isImageFilename(filename: string): boolean {
  const lower = filename.toLowerCase();
  return IMAGE_EXTENSIONS.some(ext => lower.endsWith(ext));
}

/**
 * Определяет тип содержимого поста: "ссылка|комментарий", "картинка.jpg|подпись" или текст.
 * Значим только первый разделитель. Если до него ни ссылка, ни картинка,
 * комментарием становится вся исходная строка.
 */
export function parseContent(content: string): ParsedContent {
  const separatorIndex = content.indexOf('|');
  if (separatorIndex === -1) {
    return { type: 'text', text: content };
  }

  const head = content.substring(0, separatorIndex).trim();
  const tail = content.substring(separatorIndex + 1).trim();

  if (URL_PREFIXES.some(prefix => head.startsWith(prefix))) {
    return { type: 'url', url: head, text: tail };
  }

  if (isImageFilename(head)) {
    return { type: 'image', image: head, text: tail };
  }

  return { type: 'text', text: content };
}

/**
 * Собирает сырое содержимое поста из частей, как его хранит очередь.
 * Переводы строк заменяются пробелами: запись очереди занимает одну строку.
 */
export function buildContent(text: string, attachment?: string): string {
  const flatText = text.replace(/\r?\n|\r/g, ' ').trim();
  if (attachment) {
    return `${attachment.trim()}|${flatText}`;
  }
  return flatText;
}
