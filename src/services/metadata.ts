import * as cheerio from 'cheerio';
import type { PageMetadata } from '../types';

export const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

const METADATA_TIMEOUT_MS = 10_000;

function metaContent($: cheerio.CheerioAPI, selector: string): string | null {
  const value = $(selector).first().attr('content')?.trim();
  return value ? value : null;
}

function resolveUrl(value: string, baseUrl: string): string | null {
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Извлекает заголовок, описание и картинку превью из HTML страницы.
 * Приоритет: og:title > <title>, og:description > description, og:image > twitter:image.
 */
export function extractMetadata(html: string, pageUrl: string, fallbackTitle: string = pageUrl): PageMetadata {
  const $ = cheerio.load(html);

  const titleTag = $('title').first().text().trim();
  const title = metaContent($, 'meta[property="og:title"]') ?? (titleTag || null);

  const description =
    metaContent($, 'meta[property="og:description"]') ??
    metaContent($, 'meta[name="description"]');

  const rawImage =
    metaContent($, 'meta[property="og:image"]') ??
    metaContent($, 'meta[name="twitter:image"]');

  return {
    title: title ?? fallbackTitle,
    description: description ?? '',
    imageUrl: rawImage ? resolveUrl(rawImage, pageUrl) : null,
  };
}

// Ссылки вида www.example.com запрашиваются по https
export function toFetchableUrl(url: string): string {
  return url.startsWith('www.') ? `https://${url}` : url;
}

/**
 * Загружает страницу и извлекает метаданные.
 * При любой ошибке возвращает заглушку: заголовок = ссылка, без описания и картинки.
 */
export async function fetchPageMetadata(url: string, timeoutMs: number = METADATA_TIMEOUT_MS): Promise<PageMetadata> {
  const target = toFetchableUrl(url);
  try {
    const response = await fetch(target, {
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }

    const html = await response.text();
    return extractMetadata(html, target, url);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`⚠️ Не удалось получить метаданные для ${url}: ${message}`);
    return { title: url, description: '', imageUrl: null };
  }
}
