import type { PostRecord } from '../types';
import { escapeHTML } from '../utils/telegram';
import { formatTimestamp, getBlogTimeZone, getDateComponents, parseTimestamp } from '../utils/timezone';
import type { LedgerStore } from './ledger';
import type { SettingsService } from './settings';

// Картинка карточки для ссылок без миниатюры
const FALLBACK_IMAGE = 'rss.png';
const DEFAULT_SITE_NAME = 'Microblog';

export interface Digest {
  filename: string;
  content: string;
  // Сколько записей вошло в выборку (включая записи без ссылок)
  entryCount: number;
  linkCount: number;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function isoDate(date: Date, timeZone?: string): string {
  const c = getDateComponents(date, timeZone);
  return `${c.year}-${pad(c.month)}-${pad(c.day)}`;
}

// Например "Friday 2024-03-15"
export function formatDigestTitleDate(date: Date, timeZone: string | undefined = getBlogTimeZone()): string {
  const weekday = new Intl.DateTimeFormat('en-US', { timeZone, weekday: 'long' }).format(date);
  return `${weekday} ${isoDate(date, timeZone)}`;
}

// Например "15-Mar-2024"
export function formatCardDate(date: Date, timeZone: string | undefined = getBlogTimeZone()): string {
  const month = new Intl.DateTimeFormat('en-US', { timeZone, month: 'short' }).format(date);
  const c = getDateComponents(date, timeZone);
  return `${pad(c.day)}-${month}-${c.year}`;
}

/**
 * HTML-карточка одной ссылки для дайджеста
 */
export function renderDigestCard(record: PostRecord, url: string): string {
  const image = escapeHTML(record.image ?? FALLBACK_IMAGE);
  const headline = escapeHTML(record.headline ?? url);

  let html = '<div class="link_list_card">';
  html += `<div class="link_card_image"><img src="/images/${image}" class="link_card_image_thumb" height="150" alt="link image"></div>`;
  html += `<span class="link_list_date">${formatCardDate(record.timestamp)}</span> - `;
  html += `<a class="link_list_link" href="${escapeHTML(url)}">${headline}</a></p>`;

  if (record.summary) {
    html += `<p><span class="link_list_summary_title">Brief Summary:</span> <span class="link_list_summary">"${escapeHTML(record.summary)}"</span></p>`;
  }
  if (record.commentary) {
    html += `<p><span class="link_list_summary_title">Personal Notes and Commentary:</span> <span class="link_list_summary">"${escapeHTML(record.commentary)}"</span></p>`;
  }

  return `${html}</div>\n`;
}

/**
 * Дайджест ссылок, опубликованных после предыдущего дайджеста
 */
export class DigestService {
  private readonly ledger: LedgerStore;
  private readonly settings: SettingsService;

  constructor(ledger: LedgerStore, settings: SettingsService) {
    this.ledger = ledger;
    this.settings = settings;
  }

  /**
   * Собирает дайджест и запоминает момент now как границу для следующего.
   * Если новых записей нет, возвращает null и границу не меняет.
   */
  async generate(now: Date = new Date()): Promise<Digest | null> {
    const lastDigest = await this.getLastDigestDate();
    const all = await this.ledger.readAll();
    const entries = lastDigest
      ? all.filter(record => record.timestamp.getTime() > lastDigest.getTime())
      : all;

    if (entries.length === 0) {
      return null;
    }

    const siteName = (await this.settings.get('site_name', DEFAULT_SITE_NAME)) ?? DEFAULT_SITE_NAME;
    const parts = [`<p>${escapeHTML(siteName)} Link List for ${formatDigestTitleDate(now)}</p>\n`];

    let linkCount = 0;
    // readAll отдает новые первыми, в дайджесте старые первыми
    for (const record of [...entries].reverse()) {
      if (record.url) {
        parts.push(renderDigestCard(record, record.url));
        linkCount += 1;
      }
    }

    await this.settings.set('last_digest_date', formatTimestamp(now));
    console.log(`✅ Дайджест собран: ${linkCount} ссылок из ${entries.length} записей`);

    return {
      filename: `${isoDate(now, getBlogTimeZone())}-Digest.txt`,
      content: parts.join('\n'),
      entryCount: entries.length,
      linkCount,
    };
  }

  async getLastDigestDate(): Promise<Date | null> {
    const value = await this.settings.get('last_digest_date');
    return value ? parseTimestamp(value) : null;
  }
}
