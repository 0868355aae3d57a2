import * as fs from 'fs-extra';
import { atomicWriteText, readTextSafe } from '../utils/dataFiles';
import { encodePostLine, FIELD_SEPARATOR, NULL_MARKER } from '../utils/postLine';
import { formatTimestamp, parseTimestamp } from '../utils/timezone';
import type { ContentEnricher } from './enricher';
import { LedgerStore } from './ledger';
import type { SettingsService } from './settings';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SortResult {
  processed: number;
  duplicatesRemoved: number;
  written: number;
  outputPath: string;
}

export interface MigrationResult {
  total: number;
  migrated: number;
  kept: number;
  skipped: number;
  backupPath: string;
}

function lineTime(line: string): number {
  if (!line.startsWith('[')) {
    return Number.NEGATIVE_INFINITY;
  }
  const end = line.indexOf(']');
  const date = end === -1 ? null : parseTimestamp(line.substring(1, end));
  return date ? date.getTime() : Number.NEGATIVE_INFINITY;
}

// Ссылка записи: первое поле после метки времени
function lineUrl(line: string): string | null {
  const parts = line.split(FIELD_SEPARATOR);
  const url = parts.length >= 2 ? parts[1].trim() : '';
  return url && url !== NULL_MARKER ? url : null;
}

/**
 * Убирает повторы одной ссылки (остается первая) и сортирует строки по времени.
 * Строки без разбираемой метки времени идут первыми, записи без ссылки повторами не считаются.
 */
export function sortLedgerLines(lines: string[]): { lines: string[]; duplicatesRemoved: number } {
  const seen = new Set<string>();
  const unique: string[] = [];
  let duplicatesRemoved = 0;

  for (const line of lines) {
    const url = lineUrl(line);
    if (url && seen.has(url)) {
      duplicatesRemoved += 1;
      continue;
    }
    if (url) {
      seen.add(url);
    }
    unique.push(line);
  }

  // Array.prototype.sort стабильна, равные метки сохраняют порядок файла
  const sorted = unique
    .map(line => ({ line, time: lineTime(line) }))
    .sort((a, b) => (a.time === b.time ? 0 : a.time < b.time ? -1 : 1))
    .map(item => item.line);

  return { lines: sorted, duplicatesRemoved };
}

/**
 * Сортирует posted.txt по времени и удаляет повторы ссылок.
 * Без outputPath файл перезаписывается на месте.
 */
export async function sortLedger(inputPath: string, outputPath?: string): Promise<SortResult> {
  let processed = 0;
  let result: { lines: string[]; duplicatesRemoved: number } = { lines: [], duplicatesRemoved: 0 };

  if (!outputPath || outputPath === inputPath) {
    await new LedgerStore(inputPath).transform(async lines => {
      processed = lines.length;
      result = sortLedgerLines(lines);
      return result.lines;
    });
  } else {
    const content = await readTextSafe(inputPath);
    if (content === null) {
      throw new Error(`Файл ${inputPath} не найден`);
    }
    const lines = content
      .split('\n')
      .map(line => line.replace(/\r$/, ''))
      .filter(line => line.trim().length > 0);
    processed = lines.length;
    result = sortLedgerLines(lines);
    await atomicWriteText(outputPath, result.lines.map(line => `${line}\n`).join(''));
  }

  return {
    processed,
    duplicatesRemoved: result.duplicatesRemoved,
    written: result.lines.length,
    outputPath: outputPath || inputPath,
  };
}

function isStructuredLine(line: string): boolean {
  const end = line.indexOf(']');
  return line.startsWith('[') && end !== -1 && line.substring(end + 1).trim().startsWith(FIELD_SEPARATOR);
}

/**
 * Переводит старый формат "[время] содержимое" в формат с полями.
 * Перед изменением файл копируется в <файл>.backup. Ссылки заново обогащаются метаданными.
 */
export async function migrateLegacyLedger(filePath: string, enricher: ContentEnricher): Promise<MigrationResult> {
  if (!(await fs.pathExists(filePath))) {
    throw new Error(`Файл ${filePath} не найден`);
  }

  const backupPath = `${filePath}.backup`;
  await fs.copy(filePath, backupPath, { overwrite: true });
  console.log(`✅ Резервная копия: ${backupPath}`);

  const stats = { total: 0, migrated: 0, kept: 0, skipped: 0 };

  await new LedgerStore(filePath).transform(async lines => {
    const output: string[] = [];
    stats.total = lines.length;

    for (const line of lines) {
      if (isStructuredLine(line)) {
        output.push(line);
        stats.kept += 1;
        continue;
      }

      const end = line.indexOf(']');
      const timestamp = line.startsWith('[') && end !== -1 ? parseTimestamp(line.substring(1, end)) : null;
      if (!timestamp) {
        console.warn(`⚠️ Пропускаю строку неизвестного формата: ${line.substring(0, 50)}`);
        stats.skipped += 1;
        continue;
      }

      const post = await enricher.prepare(line.substring(end + 1).trim());
      const record = await enricher.toRecord(post, timestamp);
      output.push(encodePostLine(record));
      stats.migrated += 1;
    }

    return output;
  });

  console.log(`✅ Миграция завершена: переведено ${stats.migrated}, без изменений ${stats.kept}, пропущено ${stats.skipped}`);
  return { ...stats, backupPath };
}

/**
 * Сдвигает границу дайджеста на days дней назад от now, чтобы следующий дайджест их включил
 */
export async function resetDigestDate(
  settings: SettingsService,
  days: number = 7,
  now: Date = new Date()
): Promise<string> {
  const value = formatTimestamp(new Date(now.getTime() - days * DAY_MS));
  await settings.set('last_digest_date', value);
  return value;
}
