import * as fs from 'fs-extra';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { getDateComponents, getBlogTimeZone } from './timezone';

export function getImagesDir(): string {
  return process.env.IMAGES_DIR || './images';
}

export async function ensureImagesDir(imagesDir: string = getImagesDir()): Promise<void> {
  await fs.ensureDir(imagesDir);
}

/**
 * Имя файла для загруженного оператором изображения: YYYYMMDD_HHMMSS_<uuid>.<ext>
 */
export function createUploadFilename(extension: string, now: Date = new Date()): string {
  const c = getDateComponents(now, getBlogTimeZone());
  const pad = (value: number) => String(value).padStart(2, '0');
  const stamp = `${c.year}${pad(c.month)}${pad(c.day)}_${pad(c.hour)}${pad(c.minute)}${pad(c.second)}`;
  return `${stamp}_${uuidv4()}.${extension.replace(/^\./, '')}`;
}

/**
 * Читает текстовый файл. Отсутствующий файл считается пустым и дает null.
 */
export async function readTextSafe(filePath: string): Promise<string | null> {
  if (!(await fs.pathExists(filePath))) {
    return null;
  }
  return fs.readFile(filePath, 'utf-8');
}

/**
 * Дописывает текст в конец файла, создавая его и родительские директории при необходимости
 */
export async function appendText(filePath: string, text: string): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
  await fs.appendFile(filePath, text, 'utf-8');
}

/**
 * Атомарно перезаписывает файл через временный файл рядом с ним
 */
export async function atomicWriteText(filePath: string, text: string): Promise<void> {
  const tmpPath = `${filePath}.tmp.${uuidv4()}`;
  await fs.outputFile(tmpPath, text, 'utf-8');
  try {
    await fs.move(tmpPath, filePath, { overwrite: true });
  } catch (error) {
    await cleanupFile(tmpPath);
    throw error;
  }
}

export async function cleanupFile(filePath: string): Promise<void> {
  try {
    if (await fs.pathExists(filePath)) {
      await fs.remove(filePath);
    }
  } catch (error) {
    console.error(`Ошибка удаления файла ${filePath}:`, error);
  }
}
