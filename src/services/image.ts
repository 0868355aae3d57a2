import * as fs from 'fs-extra';
import * as path from 'path';
import { createHash } from 'crypto';
import sharp from 'sharp';
import { createUploadFilename, getImagesDir } from '../utils/dataFiles';
import { USER_AGENT } from './metadata';

// Максимальная сторона изображения для публикации
const MAX_IMAGE_SIDE = 1200;
// Размер миниатюры ссылки в архиве (3:2)
const THUMBNAIL_WIDTH = 300;
const THUMBNAIL_HEIGHT = 200;
const JPEG_QUALITY = 85;

const DOWNLOAD_TIMEOUT_MS = 15_000;

export class ImageProcessor {
  readonly imagesDir: string;

  constructor(imagesDir?: string) {
    this.imagesDir = imagesDir || getImagesDir();
  }

  /**
   * Приводит изображение к JPEG без прозрачности, не больше 1200px по большей стороне
   */
  async normalize(imageData: Buffer): Promise<Buffer> {
    return sharp(imageData)
      .rotate()
      .flatten({ background: '#ffffff' })
      .resize(MAX_IMAGE_SIDE, MAX_IMAGE_SIDE, { fit: 'inside', withoutEnlargement: true })
      .jpeg({ quality: JPEG_QUALITY })
      .toBuffer();
  }

  /**
   * Обрезает изображение по центру до 3:2 и уменьшает до 300x200
   */
  async createThumbnail(imageData: Buffer): Promise<Buffer> {
    return sharp(imageData)
      .rotate()
      .flatten({ background: '#ffffff' })
      .resize(THUMBNAIL_WIDTH, THUMBNAIL_HEIGHT, { fit: 'cover', position: 'centre' })
      .jpeg({ quality: JPEG_QUALITY })
      .toBuffer();
  }

  /**
   * Скачивает изображение по ссылке. Возвращает исходные байты без обработки.
   */
  async download(imageUrl: string, timeoutMs: number = DOWNLOAD_TIMEOUT_MS): Promise<Buffer> {
    const response = await fetch(imageUrl, {
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Не удалось скачать изображение ${imageUrl}: HTTP ${response.status}`);
    }

    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }

  /**
   * Загружает локальное изображение из IMAGES_DIR и нормализует его. При ошибке возвращает null.
   */
  async loadLocal(filename: string): Promise<Buffer | null> {
    const imagePath = this.resolve(filename);
    if (!imagePath || !(await fs.pathExists(imagePath))) {
      console.warn(`⚠️ Файл изображения не найден: ${filename}`);
      return null;
    }

    try {
      return await this.normalize(await fs.readFile(imagePath));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`⚠️ Ошибка загрузки изображения ${filename}: ${message}`);
      return null;
    }
  }

  /**
   * Имя файла миниатюры для ссылки: link_<первые 12 символов md5 ссылки>.jpg
   */
  static linkThumbnailName(pageUrl: string): string {
    const hash = createHash('md5').update(pageUrl).digest('hex').substring(0, 12);
    return `link_${hash}.jpg`;
  }

  /**
   * Сохраняет миниатюру превью ссылки и возвращает имя файла
   */
  async saveLinkThumbnail(pageUrl: string, imageData: Buffer): Promise<string> {
    const filename = ImageProcessor.linkThumbnailName(pageUrl);
    const thumbnail = await this.createThumbnail(imageData);
    await fs.outputFile(path.join(this.imagesDir, filename), thumbnail);
    return filename;
  }

  /**
   * Сохраняет изображение, присланное оператором, и возвращает имя файла
   */
  async saveUpload(imageData: Buffer, extension: string = 'jpg', now: Date = new Date()): Promise<string> {
    const filename = createUploadFilename(extension, now);
    await fs.outputFile(path.join(this.imagesDir, filename), imageData);
    return filename;
  }

  /**
   * Путь к файлу внутри IMAGES_DIR. Имена с выходом за пределы директории отклоняются.
   */
  resolve(filename: string): string | null {
    const root = path.resolve(this.imagesDir);
    const fullPath = path.resolve(root, filename);
    if (fullPath !== root && fullPath.startsWith(root + path.sep)) {
      return fullPath;
    }
    return null;
  }
}
