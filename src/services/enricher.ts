import type { PageMetadata, PostRecord, PreparedPost } from '../types';
import { parseContent } from '../utils/content';
import { ImageProcessor } from './image';
import { fetchPageMetadata } from './metadata';

// Максимальная длина краткого описания в архиве
export const SUMMARY_MAX_LENGTH = 200;

export type MetadataFetcher = (url: string) => Promise<PageMetadata>;

/**
 * Обрезает описание до 200 символов, добавляя "..." если текст был длиннее
 */
export function truncateSummary(description: string): string | null {
  if (description.length === 0) {
    return null;
  }
  if (description.length > SUMMARY_MAX_LENGTH) {
    return `${description.substring(0, SUMMARY_MAX_LENGTH)}...`;
  }
  return description;
}

function emptyToNull(value: string): string | null {
  return value.length > 0 ? value : null;
}

/**
 * Готовит сырое содержимое к публикации: определяет тип, для ссылок загружает
 * метаданные и превью, для картинок читает локальный файл.
 * Ошибки загрузки не прерывают подготовку: соответствующее поле остается пустым.
 */
export class ContentEnricher {
  private readonly images: ImageProcessor;
  private readonly fetchMetadata: MetadataFetcher;

  constructor(images: ImageProcessor = new ImageProcessor(), fetchMetadata: MetadataFetcher = fetchPageMetadata) {
    this.images = images;
    this.fetchMetadata = fetchMetadata;
  }

  async prepare(raw: string): Promise<PreparedPost> {
    const content = parseContent(raw);

    if (content.type === 'url') {
      const metadata = await this.fetchMetadata(content.url);
      let previewData: Buffer | null = null;
      let imageData: Buffer | null = null;

      if (metadata.imageUrl) {
        try {
          previewData = await this.images.download(metadata.imageUrl);
          imageData = await this.images.normalize(previewData);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          console.warn(`⚠️ Не удалось подготовить превью ${metadata.imageUrl}, публикую без него: ${message}`);
          previewData = null;
        }
      }

      return { raw, content, metadata, imageData, previewData };
    }

    if (content.type === 'image') {
      const imageData = await this.images.loadLocal(content.image);
      return { raw, content, metadata: null, imageData, previewData: null };
    }

    return { raw, content, metadata: null, imageData: null, previewData: null };
  }

  /**
   * Собирает запись архива. Для ссылок сохраняет миниатюру превью 300x200.
   */
  async toRecord(post: PreparedPost, timestamp: Date): Promise<PostRecord> {
    const { content } = post;
    const record: PostRecord = {
      timestamp,
      url: null,
      headline: null,
      image: null,
      summary: null,
      commentary: emptyToNull(content.text),
    };

    if (content.type === 'url') {
      record.url = content.url;
      if (post.metadata) {
        record.headline = emptyToNull(post.metadata.title);
        record.summary = truncateSummary(post.metadata.description);
      }
      if (post.previewData) {
        try {
          record.image = await this.images.saveLinkThumbnail(content.url, post.previewData);
          console.log(`✅ Сохранена миниатюра ссылки: ${record.image}`);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          console.warn(`⚠️ Не удалось сохранить миниатюру для ${content.url}: ${message}`);
        }
      }
    } else if (content.type === 'image') {
      record.image = content.image;
    }

    return record;
  }
}
