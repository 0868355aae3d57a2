import type { PreparedPost } from '../types';
import { composeTextWithLink, requestSignal, type PublishTarget } from './targets';

const REQUEST_TIMEOUT_MS = 30_000;

export interface MastodonCredentials {
  baseUrl: string;
  accessToken: string;
}

/**
 * Публикация в Mastodon через REST API: загрузка медиа, затем статус
 */
export class MastodonTarget implements PublishTarget {
  readonly name = 'Mastodon';
  private readonly baseUrl: string;
  private readonly accessToken: string;

  constructor(credentials: MastodonCredentials) {
    this.baseUrl = credentials.baseUrl.replace(/\/+$/, '');
    this.accessToken = credentials.accessToken;
  }

  async publish(post: PreparedPost, signal?: AbortSignal): Promise<void> {
    const mediaIds: string[] = [];

    if (post.imageData) {
      console.log('Загружаю изображение в Mastodon...');
      mediaIds.push(await this.uploadMedia(post.imageData, signal));
      console.log('✅ Изображение загружено в Mastodon');
    }

    await this.postStatus(composeTextWithLink(post), mediaIds, signal);
  }

  private async uploadMedia(imageData: Buffer, signal?: AbortSignal): Promise<string> {
    const formData = new FormData();
    formData.append('file', new Blob([new Uint8Array(imageData)], { type: 'image/jpeg' }), 'image.jpg');

    const data = await this.request('/api/v2/media', {
      method: 'POST',
      body: formData,
    }, signal);

    if (typeof data !== 'object' || data === null || !('id' in data) || typeof data.id !== 'string') {
      throw new Error('Mastodon не вернул id медиафайла');
    }
    return data.id;
  }

  private async postStatus(status: string, mediaIds: string[], signal?: AbortSignal): Promise<void> {
    const payload: { status: string; media_ids?: string[] } = { status };
    if (mediaIds.length > 0) {
      payload.media_ids = mediaIds;
    }

    await this.request('/api/v1/statuses', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    }, signal);
  }

  private async request(endpoint: string, init: RequestInit, signal?: AbortSignal): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${endpoint}`, {
      ...init,
      headers: {
        ...init.headers,
        Authorization: `Bearer ${this.accessToken}`,
      },
      signal: requestSignal(REQUEST_TIMEOUT_MS, signal),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Ошибка Mastodon API (${endpoint}): status=${response.status}, body=${errorText}`);
    }

    return response.json();
  }
}
