import type { PreparedPost } from '../types';
import { toFetchableUrl } from './metadata';
import { requestSignal, type PublishTarget } from './targets';

const DEFAULT_SERVICE = 'https://bsky.social';
const REQUEST_TIMEOUT_MS = 30_000;

// Ограничения Bluesky на карточку ссылки
const EMBED_TITLE_MAX = 300;
const EMBED_DESCRIPTION_MAX = 1000;

export interface BlueskyCredentials {
  handle: string;
  password: string;
  service?: string | null;
}

interface BlueskySession {
  accessJwt: string;
  did: string;
}

// Ссылка на загруженный blob в формате atproto
export interface BlobRef {
  $type: 'blob';
  ref: { $link: string };
  mimeType: string;
  size: number;
}

type BlueskyEmbed =
  | {
      $type: 'app.bsky.embed.external';
      external: { uri: string; title: string; description: string; thumb?: BlobRef };
    }
  | {
      $type: 'app.bsky.embed.images';
      images: { alt: string; image: BlobRef }[];
    };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isBlobRef(value: unknown): value is BlobRef {
  return isRecord(value) && value.$type === 'blob' && isRecord(value.ref) && typeof value.ref.$link === 'string';
}

/**
 * Публикация в Bluesky через XRPC API
 */
export class BlueskyTarget implements PublishTarget {
  readonly name = 'Bluesky';
  private readonly credentials: BlueskyCredentials;
  private readonly service: string;

  constructor(credentials: BlueskyCredentials) {
    this.credentials = credentials;
    this.service = (credentials.service || DEFAULT_SERVICE).replace(/\/+$/, '');
  }

  async publish(post: PreparedPost, signal?: AbortSignal): Promise<void> {
    const session = await this.login(signal);
    const { content } = post;
    let embed: BlueskyEmbed | undefined;

    if (content.type === 'url') {
      const metadata = post.metadata;
      const external: { uri: string; title: string; description: string; thumb?: BlobRef } = {
        // Карточке нужна абсолютная ссылка, www.example.com дополняется схемой
        uri: toFetchableUrl(content.url),
        title: (metadata?.title ?? content.url).substring(0, EMBED_TITLE_MAX),
        description: (metadata?.description ?? '').substring(0, EMBED_DESCRIPTION_MAX),
      };

      // Без превью карточка ссылки все равно публикуется
      if (post.imageData) {
        try {
          external.thumb = await this.uploadBlob(session, post.imageData, signal);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          console.warn(`⚠️ Не удалось загрузить превью в Bluesky, публикую без него: ${message}`);
        }
      }

      embed = { $type: 'app.bsky.embed.external', external };
    } else if (content.type === 'image' && post.imageData) {
      console.log('Загружаю изображение в Bluesky...');
      const blob = await this.uploadBlob(session, post.imageData, signal);
      embed = { $type: 'app.bsky.embed.images', images: [{ alt: '', image: blob }] };
    }

    await this.createPost(session, content.text, embed, signal);
  }

  private async login(signal?: AbortSignal): Promise<BlueskySession> {
    const data = await this.request('com.atproto.server.createSession', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        identifier: this.credentials.handle,
        password: this.credentials.password,
      }),
    }, signal);

    if (!isRecord(data) || typeof data.accessJwt !== 'string' || typeof data.did !== 'string') {
      throw new Error('Bluesky не вернул сессию');
    }
    return { accessJwt: data.accessJwt, did: data.did };
  }

  private async uploadBlob(session: BlueskySession, imageData: Buffer, signal?: AbortSignal): Promise<BlobRef> {
    const data = await this.request('com.atproto.repo.uploadBlob', {
      method: 'POST',
      headers: {
        'Content-Type': 'image/jpeg',
        Authorization: `Bearer ${session.accessJwt}`,
      },
      body: new Uint8Array(imageData),
    }, signal);

    if (!isRecord(data) || !isBlobRef(data.blob)) {
      throw new Error('Bluesky не вернул blob изображения');
    }
    return data.blob;
  }

  private async createPost(
    session: BlueskySession,
    text: string,
    embed: BlueskyEmbed | undefined,
    signal?: AbortSignal
  ): Promise<void> {
    const record: Record<string, unknown> = {
      $type: 'app.bsky.feed.post',
      text,
      createdAt: new Date().toISOString(),
    };
    if (embed) {
      record.embed = embed;
    }

    await this.request('com.atproto.repo.createRecord', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${session.accessJwt}`,
      },
      body: JSON.stringify({
        repo: session.did,
        collection: 'app.bsky.feed.post',
        record,
      }),
    }, signal);
  }

  private async request(method: string, init: RequestInit, signal?: AbortSignal): Promise<unknown> {
    const response = await fetch(`${this.service}/xrpc/${method}`, {
      ...init,
      signal: requestSignal(REQUEST_TIMEOUT_MS, signal),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Ошибка Bluesky API (${method}): status=${response.status}, body=${errorText}`);
    }

    return response.json();
  }
}
