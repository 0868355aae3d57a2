import type { PostRecord, PreparedPost, Publisher, PublishResult } from '../types';
import type { ContentEnricher } from './enricher';
import type { LedgerStore } from './ledger';
import type { QueueStore } from './queue';

export interface PublishAttempt {
  post: PreparedPost;
  result: PublishResult;
}

export interface PostOutcome extends PublishResult {
  record: PostRecord | null;
}

export interface PostingServiceDeps {
  queue: QueueStore;
  ledger: LedgerStore;
  enricher: ContentEnricher;
  publisher: Publisher;
  now?: () => Date;
}

/**
 * Операции с постами: очередь, публикация и запись в архив
 */
export class PostingService {
  readonly queue: QueueStore;
  readonly ledger: LedgerStore;
  private readonly enricher: ContentEnricher;
  private readonly publisher: Publisher;
  private readonly now: () => Date;

  constructor(deps: PostingServiceDeps) {
    this.queue = deps.queue;
    this.ledger = deps.ledger;
    this.enricher = deps.enricher;
    this.publisher = deps.publisher;
    this.now = deps.now ?? (() => new Date());
  }

  async enqueue(raw: string): Promise<void> {
    const content = raw.trim();
    if (!content) {
      throw new Error('Нельзя добавить в очередь пустой пост');
    }
    await this.queue.append(content);
    console.log(`✅ Добавлено в очередь: ${content}`);
  }

  async listQueue(): Promise<string[]> {
    return this.queue.readAll();
  }

  async removeFromQueue(index: number): Promise<string> {
    const removed = await this.queue.remove(index);
    console.log(`🗑 Удалено из очереди: ${removed}`);
    return removed;
  }

  /**
   * Готовит пост и публикует его, ничего не записывая
   */
  async publish(raw: string): Promise<PublishAttempt> {
    const post = await this.enricher.prepare(raw.trim());
    const result = await this.publisher.publish(post);
    return { post, result };
  }

  /**
   * Записывает подготовленный пост в архив с текущим временем
   */
  async archive(post: PreparedPost): Promise<PostRecord> {
    const record = await this.enricher.toRecord(post, this.now());
    await this.ledger.append(record);
    return record;
  }

  /**
   * Только запись в архив, без публикации в соцсети
   */
  async archiveOnly(raw: string): Promise<PostRecord> {
    const content = raw.trim();
    if (!content) {
      throw new Error('Нельзя сохранить пустой пост');
    }
    const post = await this.enricher.prepare(content);
    const record = await this.archive(post);
    console.log('✅ Пост сохранен в архив без публикации');
    return record;
  }

  /**
   * Публикует пост и при успехе записывает его в архив
   */
  async publishAndArchive(raw: string): Promise<PostOutcome> {
    if (!raw.trim()) {
      throw new Error('Нельзя опубликовать пустой пост');
    }
    const { post, result } = await this.publish(raw);
    if (!result.success) {
      return { ...result, record: null };
    }
    const record = await this.archive(post);
    return { ...result, record };
  }
}
