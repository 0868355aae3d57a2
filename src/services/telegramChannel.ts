import type { PreparedPost } from '../types';
import { composeTextWithLink, type PublishTarget } from './targets';

// Лимит подписи к фото в Telegram
const CAPTION_MAX_LENGTH = 1024;

// Часть клиента Telegraf, которой хватает для публикации в канал
export interface ChannelSender {
  sendPhoto(chatId: string, photo: { source: Buffer }, extra: { caption?: string }): Promise<unknown>;
  sendMessage(chatId: string, text: string): Promise<unknown>;
}

/**
 * Публикация в Telegram-канал от имени бота (бот должен быть администратором канала)
 */
export class TelegramChannelTarget implements PublishTarget {
  readonly name = 'Telegram';
  private readonly telegram: ChannelSender;
  private readonly channelId: string;

  constructor(telegram: ChannelSender, channelId: string) {
    this.telegram = telegram;
    this.channelId = channelId;
  }

  async publish(post: PreparedPost, signal?: AbortSignal): Promise<void> {
    // Telegraf не принимает сигнал, поэтому отмена проверяется до отправки
    signal?.throwIfAborted();
    const text = composeTextWithLink(post);

    if (post.imageData) {
      await this.telegram.sendPhoto(
        this.channelId,
        { source: post.imageData },
        text ? { caption: text.substring(0, CAPTION_MAX_LENGTH) } : {}
      );
      return;
    }

    if (!text) {
      throw new Error('Пустой пост без изображения нельзя отправить в Telegram');
    }

    await this.telegram.sendMessage(this.channelId, text);
  }
}
