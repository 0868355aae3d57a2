import type { PreparedPost, Publisher, PublishResult } from '../types';
import { withTimeout } from '../utils/timeout';
import { BlueskyTarget } from './bluesky';
import { MastodonTarget } from './mastodon';
import type { SettingsService } from './settings';
import { TelegramChannelTarget, type ChannelSender } from './telegramChannel';
import type { PublishTarget } from './targets';

const DEFAULT_PUBLISH_TIMEOUT_MS = 120_000;

export const NOT_CONFIGURED_ERROR = 'Учетные данные соцсетей не настроены';

export type TargetFactory = () => Promise<PublishTarget[]>;

/**
 * Собирает соцсети, для которых в настройках есть учетные данные
 */
export async function createConfiguredTargets(
  settings: SettingsService,
  telegram: ChannelSender | null = null
): Promise<PublishTarget[]> {
  const values = await settings.getAll();
  const targets: PublishTarget[] = [];

  if (values.bluesky_handle && values.bluesky_password) {
    targets.push(
      new BlueskyTarget({
        handle: values.bluesky_handle,
        password: values.bluesky_password,
        service: values.bluesky_service,
      })
    );
  }

  if (values.mastodon_url && values.mastodon_token) {
    targets.push(new MastodonTarget({ baseUrl: values.mastodon_url, accessToken: values.mastodon_token }));
  }

  if (telegram && values.telegram_channel_id) {
    targets.push(new TelegramChannelTarget(telegram, values.telegram_channel_id));
  }

  return targets;
}

export interface SocialPublisherOptions {
  targets: TargetFactory;
  timeoutMs?: number;
}

/**
 * Публикует пост во все настроенные соцсети.
 * Успех только если пост ушел во все сети; время всей попытки ограничено PUBLISH_TIMEOUT_MS.
 */
export class SocialPublisher implements Publisher {
  private readonly targets: TargetFactory;
  private readonly timeoutMs: number;

  constructor(options: SocialPublisherOptions) {
    this.targets = options.targets;
    this.timeoutMs =
      options.timeoutMs || parseInt(process.env.PUBLISH_TIMEOUT_MS || '', 10) || DEFAULT_PUBLISH_TIMEOUT_MS;
  }

  async publish(post: PreparedPost): Promise<PublishResult> {
    try {
      const targets = await this.targets();
      if (targets.length === 0) {
        console.warn(`⚠️ ${NOT_CONFIGURED_ERROR}, пост не опубликован`);
        return { success: false, errors: [NOT_CONFIGURED_ERROR] };
      }

      if (post.content.type === 'image' && !post.imageData) {
        console.warn(`⚠️ Изображение ${post.content.image} недоступно, публикую только текст`);
      }

      const controller = new AbortController();
      const errors = await withTimeout(
        this.publishToAll(targets, post, controller.signal),
        this.timeoutMs,
        'Публикация',
        controller
      );
      return { success: errors.length === 0, errors };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`❌ Публикация не удалась: ${message}`);
      return { success: false, errors: [message] };
    }
  }

  private async publishToAll(targets: PublishTarget[], post: PreparedPost, signal: AbortSignal): Promise<string[]> {
    const results = await Promise.allSettled(targets.map(target => target.publish(post, signal)));
    const errors: string[] = [];

    results.forEach((result, index) => {
      const name = targets[index].name;
      if (result.status === 'fulfilled') {
        console.log(`✅ Опубликовано в ${name}`);
        return;
      }
      const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
      console.error(`❌ Ошибка публикации в ${name}: ${message}`);
      errors.push(`${name}: ${message}`);
    });

    return errors;
  }
}
