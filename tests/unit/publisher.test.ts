import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { createConfiguredTargets, NOT_CONFIGURED_ERROR, SocialPublisher } from '../../src/services/publisher';
import { JsonFileSettingsStore, SettingsService } from '../../src/services/settings';
import type { PublishTarget } from '../../src/services/targets';
import type { PreparedPost } from '../../src/types';
import { PublishTimeoutError, withTimeout } from '../../src/utils/timeout';

const post: PreparedPost = {
  raw: 'hello',
  content: { type: 'text', text: 'hello' },
  metadata: null,
  imageData: null,
  previewData: null,
};

function target(name: string, publish: () => Promise<void>): PublishTarget {
  return { name, publish };
}

describe('SocialPublisher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('успех, когда все сети приняли пост', async () => {
    const a = vi.fn(async () => undefined);
    const b = vi.fn(async () => undefined);
    const publisher = new SocialPublisher({ targets: async () => [target('A', a), target('B', b)] });

    expect(await publisher.publish(post)).toEqual({ success: true, errors: [] });
    expect(a).toHaveBeenCalledOnce();
    expect(b).toHaveBeenCalledOnce();
  });

  it('ошибка одной сети делает публикацию неудачной', async () => {
    const publisher = new SocialPublisher({
      targets: async () => [
        target('A', async () => undefined),
        target('B', async () => {
          throw new Error('boom');
        }),
      ],
    });

    expect(await publisher.publish(post)).toEqual({ success: false, errors: ['B: boom'] });
  });

  it('без настроенных сетей публикация не удается', async () => {
    const publisher = new SocialPublisher({ targets: async () => [] });
    expect(await publisher.publish(post)).toEqual({ success: false, errors: [NOT_CONFIGURED_ERROR] });
  });

  it('зависшая сеть обрывается по таймауту', async () => {
    const publisher = new SocialPublisher({
      targets: async () => [target('Slow', () => new Promise<void>(() => undefined))],
      timeoutMs: 20,
    });

    expect(await publisher.publish(post)).toEqual({
      success: false,
      errors: ['Публикация не завершилась за 0 сек.'],
    });
  });

  it('по таймауту отменяет незавершенные запросы сетей', async () => {
    let received: AbortSignal | undefined;
    const publisher = new SocialPublisher({
      targets: async () => [
        {
          name: 'Slow',
          publish: (_post: PreparedPost, signal?: AbortSignal) => {
            received = signal;
            return new Promise<void>(() => undefined);
          },
        },
      ],
      timeoutMs: 20,
    });

    expect((await publisher.publish(post)).success).toBe(false);
    expect(received?.aborted).toBe(true);
    expect(received?.reason).toBeInstanceOf(PublishTimeoutError);
  });

  it('ошибка чтения настроек: неудачная публикация', async () => {
    const publisher = new SocialPublisher({
      targets: async () => {
        throw new Error('settings unavailable');
      },
    });
    expect(await publisher.publish(post)).toEqual({ success: false, errors: ['settings unavailable'] });
  });
});

describe('withTimeout', () => {
  it('возвращает результат, если успели', async () => {
    expect(await withTimeout(Promise.resolve(7), 1000, 'Операция')).toBe(7);
  });

  it('бросает PublishTimeoutError', async () => {
    await expect(withTimeout(new Promise(() => undefined), 10, 'Операция')).rejects.toBeInstanceOf(PublishTimeoutError);
  });
});

describe('createConfiguredTargets', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'targets-test-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('включает только сети с полными учетными данными', async () => {
    const file = path.join(dir, 'settings.json');
    await fs.writeJson(file, {
      bluesky_handle: 'me.bsky.social',
      bluesky_password: 'test-secret',
      mastodon_url: 'https://social.example',
      telegram_channel_id: '@channel',
    });

    const targets = await createConfiguredTargets(new SettingsService(new JsonFileSettingsStore(file)));
    expect(targets.map(t => t.name)).toEqual(['Bluesky']);
  });

  it('пустые настройки: ни одной сети', async () => {
    const settings = new SettingsService(new JsonFileSettingsStore(path.join(dir, 'none.json')));
    expect(await createConfiguredTargets(settings)).toEqual([]);
  });
});
