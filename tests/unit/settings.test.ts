import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { isSettingKey, JsonFileSettingsStore, maskSetting, SettingsService } from '../../src/services/settings';

describe('maskSetting', () => {
  it('скрывает только секреты', () => {
    expect(maskSetting('mastodon_token', 'abcdefgh')).toBe('ab****gh');
    expect(maskSetting('bluesky_password', 'abc')).toBe('****');
    expect(maskSetting('site_name', 'Blog')).toBe('Blog');
    expect(maskSetting('site_name', null)).toBe('—');
  });
});

describe('isSettingKey', () => {
  it('узнает только известные ключи', () => {
    expect(isSettingKey('mastodon_url')).toBe(true);
    expect(isSettingKey('password')).toBe(false);
  });
});

describe('SettingsService с JSON-файлом', () => {
  let dir: string;
  let file: string;
  let settings: SettingsService;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'settings-test-'));
    file = path.join(dir, 'settings.json');
    settings = new SettingsService(new JsonFileSettingsStore(file));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it('без значения возвращает значение по умолчанию', async () => {
    expect(await settings.get('site_name', 'Microblog')).toBe('Microblog');
    expect(await settings.get('mastodon_url')).toBeNull();
  });

  it('сохраняет значение в файл', async () => {
    await settings.set('site_name', '  My Blog ');

    expect(await settings.get('site_name')).toBe('My Blog');
    expect(await fs.readJson(file)).toEqual({ site_name: 'My Blog' });
  });

  it('берет значение из переменной окружения, если в хранилище его нет', async () => {
    vi.stubEnv('MASTODON_URL', 'https://env.example');
    expect(await settings.get('mastodon_url')).toBe('https://env.example');

    await settings.set('mastodon_url', 'https://stored.example');
    expect(await settings.get('mastodon_url')).toBe('https://stored.example');
  });

  it('getAll отдает все ключи', async () => {
    await settings.set('bluesky_handle', 'me.bsky.social');
    const all = await settings.getAll();

    expect(all.bluesky_handle).toBe('me.bsky.social');
    expect(all.mastodon_token).toBeNull();
    expect(Object.keys(all)).toHaveLength(9);
  });

  it('файл не с объектом: ошибка', async () => {
    await fs.writeFile(file, '[1, 2]');
    await expect(settings.get('site_name')).rejects.toThrow(`Файл настроек ${file} должен содержать JSON-объект`);
  });
});
