import * as fs from 'fs-extra';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { Mutex } from '../utils/mutex';

// Ключи настроек, которые можно менять командой /set
export const SETTING_KEYS = [
  'site_name',
  'social_links',
  'bluesky_handle',
  'bluesky_password',
  'bluesky_service',
  'mastodon_url',
  'mastodon_token',
  'telegram_channel_id',
  'last_digest_date',
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

// Значения этих ключей не показываются в сообщениях и логах
const SECRET_KEYS: readonly SettingKey[] = ['bluesky_password', 'mastodon_token'];

const SETTINGS_TABLE = 'settings';

export function isSettingKey(value: string): value is SettingKey {
  return SETTING_KEYS.some(key => key === value);
}

/**
 * Маскирует секретное значение для вывода оператору
 */
export function maskSetting(key: SettingKey, value: string | null): string {
  if (value === null || value.length === 0) {
    return '—';
  }
  if (!SECRET_KEYS.includes(key)) {
    return value;
  }
  return value.length <= 4 ? '****' : `${value.substring(0, 2)}****${value.substring(value.length - 2)}`;
}

// Хранилище пар ключ/значение
export interface SettingsStore {
  readonly description: string;
  load(): Promise<Map<string, string>>;
  save(key: string, value: string): Promise<void>;
}

function isSettingRow(value: unknown): value is { key: string; value: string | null } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'key' in value &&
    typeof value.key === 'string' &&
    'value' in value &&
    (typeof value.value === 'string' || value.value === null)
  );
}

// Таблица settings(key text primary key, value text) в Supabase
export class SupabaseSettingsStore implements SettingsStore {
  readonly description = 'Supabase';
  private readonly client: SupabaseClient;

  constructor(client: SupabaseClient) {
    this.client = client;
  }

  async load(): Promise<Map<string, string>> {
    const { data, error } = await this.client.from(SETTINGS_TABLE).select('key, value');

    if (error) {
      throw new Error(`Не удалось получить настройки: ${error.message}`);
    }

    const result = new Map<string, string>();
    const rows: unknown[] = data ?? [];
    for (const row of rows) {
      if (isSettingRow(row) && row.value !== null) {
        result.set(row.key, row.value);
      }
    }
    return result;
  }

  async save(key: string, value: string): Promise<void> {
    const { error } = await this.client.from(SETTINGS_TABLE).upsert({ key, value }, { onConflict: 'key' });

    if (error) {
      throw new Error(`Не удалось сохранить настройку ${key}: ${error.message}`);
    }
  }
}

// JSON-файл с настройками, если Supabase не настроен
export class JsonFileSettingsStore implements SettingsStore {
  readonly description: string;
  readonly filePath: string;
  private readonly mutex = new Mutex();

  constructor(filePath?: string) {
    this.filePath = filePath || process.env.SETTINGS_FILE || 'settings.json';
    this.description = `файл ${this.filePath}`;
  }

  async load(): Promise<Map<string, string>> {
    return this.mutex.runExclusive(() => this.read());
  }

  async save(key: string, value: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const current = await this.read();
      current.set(key, value);
      await fs.outputJson(this.filePath, Object.fromEntries(current), { spaces: 2 });
    });
  }

  private async read(): Promise<Map<string, string>> {
    const result = new Map<string, string>();
    if (!(await fs.pathExists(this.filePath))) {
      return result;
    }

    const data: unknown = await fs.readJson(this.filePath);
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new Error(`Файл настроек ${this.filePath} должен содержать JSON-объект`);
    }

    for (const [key, value] of Object.entries(data)) {
      if (typeof value === 'string') {
        result.set(key, value);
      }
    }
    return result;
  }
}

/**
 * Выбирает хранилище: Supabase, если заданы SUPABASE_URL и SUPABASE_ANON_KEY, иначе JSON-файл
 */
export function createSettingsStore(): SettingsStore {
  const supabaseUrl = process.env.SUPABASE_URL;
  const supabaseKey = process.env.SUPABASE_ANON_KEY;

  if (!supabaseUrl || !supabaseKey) {
    return new JsonFileSettingsStore();
  }

  return new SupabaseSettingsStore(createClient(supabaseUrl, supabaseKey));
}

/**
 * Настройки блога. Порядок поиска значения: хранилище, затем переменная
 * окружения с именем ключа в верхнем регистре, затем значение по умолчанию.
 */
export class SettingsService {
  private readonly store: SettingsStore;

  constructor(store: SettingsStore = createSettingsStore()) {
    this.store = store;
  }

  get backendDescription(): string {
    return this.store.description;
  }

  async get(key: SettingKey, defaultValue: string | null = null): Promise<string | null> {
    const stored = (await this.store.load()).get(key);
    return resolveValue(key, stored, defaultValue);
  }

  async set(key: SettingKey, value: string): Promise<void> {
    await this.store.save(key, value.trim());
    console.log(`✅ Настройка ${key} сохранена (${this.store.description})`);
  }

  async getAll(): Promise<Record<SettingKey, string | null>> {
    const stored = await this.store.load();
    const value = (key: SettingKey) => resolveValue(key, stored.get(key), null);
    return {
      site_name: value('site_name'),
      social_links: value('social_links'),
      bluesky_handle: value('bluesky_handle'),
      bluesky_password: value('bluesky_password'),
      bluesky_service: value('bluesky_service'),
      mastodon_url: value('mastodon_url'),
      mastodon_token: value('mastodon_token'),
      telegram_channel_id: value('telegram_channel_id'),
      last_digest_date: value('last_digest_date'),
    };
  }

  /**
   * Проверяет, что хранилище настроек доступно
   */
  async checkConnection(): Promise<boolean> {
    try {
      await this.store.load();
      return true;
    } catch (error) {
      console.error('Ошибка подключения к хранилищу настроек:', error);
      return false;
    }
  }
}

function resolveValue(key: SettingKey, stored: string | undefined, defaultValue: string | null): string | null {
  if (stored !== undefined && stored.length > 0) {
    return stored;
  }
  const fromEnv = process.env[key.toUpperCase()];
  if (fromEnv !== undefined && fromEnv.length > 0) {
    return fromEnv;
  }
  return defaultValue;
}
