import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { LedgerStore, matchesQuery, paginate } from '../../src/services/ledger';
import type { PostRecord } from '../../src/types';

function record(day: number, overrides: Partial<PostRecord> = {}): PostRecord {
  return {
    timestamp: new Date(Date.UTC(2024, 0, day, 12, 0, 0)),
    url: null,
    headline: null,
    image: null,
    summary: null,
    commentary: `post ${day}`,
    ...overrides,
  };
}

describe('paginate', () => {
  const records = Array.from({ length: 45 }, (_, i) => record(1, { commentary: `post ${i}` }));

  it('режет на страницы и считает их количество', () => {
    const page = paginate(records, 3, 20);
    expect(page.entries).toHaveLength(5);
    expect(page.entries[0].commentary).toBe('post 40');
    expect(page).toMatchObject({ total: 45, page: 3, pageSize: 20, totalPages: 3 });
  });

  it('при кратном количестве последняя страница полная', () => {
    const page = paginate(records.slice(0, 40), 2, 20);
    expect(page.entries).toHaveLength(20);
    expect(page.entries[0].commentary).toBe('post 20');
    expect(page).toMatchObject({ total: 40, page: 2, pageSize: 20, totalPages: 2 });
  });

  it('номер страницы меньше 1 становится 1', () => {
    expect(paginate(records, 0, 20).page).toBe(1);
  });

  it('страница за пределами дает пустой список', () => {
    const page = paginate(records, 5, 20);
    expect(page.entries).toEqual([]);
    expect(page.total).toBe(45);
  });

  it('пустой архив: ноль страниц', () => {
    expect(paginate([], 1, 20).totalPages).toBe(0);
  });
});

describe('matchesQuery', () => {
  it('ищет подстроку без учета регистра в заголовке, описании и комментарии', () => {
    const r = record(1, { headline: 'TypeScript Tips', summary: null, commentary: 'great read' });
    expect(matchesQuery(r, 'typescript')).toBe(true);
    expect(matchesQuery(r, 'GREAT')).toBe(true);
  });

  it('не ищет по ссылке', () => {
    expect(matchesQuery(record(1, { url: 'https://rust.example', commentary: 'hello' }), 'rust')).toBe(false);
  });

  it('запись без текстовых полей не подходит ни под какой запрос', () => {
    expect(matchesQuery(record(1, { commentary: null }), 'a')).toBe(false);
  });
});

describe('LedgerStore', () => {
  let dir: string;
  let store: LedgerStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-test-'));
    store = new LedgerStore(path.join(dir, 'posted.txt'), 2);
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('отсутствующий файл: пустой архив', async () => {
    expect(await store.readAll()).toEqual([]);
  });

  it('отдает записи новыми первыми', async () => {
    await store.append(record(1));
    await store.append(record(2));
    await store.append(record(3));

    const all = await store.readAll();
    expect(all.map(r => r.commentary)).toEqual(['post 3', 'post 2', 'post 1']);
  });

  it('пропускает испорченные строки', async () => {
    await fs.writeFile(
      store.filePath,
      '[2024-01-01 12:00:00]|NULL|NULL|NULL|NULL|ok\nbroken line\n[2024-01-02 12:00:00] old format\n'
    );
    const all = await store.readAll();
    expect(all).toHaveLength(1);
    expect(all[0].commentary).toBe('ok');
  });

  it('getPage фильтрует и использует размер страницы по умолчанию', async () => {
    await store.append(record(1, { headline: 'Rust notes' }));
    await store.append(record(2, { commentary: 'nothing here' }));
    await store.append(record(3, { summary: 'More RUST' }));
    await store.append(record(4, { commentary: 'rust again' }));

    const page = await store.getPage({ query: '  rust ' });
    expect(page.total).toBe(3);
    expect(page.totalPages).toBe(2);
    expect(page.entries.map(r => r.timestamp.getUTCDate())).toEqual([4, 3]);

    const second = await store.getPage({ page: 2, query: 'rust' });
    expect(second.entries.map(r => r.headline)).toEqual(['Rust notes']);
  });

  it('transform перезаписывает файл под блокировкой', async () => {
    await store.append(record(1));
    await store.append(record(2));
    await store.transform(async lines => lines.slice(1));

    const content = await fs.readFile(store.filePath, 'utf-8');
    expect(content).toBe('[2024-01-02 12:00:00]|NULL|NULL|NULL|NULL|post 2\n');
  });
});
