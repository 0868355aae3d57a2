import type { PostRecord, PostsPage } from '../types';
import { appendText, atomicWriteText, readTextSafe } from '../utils/dataFiles';
import { Mutex } from '../utils/mutex';
import { encodePostLine, parsePostedContent } from '../utils/postLine';

export interface PageQuery {
  page?: number;
  pageSize?: number;
  query?: string | null;
}

const DEFAULT_PAGE_SIZE = 20;

/**
 * Проверяет, подходит ли запись под поисковый запрос:
 * подстрока без учета регистра в заголовке, описании и комментарии
 */
export function matchesQuery(record: PostRecord, query: string): boolean {
  const needle = query.toLowerCase();
  const haystack = [record.headline, record.summary, record.commentary]
    .filter((value): value is string => value !== null && value.length > 0)
    .join(' ')
    .toLowerCase();
  return haystack.length > 0 && haystack.includes(needle);
}

/**
 * Делит отфильтрованные записи на страницы (нумерация с 1)
 */
export function paginate(records: PostRecord[], page: number, pageSize: number): PostsPage {
  const safePage = Math.max(1, Math.floor(page));
  const safeSize = Math.max(1, Math.floor(pageSize));
  const total = records.length;
  const start = (safePage - 1) * safeSize;

  return {
    entries: records.slice(start, start + safeSize),
    total,
    page: safePage,
    pageSize: safeSize,
    totalPages: total > 0 ? Math.ceil(total / safeSize) : 0,
  };
}

// Хранилище опубликованных постов (posted.txt), только дописывание
export class LedgerStore {
  readonly filePath: string;
  private readonly defaultPageSize: number;
  private readonly mutex = new Mutex();

  constructor(filePath?: string, defaultPageSize?: number) {
    this.filePath = filePath || process.env.POSTED_FILE || 'posted.txt';
    this.defaultPageSize = defaultPageSize || parseInt(process.env.PAGE_SIZE || '', 10) || DEFAULT_PAGE_SIZE;
  }

  async append(record: PostRecord): Promise<void> {
    const line = encodePostLine(record);
    await this.mutex.runExclusive(() => appendText(this.filePath, line));
  }

  /**
   * Все разобранные записи, новые первыми. Строки, которые не удалось разобрать, пропускаются.
   */
  async readAll(): Promise<PostRecord[]> {
    const content = await readTextSafe(this.filePath);
    if (content === null) {
      return [];
    }
    return parsePostedContent(content).reverse();
  }

  async getPage(options: PageQuery = {}): Promise<PostsPage> {
    const all = await this.readAll();
    const query = options.query?.trim();
    const filtered = query ? all.filter(record => matchesQuery(record, query)) : all;
    return paginate(filtered, options.page ?? 1, options.pageSize ?? this.defaultPageSize);
  }

  /**
   * Выполняет чтение-изменение-запись под блокировкой файла
   */
  async transform(update: (lines: string[]) => Promise<string[]>): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const content = await readTextSafe(this.filePath);
      const lines = (content ?? '')
        .split('\n')
        .map(line => line.replace(/\r$/, ''))
        .filter(line => line.trim().length > 0);
      const next = await update(lines);
      await atomicWriteText(this.filePath, next.map(line => `${line.replace(/\n$/, '')}\n`).join(''));
    });
  }
}
