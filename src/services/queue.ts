import { appendText, atomicWriteText, readTextSafe } from '../utils/dataFiles';
import { Mutex } from '../utils/mutex';

export class QueueIndexError extends Error {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number) {
    super(`Нет записи очереди с индексом ${index} (в очереди ${size})`);
    this.name = 'QueueIndexError';
    this.index = index;
    this.size = size;
  }
}

// Доступ к очереди внутри блокировки
export interface QueueTransaction {
  // Строки файла как есть, включая пустые (кроме завершающего перевода строки)
  lines: string[];
  write(lines: string[]): Promise<void>;
}

function splitLines(content: string | null): string[] {
  if (content === null || content.length === 0) {
    return [];
  }
  const lines = content.split('\n').map(line => line.replace(/\r$/, ''));
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function joinLines(lines: string[]): string {
  return lines.map(line => `${line}\n`).join('');
}

// Очередь постов на публикацию (topost.txt): по записи на строку, FIFO
export class QueueStore {
  readonly filePath: string;
  private readonly mutex = new Mutex();

  constructor(filePath?: string) {
    this.filePath = filePath || process.env.TOPOST_FILE || 'topost.txt';
  }

  async append(content: string): Promise<void> {
    const line = content.replace(/\r?\n|\r/g, ' ');
    await this.mutex.runExclusive(() => appendText(this.filePath, `${line}\n`));
  }

  /**
   * Непустые записи очереди в порядке поступления (пробелы по краям обрезаны)
   */
  async readAll(): Promise<string[]> {
    const lines = splitLines(await readTextSafe(this.filePath));
    return lines.map(line => line.trim()).filter(line => line.length > 0);
  }

  /**
   * Удаляет запись по индексу (с 0) среди непустых записей.
   * При неверном индексе очередь не меняется и выбрасывается QueueIndexError.
   */
  async remove(index: number): Promise<string> {
    return this.withLock(async tx => {
      const positions: number[] = [];
      tx.lines.forEach((line, position) => {
        if (line.trim().length > 0) {
          positions.push(position);
        }
      });

      if (!Number.isInteger(index) || index < 0 || index >= positions.length) {
        throw new QueueIndexError(index, positions.length);
      }

      const position = positions[index];
      const removed = tx.lines[position].trim();
      await tx.write(tx.lines.filter((_, i) => i !== position));
      return removed;
    });
  }

  /**
   * Выполняет чтение-изменение-запись очереди под блокировкой файла.
   * Все изменения очереди должны идти через этот метод или методы выше.
   */
  async withLock<T>(task: (tx: QueueTransaction) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const lines = splitLines(await readTextSafe(this.filePath));
      return task({
        lines,
        write: (next: string[]) => atomicWriteText(this.filePath, joinLines(next)),
      });
    });
  }
}
