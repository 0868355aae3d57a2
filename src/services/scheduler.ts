import type { TickResult } from '../types';
import type { PostingService, PostOutcome } from './posting';

const DEFAULT_TICK_MS = 60_000;
const DEFAULT_INTERVAL_MS = 3_600_000;

export interface AutoPosterOptions {
  posting: PostingService;
  now?: () => Date;
  tickMs?: number;
  intervalMs?: number;
}

function envNumber(name: string): number | undefined {
  const value = parseInt(process.env[name] || '', 10);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

/**
 * Автопостинг из очереди: раз в тик проверяет, прошел ли интервал с последней
 * успешной публикации, и публикует первую запись очереди.
 * Неудачная запись остается первой и повторяется на следующем тике.
 */
export class AutoPoster {
  private readonly posting: PostingService;
  private readonly now: () => Date;
  readonly tickMs: number;
  readonly intervalMs: number;
  private lastSuccessAt: Date;
  private intervalId: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(options: AutoPosterOptions) {
    this.posting = options.posting;
    this.now = options.now ?? (() => new Date());
    this.tickMs = options.tickMs ?? envNumber('AUTOPOST_TICK_MS') ?? DEFAULT_TICK_MS;
    this.intervalMs = options.intervalMs ?? envNumber('AUTOPOST_INTERVAL_MS') ?? DEFAULT_INTERVAL_MS;
    // Отсчет начинается с запуска процесса
    this.lastSuccessAt = this.now();
  }

  start(): void {
    if (this.intervalId !== null) {
      return;
    }

    this.intervalId = setInterval(() => {
      // Тики не накладываются: медленная публикация пропускает следующие тики
      if (this.ticking) {
        return;
      }
      this.ticking = true;
      this.tick()
        .catch(error => {
          console.error('❌ Ошибка автопостинга:', error);
        })
        .finally(() => {
          this.ticking = false;
        });
    }, this.tickMs);

    console.log(
      `🚀 Автопостинг запущен: проверка раз в ${Math.round(this.tickMs / 1000)} сек., ` +
        `интервал между постами ${Math.round(this.intervalMs / 60000)} мин.`
    );
  }

  stop(): void {
    if (this.intervalId === null) {
      return;
    }
    clearInterval(this.intervalId);
    this.intervalId = null;
    console.log('Автопостинг остановлен');
  }

  isRunning(): boolean {
    return this.intervalId !== null;
  }

  getLastSuccessAt(): Date {
    return this.lastSuccessAt;
  }

  getNextEligibleAt(): Date {
    return new Date(this.lastSuccessAt.getTime() + this.intervalMs);
  }

  markSuccess(at: Date = this.now()): void {
    this.lastSuccessAt = at;
  }

  /**
   * Один шаг автопостинга. Выполняется целиком под блокировкой очереди.
   */
  async tick(): Promise<TickResult> {
    return this.posting.queue.withLock(async tx => {
      if (this.now().getTime() < this.getNextEligibleAt().getTime()) {
        return { outcome: 'waiting' };
      }

      if (tx.lines.length === 0) {
        return { outcome: 'empty' };
      }

      const entry = tx.lines[0];
      // Пустая строка не считается постом и не откладывает следующий
      if (entry.trim().length === 0) {
        await tx.write(tx.lines.slice(1));
        return { outcome: 'skipped-blank' };
      }

      console.log(`Автопостинг: публикую "${entry.trim()}"`);
      const { post, result } = await this.posting.publish(entry);

      if (!result.success) {
        console.error(`❌ Автопостинг не удался, запись остается в очереди: ${result.errors.join('; ')}`);
        return { outcome: 'failed', entry, errors: result.errors };
      }

      await tx.write(tx.lines.slice(1));
      this.markSuccess();
      const record = await this.posting.archive(post);
      console.log(`✅ Автопостинг: опубликовано, следующий пост не раньше ${this.getNextEligibleAt().toISOString()}`);
      return { outcome: 'posted', entry, record };
    });
  }

  /**
   * Немедленная публикация по команде оператора. Успех сбрасывает таймер автопостинга.
   * Выполняется под блокировкой очереди, чтобы не пересекаться с тиком.
   */
  async postNow(raw: string): Promise<PostOutcome> {
    return this.posting.queue.withLock(async () => {
      const outcome = await this.posting.publishAndArchive(raw);
      if (outcome.success) {
        this.markSuccess();
      }
      return outcome;
    });
  }
}
