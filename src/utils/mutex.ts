/**
 * Взаимное исключение для операций чтение-изменение-запись над одним файлом.
 * Задачи выполняются строго по очереди в порядке вызова runExclusive.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });

    try {
      await previous;
      return await task();
    } finally {
      release();
    }
  }
}
