export class PublishTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} не завершилась за ${Math.round(timeoutMs / 1000)} сек.`);
    this.name = 'PublishTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Ограничивает время ожидания промиса. По таймауту отменяет controller,
 * чтобы операция прервала свои запросы.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  controller?: AbortController
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new PublishTimeoutError(operation, timeoutMs);
      controller?.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
