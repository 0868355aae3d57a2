import type { PreparedPost } from '../types';

// Одна соцсеть, в которую публикуется пост. Об ошибке публикации сообщает исключение.
// signal отменяет незавершенные запросы, когда вышло время всей публикации.
export interface PublishTarget {
  readonly name: string;
  publish(post: PreparedPost, signal?: AbortSignal): Promise<void>;
}

/**
 * Сигнал для одного HTTP-запроса: собственный таймаут плюс отмена всей публикации
 */
export function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * Текст поста со ссылкой в конце, для сетей без карточек ссылок
 */
export function composeTextWithLink(post: PreparedPost): string {
  const { content } = post;
  if (content.type === 'url') {
    return content.text ? `${content.text}\n\n${content.url}` : content.url;
  }
  return content.text;
}
