// Запись опубликованного поста в posted.txt
export interface PostRecord {
  // Время публикации (с точностью до секунды)
  timestamp: Date;
  // Ссылка (только у постов-ссылок)
  url: string | null;
  // Заголовок страницы по ссылке
  headline: string | null;
  // Имя локального файла изображения в IMAGES_DIR
  image: string | null;
  // Краткое описание страницы (до 200 символов)
  summary: string | null;
  // Комментарий автора
  commentary: string | null;
}

// Результат разбора сырого содержимого поста
export type ParsedContent =
  | { type: 'text'; text: string }
  | { type: 'url'; url: string; text: string }
  | { type: 'image'; image: string; text: string };

// Метаданные страницы по ссылке
export interface PageMetadata {
  title: string;
  description: string;
  imageUrl: string | null;
}

// Пост, подготовленный к публикации и архивированию
export interface PreparedPost {
  // Исходная строка из очереди или от оператора
  raw: string;
  content: ParsedContent;
  // Метаданные (только для ссылок)
  metadata: PageMetadata | null;
  // Изображение для публикации (JPEG, не больше 1200px)
  imageData: Buffer | null;
  // Исходные байты превью ссылки для миниатюры в архиве
  previewData: Buffer | null;
}

// Страница архива
export interface PostsPage {
  entries: PostRecord[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

// Результат публикации во все настроенные соцсети
export interface PublishResult {
  success: boolean;
  errors: string[];
}

export interface Publisher {
  publish(post: PreparedPost): Promise<PublishResult>;
}

// Что произошло на очередном тике автопостинга
export type TickOutcome = 'waiting' | 'empty' | 'skipped-blank' | 'posted' | 'failed';

export interface TickResult {
  outcome: TickOutcome;
  entry?: string;
  record?: PostRecord;
  errors?: string[];
}
