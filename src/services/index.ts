import type { Telegram } from 'telegraf';
import { DigestService } from './digest';
import { ContentEnricher } from './enricher';
import { ImageProcessor } from './image';
import { LedgerStore } from './ledger';
import { PostingService } from './posting';
import { createConfiguredTargets, SocialPublisher } from './publisher';
import { QueueStore } from './queue';
import { AutoPoster } from './scheduler';
import { SettingsService } from './settings';

export interface BlogServices {
  settings: SettingsService;
  ledger: LedgerStore;
  queue: QueueStore;
  images: ImageProcessor;
  posting: PostingService;
  autoPoster: AutoPoster;
  digest: DigestService;
}

/**
 * Собирает сервисы блога. Пути и интервалы берутся из переменных окружения.
 * telegram нужен только для публикации в канал.
 */
export function createBlogServices(telegram: Telegram | null = null): BlogServices {
  const settings = new SettingsService();
  const ledger = new LedgerStore();
  const queue = new QueueStore();
  const images = new ImageProcessor();
  const enricher = new ContentEnricher(images);
  const publisher = new SocialPublisher({ targets: () => createConfiguredTargets(settings, telegram) });
  const posting = new PostingService({ queue, ledger, enricher, publisher });

  return {
    settings,
    ledger,
    queue,
    images,
    posting,
    autoPoster: new AutoPoster({ posting }),
    digest: new DigestService(ledger, settings),
  };
}
