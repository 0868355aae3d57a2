import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import sharp from 'sharp';
import { ContentEnricher, type MetadataFetcher, truncateSummary } from '../../src/services/enricher';
import { ImageProcessor } from '../../src/services/image';

const timestamp = new Date(Date.UTC(2024, 2, 15, 14, 30, 0));

describe('truncateSummary', () => {
  it('обрезает до 200 символов и добавляет многоточие', () => {
    expect(truncateSummary('d'.repeat(250))).toBe(`${'d'.repeat(200)}...`);
    expect(truncateSummary('d'.repeat(200))).toBe('d'.repeat(200));
    expect(truncateSummary('')).toBeNull();
  });
});

describe('ContentEnricher', () => {
  let dir: string;
  let images: ImageProcessor;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'enricher-test-'));
    images = new ImageProcessor(dir);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it('текстовый пост не ходит в сеть', async () => {
    const fetcher = vi.fn<MetadataFetcher>();
    const enricher = new ContentEnricher(images, fetcher);

    const post = await enricher.prepare('just text');
    const record = await enricher.toRecord(post, timestamp);

    expect(fetcher).not.toHaveBeenCalled();
    expect(record).toEqual({
      timestamp,
      url: null,
      headline: null,
      image: null,
      summary: null,
      commentary: 'just text',
    });
  });

  it('ссылка получает заголовок и обрезанное описание', async () => {
    const fetcher = vi.fn<MetadataFetcher>(async () => ({
      title: 'Example',
      description: 'd'.repeat(250),
      imageUrl: null,
    }));
    const enricher = new ContentEnricher(images, fetcher);

    const post = await enricher.prepare('https://example.com/article|nice');
    expect(post.imageData).toBeNull();

    const record = await enricher.toRecord(post, timestamp);
    expect(fetcher).toHaveBeenCalledWith('https://example.com/article');
    expect(record).toEqual({
      timestamp,
      url: 'https://example.com/article',
      headline: 'Example',
      image: null,
      summary: `${'d'.repeat(200)}...`,
      commentary: 'nice',
    });
  });

  it('ссылка без комментария пишет NULL в комментарий', async () => {
    const enricher = new ContentEnricher(images, async url => ({ title: url, description: '', imageUrl: null }));
    const record = await enricher.toRecord(await enricher.prepare('https://example.com/x|'), timestamp);
    expect(record.commentary).toBeNull();
    expect(record.summary).toBeNull();
    expect(record.headline).toBe('https://example.com/x');
  });

  it('превью сохраняется миниатюрой, для публикации нормализуется', async () => {
    const png = await sharp({ create: { width: 600, height: 300, channels: 3, background: '#336699' } })
      .png()
      .toBuffer();
    vi.stubGlobal('fetch', vi.fn(async () => new Response(new Uint8Array(png))));
    const enricher = new ContentEnricher(images, async () => ({
      title: 'Pic',
      description: 'About',
      imageUrl: 'https://cdn.example/cover.png',
    }));

    const post = await enricher.prepare('https://example.com/article|look');
    const published = await sharp(post.imageData ?? Buffer.alloc(0)).metadata();
    expect(published.format).toBe('jpeg');
    expect([published.width, published.height]).toEqual([600, 300]);

    const record = await enricher.toRecord(post, timestamp);
    expect(record.image).toBe('link_141fbc787408.jpg');
    const thumb = await sharp(path.join(dir, 'link_141fbc787408.jpg')).metadata();
    expect([thumb.width, thumb.height]).toEqual([300, 200]);
  });

  it('ошибка загрузки превью оставляет поле картинки пустым', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404 })));
    const enricher = new ContentEnricher(images, async () => ({
      title: 'Pic',
      description: '',
      imageUrl: 'https://cdn.example/404.png',
    }));

    const post = await enricher.prepare('https://example.com/article|look');
    expect(post.imageData).toBeNull();
    expect(post.previewData).toBeNull();
    expect((await enricher.toRecord(post, timestamp)).image).toBeNull();
  });

  it('картинка из очереди попадает в запись, даже если файла нет', async () => {
    const enricher = new ContentEnricher(images, vi.fn<MetadataFetcher>());
    const post = await enricher.prepare('missing.jpg|Caption');

    expect(post.imageData).toBeNull();
    const record = await enricher.toRecord(post, timestamp);
    expect(record.image).toBe('missing.jpg');
    expect(record.commentary).toBe('Caption');
  });
});
