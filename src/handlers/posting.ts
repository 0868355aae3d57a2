import * as path from 'path';
import type { Context } from 'telegraf';
import type { BlogServices } from '../services';
import type { PostRecord } from '../types';
import { buildContent } from '../utils/content';
import { formatRecord, getCommandArgs } from '../utils/telegram';
import { getMessageText } from './commands';

type PostMode = 'queue' | 'now' | 'local';

const EMPTY_POST_HINT = 'Напишите текст поста после команды, например: /now https://example.com|Интересная статья';

function describeRecord(record: PostRecord | null): string {
  return record ? `\n\n${formatRecord(record)}` : '';
}

async function runPost(ctx: Context, services: BlogServices, mode: PostMode, content: string) {
  if (!content) {
    await ctx.reply(EMPTY_POST_HINT);
    return;
  }

  if (mode === 'queue') {
    await services.posting.enqueue(content);
    const entries = await services.queue.readAll();
    await ctx.reply(`✅ Добавлено в очередь (позиция ${entries.length})`);
    return;
  }

  if (mode === 'local') {
    const record = await services.posting.archiveOnly(content);
    await ctx.reply(`💾 Сохранено в архив без публикации${describeRecord(record)}`, { parse_mode: 'HTML' });
    return;
  }

  const statusMessage = await ctx.reply('🔄 Публикую...');
  const outcome = await services.autoPoster.postNow(content);
  const chatId = ctx.chat?.id;

  const text = outcome.success
    ? `✅ Опубликовано${describeRecord(outcome.record)}`
    : `❌ Не удалось опубликовать:\n${outcome.errors.join('\n')}`;

  if (chatId !== undefined) {
    await ctx.telegram.editMessageText(chatId, statusMessage.message_id, undefined, text, {
      parse_mode: outcome.success ? 'HTML' : undefined,
    });
  } else {
    await ctx.reply(text);
  }
}

/**
 * Обычный текст без команды ставится в очередь
 */
export async function handleTextPost(ctx: Context, services: BlogServices) {
  await runPost(ctx, services, 'queue', buildContent(getMessageText(ctx)));
}

export async function handleQueueCommand(ctx: Context, services: BlogServices) {
  await runPost(ctx, services, 'queue', buildContent(getCommandArgs(getMessageText(ctx))));
}

export async function handleNowCommand(ctx: Context, services: BlogServices) {
  await runPost(ctx, services, 'now', buildContent(getCommandArgs(getMessageText(ctx))));
}

export async function handleLocalCommand(ctx: Context, services: BlogServices) {
  await runPost(ctx, services, 'local', buildContent(getCommandArgs(getMessageText(ctx))));
}

/**
 * Разбирает подпись к фото: "/now текст", "/local текст" или просто текст (в очередь)
 */
export function parseCaption(caption: string): { mode: PostMode; text: string } {
  const match = /^\/(now|local|queue)(?:@\S+)?(?:\s+([\s\S]*))?$/.exec(caption.trim());
  if (!match) {
    return { mode: 'queue', text: caption.trim() };
  }
  const mode: PostMode = match[1] === 'now' ? 'now' : match[1] === 'local' ? 'local' : 'queue';
  return { mode, text: (match[2] ?? '').trim() };
}

/**
 * Фото с подписью: сохраняется в IMAGES_DIR, пост имеет вид "файл.jpg|подпись"
 */
export async function handlePhoto(ctx: Context, services: BlogServices) {
  const message = ctx.message;
  if (!message || !('photo' in message) || message.photo.length === 0) {
    return;
  }

  const { mode, text } = parseCaption(message.caption ?? '');
  if (!text) {
    await ctx.reply('❌ Добавьте к фото подпись — она станет текстом поста');
    return;
  }

  // Последний размер в массиве самый большой
  const photo = message.photo[message.photo.length - 1];

  let filename: string;
  try {
    const fileLink = await ctx.telegram.getFileLink(photo.file_id);
    const response = await fetch(fileLink.toString());
    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`HTTP ${response.status}: ${errorText}`);
    }
    const data = Buffer.from(await response.arrayBuffer());
    const extension = path.extname(fileLink.pathname).replace('.', '') || 'jpg';
    filename = await services.images.saveUpload(data, extension);
    console.log(`✅ Фото сохранено: ${filename}`);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error('Ошибка загрузки фото:', error);
    await ctx.reply(`❌ Не удалось сохранить фото: ${errorMessage}`);
    return;
  }

  await runPost(ctx, services, mode, buildContent(text, filename));
}
