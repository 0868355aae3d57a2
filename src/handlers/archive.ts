import type { Context } from 'telegraf';
import type { BlogServices } from '../services';
import { QueueIndexError } from '../services/queue';
import {
  formatArchivePage,
  formatQueue,
  getCommandArgs,
  parseArchiveArgs,
  splitMessage,
} from '../utils/telegram';
import { getMessageText } from './commands';

async function replyHTML(ctx: Context, text: string) {
  for (const chunk of splitMessage(text)) {
    await ctx.reply(chunk, { parse_mode: 'HTML' });
  }
}

export async function handleList(ctx: Context, services: BlogServices) {
  const entries = await services.posting.listQueue();
  await replyHTML(ctx, formatQueue(entries));
}

/**
 * /delete <номер>: номер как в /list, с единицы
 */
export async function handleDelete(ctx: Context, services: BlogServices) {
  const args = getCommandArgs(getMessageText(ctx));
  const position = /^\d+$/.test(args) ? parseInt(args, 10) : NaN;

  if (!Number.isInteger(position) || position < 1) {
    await ctx.reply('Использование: /delete <номер из /list>');
    return;
  }

  try {
    const removed = await services.posting.removeFromQueue(position - 1);
    await ctx.reply(`🗑 Удалено из очереди: ${removed}`);
  } catch (error) {
    if (error instanceof QueueIndexError) {
      await ctx.reply(`❌ В очереди нет записи №${position} (всего ${error.size})`);
      return;
    }
    throw error;
  }
}

export async function handleArchive(ctx: Context, services: BlogServices) {
  const { page, query } = parseArchiveArgs(getCommandArgs(getMessageText(ctx)));
  const result = await services.ledger.getPage({ page, query });
  await replyHTML(ctx, formatArchivePage(result, query));
}

export async function handleSearch(ctx: Context, services: BlogServices) {
  const query = getCommandArgs(getMessageText(ctx));
  if (!query) {
    await ctx.reply('Использование: /search <запрос>');
    return;
  }
  const result = await services.ledger.getPage({ page: 1, query });
  await replyHTML(ctx, formatArchivePage(result, query));
}

/**
 * Дайджест приходит файлом, граница следующего дайджеста сдвигается на текущий момент
 */
export async function handleDigest(ctx: Context, services: BlogServices) {
  const digest = await services.digest.generate(new Date());
  if (!digest) {
    await ctx.reply('📭 С прошлого дайджеста новых записей нет');
    return;
  }

  await ctx.replyWithDocument(
    { source: Buffer.from(digest.content, 'utf-8'), filename: digest.filename },
    { caption: `📰 ${digest.filename}: ссылок ${digest.linkCount} из ${digest.entryCount} записей` }
  );
}
