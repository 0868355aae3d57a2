import type { Context } from 'telegraf';
import type { BlogServices } from '../services';
import { isSettingKey, maskSetting, SETTING_KEYS } from '../services/settings';
import { escapeHTML, getCommandArgs, getMainKeyboard } from '../utils/telegram';
import { formatDisplayTime } from '../utils/timezone';

const HELP_TEXT = `📝 <b>Микроблог</b>

Просто отправьте текст — он встанет в очередь автопостинга.
Формат поста:
• <code>текст</code> — обычный пост
• <code>https://example.com|комментарий</code> — ссылка с карточкой
• <code>картинка.jpg|подпись</code> — изображение из папки images

<b>Публикация</b>
/queue &lt;пост&gt; — добавить в очередь
/now &lt;пост&gt; — опубликовать сразу
/local &lt;пост&gt; — только в архив, без соцсетей
Фото с подписью — в очередь; подпись с /now или /local работает как команда

<b>Очередь и архив</b>
/list — очередь
/delete &lt;номер&gt; — удалить из очереди
/archive [страница] [запрос] — архив
/search &lt;запрос&gt; — поиск по архиву
/digest — дайджест ссылок с прошлого раза

<b>Сервис</b>
/status — состояние автопостинга
/settings — настройки
/set &lt;ключ&gt; &lt;значение&gt; — изменить настройку`;

export function getMessageText(ctx: Context): string {
  const message = ctx.message;
  if (!message) {
    return '';
  }
  if ('text' in message) {
    return message.text;
  }
  if ('caption' in message && message.caption) {
    return message.caption;
  }
  return '';
}

export async function handleStart(ctx: Context) {
  await ctx.reply('👋 Бот управления микроблогом запущен.\n\n' + HELP_TEXT, {
    parse_mode: 'HTML',
    ...getMainKeyboard(),
  });
}

export async function handleHelp(ctx: Context) {
  await ctx.reply(HELP_TEXT, { parse_mode: 'HTML', ...getMainKeyboard() });
}

export async function handleStatus(ctx: Context, services: BlogServices) {
  const { autoPoster, queue, settings } = services;
  const entries = await queue.readAll();
  const nextAt = autoPoster.getNextEligibleAt();

  const lines = [
    `🤖 Автопостинг: ${autoPoster.isRunning() ? 'работает' : 'остановлен'}`,
    `Последняя успешная публикация: ${formatDisplayTime(autoPoster.getLastSuccessAt())}`,
    `Следующая не раньше: ${nextAt.getTime() <= Date.now() ? 'на ближайшей проверке' : formatDisplayTime(nextAt)}`,
    `В очереди: ${entries.length}`,
    `Настройки: ${settings.backendDescription}`,
  ];

  await ctx.reply(lines.join('\n'));
}

export async function handleSettings(ctx: Context, services: BlogServices) {
  const values = await services.settings.getAll();
  const lines = SETTING_KEYS.map(key => `<code>${key}</code>: ${escapeHTML(maskSetting(key, values[key]))}`);
  await ctx.reply(`⚙️ <b>Настройки</b> (${escapeHTML(services.settings.backendDescription)})\n\n${lines.join('\n')}`, {
    parse_mode: 'HTML',
  });
}

export async function handleSet(ctx: Context, services: BlogServices) {
  const args = getCommandArgs(getMessageText(ctx));
  const match = /^(\S+)\s+([\s\S]+)$/.exec(args);

  if (!match) {
    await ctx.reply(`Использование: /set <ключ> <значение>\nКлючи: ${SETTING_KEYS.join(', ')}`);
    return;
  }

  const [, key, value] = match;
  if (!isSettingKey(key)) {
    await ctx.reply(`❌ Неизвестная настройка: ${key}\nКлючи: ${SETTING_KEYS.join(', ')}`);
    return;
  }

  await services.settings.set(key, value);
  await ctx.reply(`✅ ${key} = ${maskSetting(key, value.trim())}`);
}
