import 'dotenv/config';
import { Telegraf } from 'telegraf';
import { handleHelp, handleSet, handleSettings, handleStart, handleStatus } from './handlers/commands';
import { handleLocalCommand, handleNowCommand, handlePhoto, handleQueueCommand, handleTextPost } from './handlers/posting';
import { handleArchive, handleDelete, handleDigest, handleList, handleSearch } from './handlers/archive';
import { createBlogServices } from './services';
import { ensureImagesDir } from './utils/dataFiles';
import { BUTTONS } from './utils/telegram';

const BOT_TOKEN = process.env.TELEGRAM_BOT_TOKEN;

if (!BOT_TOKEN) {
  console.error('❌ TELEGRAM_BOT_TOKEN не установлен в переменных окружения!');
  console.error('Создайте файл .env и добавьте TELEGRAM_BOT_TOKEN=your_token_here');
  process.exit(1);
}

const ADMIN_USER_ID = process.env.ADMIN_USER_ID?.trim();

const bot = new Telegraf(BOT_TOKEN, {
  handlerTimeout: 300000, // 5 минут: публикация с загрузкой картинок может быть долгой
});

const services = createBlogServices(bot.telegram);

// Инициализация
async function initialize() {
  try {
    await ensureImagesDir(services.images.imagesDir);
    console.log(`✅ Директория изображений: ${services.images.imagesDir}`);
  } catch (error) {
    console.error('❌ Ошибка при создании директории изображений:', error);
  }

  const isConnected = await services.settings.checkConnection();
  if (isConnected) {
    console.log(`✅ Настройки доступны (${services.settings.backendDescription})`);
  } else {
    console.warn('⚠️ Хранилище настроек недоступно. Проверьте SUPABASE_URL, SUPABASE_ANON_KEY или SETTINGS_FILE');
  }

  if (!ADMIN_USER_ID) {
    console.warn('⚠️ ADMIN_USER_ID не задан: управлять блогом может любой пользователь бота');
  }
}

// Блогом управляет только владелец
bot.use(async (ctx, next) => {
  if (!ADMIN_USER_ID) {
    return next();
  }
  if (!ctx.from) {
    return;
  }
  if (String(ctx.from.id) !== ADMIN_USER_ID) {
    console.warn(`⚠️ Отклонен запрос от пользователя ${ctx.from.id}`);
    await ctx.reply('⛔ Этот бот управляет личным блогом и доступен только владельцу.');
    return;
  }
  return next();
});

// Обработчики команд
bot.command('start', handleStart);
bot.command('help', handleHelp);
bot.command('status', ctx => handleStatus(ctx, services));
bot.command('settings', ctx => handleSettings(ctx, services));
bot.command('set', ctx => handleSet(ctx, services));
bot.command('queue', ctx => handleQueueCommand(ctx, services));
bot.command('now', ctx => handleNowCommand(ctx, services));
bot.command('local', ctx => handleLocalCommand(ctx, services));
bot.command('list', ctx => handleList(ctx, services));
bot.command('delete', ctx => handleDelete(ctx, services));
bot.command('archive', ctx => handleArchive(ctx, services));
bot.command('search', ctx => handleSearch(ctx, services));
bot.command('digest', ctx => handleDigest(ctx, services));

bot.on('photo', ctx => handlePhoto(ctx, services));

// Обработчик текстовых сообщений (кнопки и посты в очередь)
bot.on('text', async (ctx) => {
  const text = ctx.message.text;

  // Игнорируем команды (они обрабатываются отдельными обработчиками)
  if (text.startsWith('/')) {
    return;
  }

  // Обрабатываем нажатия на кнопки клавиатуры
  switch (text) {
    case BUTTONS.help:
      await handleHelp(ctx);
      return;
    case BUTTONS.queue:
      await handleList(ctx, services);
      return;
    case BUTTONS.archive:
      await handleArchive(ctx, services);
      return;
    case BUTTONS.digest:
      await handleDigest(ctx, services);
      return;
    default:
      await handleTextPost(ctx, services);
  }
});

// Обработка ошибок
bot.catch((err, ctx) => {
  console.error('Ошибка в боте:', err);
  const message = err instanceof Error ? err.message : String(err);
  ctx.reply(`❌ Произошла ошибка: ${message}`).catch(replyError => {
    console.error('Не удалось отправить сообщение об ошибке:', replyError);
  });
});

// Запуск бота
async function start() {
  await initialize();

  console.log('🚀 Запуск Telegram бота...');
  services.autoPoster.start();

  await bot.launch(() => {
    console.log('✅ Бот успешно запущен!');
  });
}

function shutdown(signal: string) {
  services.autoPoster.stop();
  bot.stop(signal);
}

// Graceful shutdown
process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

start().catch(error => {
  console.error('❌ Ошибка при запуске бота:', error);
  process.exit(1);
});
