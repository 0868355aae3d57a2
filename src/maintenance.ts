import 'dotenv/config';
import { ContentEnricher } from './services/enricher';
import { migrateLegacyLedger, resetDigestDate, sortLedger } from './services/maintenance';
import { SettingsService } from './services/settings';

const USAGE = `Использование:
  npm run maintenance -- sort [входной_файл] [выходной_файл]
  npm run maintenance -- migrate [файл]
  npm run maintenance -- reset-digest [дней]`;

function postedFile(): string {
  return process.env.POSTED_FILE || 'posted.txt';
}

async function main(args: string[]): Promise<void> {
  const [command, ...rest] = args;

  switch (command) {
    case 'sort': {
      const result = await sortLedger(rest[0] || postedFile(), rest[1]);
      console.log(`Обработано строк: ${result.processed}`);
      console.log(`Удалено повторов: ${result.duplicatesRemoved}`);
      console.log(`Записано строк: ${result.written}`);
      console.log(`✅ Результат записан в ${result.outputPath}`);
      return;
    }
    case 'migrate': {
      const result = await migrateLegacyLedger(rest[0] || postedFile(), new ContentEnricher());
      console.log(`Переведено ${result.migrated + result.kept} из ${result.total} записей`);
      return;
    }
    case 'reset-digest': {
      const days = rest[0] ? parseInt(rest[0], 10) : 7;
      if (!Number.isFinite(days) || days < 0) {
        throw new Error(`Некорректное число дней: ${rest[0]}`);
      }
      const value = await resetDigestDate(new SettingsService(), days);
      console.log(`✅ Граница дайджеста установлена: ${value}`);
      return;
    }
    default:
      console.log(USAGE);
      process.exitCode = 1;
  }
}

main(process.argv.slice(2)).catch(error => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`❌ ${message}`);
  process.exit(1);
});
