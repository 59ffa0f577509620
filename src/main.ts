import { loadConfigFromEnv } from './config';
import { generateCards } from './services/cardBatch';
import { createConsoleLogger } from './services/logger';
import { getErrorMessage } from './utils/error';

const logger = createConsoleLogger();

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const report = await generateCards({ config, logger });
  if (report.skippedWords.length) {
    logger.warn(`${report.skippedWords.length} words could not be rendered`);
  }
}

main().catch((error: unknown) => {
  logger.error(getErrorMessage(error));
  process.exitCode = 1;
});
