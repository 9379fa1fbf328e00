import { parseArgs } from 'node:util';
import { ConfigurationError, describeError } from '../shared/errors';
import { logger } from './logger';
import { MainApp } from './MainApp';
import { SettingsService } from './services/SettingsService';

const USAGE = 'Usage: plex-player-sync [--config <path>] [--once] [--reset-cache]';

interface CommandLine {
  configPath: string;
  once: boolean;
  resetCache: boolean;
}

function parseCommandLine(argv: string[]): CommandLine {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      once: { type: 'boolean', default: false },
      'reset-cache': { type: 'boolean', default: false }
    }
  });
  return {
    configPath: values.config ?? process.env.PLEX_SYNC_CONFIG ?? 'config.json',
    once: values.once ?? false,
    resetCache: values['reset-cache'] ?? false
  };
}

async function main(): Promise<void> {
  let commandLine: CommandLine;
  try {
    commandLine = parseCommandLine(process.argv.slice(2));
  } catch (error) {
    // eslint-disable-next-line no-console -- Usage errors are shown without log decoration.
    console.error(`${describeError(error)}\n${USAGE}`);
    process.exitCode = 2;
    return;
  }

  const mainApp = new MainApp(new SettingsService(commandLine.configPath));
  const controller = new AbortController();
  const requestStop = (signalName: string): void => {
    if (!controller.signal.aborted) {
      logger.info(`Received ${signalName}, stopping…`);
      controller.abort();
    }
  };
  process.on('SIGINT', () => requestStop('SIGINT'));
  process.on('SIGTERM', () => requestStop('SIGTERM'));
  process.on('exit', () => mainApp.killPlayer());

  mainApp.initialize();
  try {
    if (commandLine.resetCache) {
      logger.info(`Cleared ${mainApp.resetCache()} cached folder identities`);
      return;
    }
    await mainApp.run(controller.signal, commandLine.once);
  } finally {
    await mainApp.dispose();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    // eslint-disable-next-line no-console -- Configuration problems are shown without log decoration.
    console.error(error.message);
  } else {
    logger.error(`Failed to run: ${describeError(error)}`);
  }
  process.exitCode = 1;
});
