// Suppress blessed tput warnings (stderr and stdout)
const suppressPatterns = [
  'xterm-256color',
  'Error on',
  'Setulc',
  'stack.push',
  'stack.pop',
  'out.push',
  '%p1%',
  '\\u001b'
];

const shouldSuppress = (chunk: Uint8Array | string): boolean => {
  if (typeof chunk !== 'string') return false;
  return suppressPatterns.some(pattern => chunk.includes(pattern));
};

type WriteCallback = (err?: Error | null) => void;

function filterWrites(stream: NodeJS.WriteStream): void {
  const originalWrite = stream.write.bind(stream);
  stream.write = (
    chunk: Uint8Array | string,
    encodingOrCallback?: BufferEncoding | WriteCallback,
    callback?: WriteCallback
  ): boolean => {
    if (shouldSuppress(chunk)) return true;
    if (typeof encodingOrCallback === 'function') {
      return originalWrite(chunk, encodingOrCallback);
    }
    return originalWrite(chunk, encodingOrCallback, callback);
  };
}

filterWrites(process.stderr);
filterWrites(process.stdout);

import dotenv from 'dotenv';
import fs from 'fs-extra';
import { SHUTDOWN_TIMEOUT, createMulberry32, getErrorMessage, isConfigurationError } from '@loopcast/shared';
import {
  LibraryStore,
  PlayHistory,
  PlaybackController,
  cleanupTempFiles,
  loadConfig,
  logger,
  scanCache,
} from '@loopcast/core';
import { ProcessMediaSource, resolvePlayerCommand } from './media/ProcessMediaSource.js';
import { App } from './tui/App.js';

const COMPONENT = 'Main';

async function main() {
  dotenv.config();

  const config = loadConfig();
  if (config.logLevel) {
    logger.setLevel(config.logLevel);
  }

  // Clean up leftovers from interrupted downloads before the first scan
  await fs.ensureDir(config.cacheDir);
  await cleanupTempFiles(config.cacheDir);

  const library = new LibraryStore();
  await scanCache(config.cacheDir, library);

  const history = new PlayHistory(config.cacheDir);
  const playedIds = await history.load();

  const media = new ProcessMediaSource({ command: resolvePlayerCommand(config.playerCommand) });

  let controller: PlaybackController | null = null;
  let rescanTimer: ReturnType<typeof setInterval> | null = null;
  let isShuttingDown = false;

  const saveHistory = async (): Promise<void> => {
    if (!controller) return;
    await history.save(controller.getPlayedIds());
  };

  const rescan = async (): Promise<number> => scanCache(config.cacheDir, library);

  // Handle graceful shutdown with timeout
  const shutdown = async (exitCode = 0) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    // Force exit if cleanup takes too long
    const forceExitTimer = setTimeout(() => {
      console.error('Shutdown timeout - forcing exit');
      process.exit(exitCode);
    }, SHUTDOWN_TIMEOUT);

    if (rescanTimer) {
      clearInterval(rescanTimer);
      rescanTimer = null;
    }

    try {
      await saveHistory();
    } catch (e) {
      console.error('Error saving play history:', e);
    }

    try {
      controller?.dispose();
      media.dispose();
    } catch (e) {
      console.error('Error stopping playback:', e);
    }

    logger.setSink(null);
    app.destroy();

    clearTimeout(forceExitTimer);
    process.exit(exitCode);
  };

  const app = new App({
    media,
    actions: {
      stopCurrent: () => media.stop(),
      rescan,
      clearHistory: async () => {
        controller?.clearPlayedIds();
        await history.clear();
      },
      quit: () => {
        void shutdown(0);
      },
    },
  });

  // From here on log records go to the log panel instead of the terminal
  logger.setSink((level, line) => app.panels.log.write(level, line));

  controller = new PlaybackController({
    library,
    media,
    overlay: app.panels.overlay,
    host: app,
    mode: config.mode,
    continuousWhenHidden: config.continuousWhenHidden,
    timings: { tickIntervalMs: config.tickIntervalMs },
    playedIds,
    random: config.seed === null ? Math.random : createMulberry32(config.seed),
  });
  app.attachController(controller);

  controller.on('itemStarted', () => {
    saveHistory().catch((error: unknown) => {
      logger.error(COMPONENT, 'Error saving play history', error);
    });
  });

  if (config.rescanIntervalMs > 0) {
    rescanTimer = setInterval(() => {
      rescan().catch((error: unknown) => {
        logger.error(COMPONENT, 'Cache rescan failed', error, { cacheDir: config.cacheDir });
      });
    }, config.rescanIntervalMs);
  }

  process.on('SIGINT', () => {
    void shutdown(0);
  });
  process.on('SIGTERM', () => {
    void shutdown(0);
  });
  process.on('uncaughtException', (error) => {
    logger.setSink(null);
    console.error('Uncaught Exception:', error);
    void shutdown(1);
  });
  process.on('unhandledRejection', (reason) => {
    logger.setSink(null);
    console.error('Unhandled Rejection:', reason);
    void shutdown(1);
  });

  logger.info(COMPONENT, `Starting in ${config.mode} mode`, {
    cacheDir: config.cacheDir,
    items: library.size,
    played: playedIds.length,
  });

  controller.start();
  app.run();
}

main().catch((error: unknown) => {
  logger.setSink(null);
  if (isConfigurationError(error)) {
    console.error('Invalid configuration:');
    for (const issue of error.issues) {
      console.error(`  ${issue}`);
    }
  } else {
    console.error('Fatal error in main():', getErrorMessage(error));
  }
  process.exit(1);
});
