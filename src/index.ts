#!/usr/bin/env node
import type { Server } from 'node:http';
import { loadConfig, type AppConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { consoleLogger, type Logger } from './logger.js';
import { createServer } from './server.js';
import { FileCursorStore, MemoryCursorStore } from './services/cursor.js';
import { CsvRecordLog } from './services/recordLog.js';
import { SignalSynthesizer, runSynthesizer } from './services/synthesizer.js';
import { BatchTransmitter } from './services/transmitter.js';
import { systemClock } from './utils/clock.js';

const MODES = ['pipeline', 'generate', 'transmit', 'serve'] as const;
type Mode = (typeof MODES)[number];

function isMode(v: string): v is Mode {
  return MODES.some((m) => m === v);
}

function listen(config: AppConfig, logger: Logger, signal: AbortSignal): Promise<void> {
  const { app, sse } = createServer(config.server, logger);
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(config.server.port, () => {
      logger.info(`API listening on http://0.0.0.0:${config.server.port}`);
    });
    server.on('error', reject);
    signal.addEventListener(
      'abort',
      () => {
        sse.closeAll();
        server.close((err) => (err ? reject(err) : resolve()));
      },
      { once: true }
    );
  });
}

async function main(argv: string[], logger: Logger = consoleLogger): Promise<number> {
  const mode = argv[0] ?? 'pipeline';
  if (!isMode(mode)) {
    logger.error(`Unknown mode "${mode}". Expected one of: ${MODES.join(', ')}`);
    return 2;
  }

  let config: AppConfig;
  let synthesizer: SignalSynthesizer;
  try {
    config = loadConfig();
    synthesizer = new SignalSynthesizer(config.synthesis);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      logger.error(e.message);
      return 1;
    }
    throw e;
  }

  const controller = new AbortController();
  const stop = () => {
    if (controller.signal.aborted) return;
    logger.info('Stopping...');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const log = new CsvRecordLog(config.logPath);
  const tasks: Promise<unknown>[] = [];

  if (mode === 'generate' || mode === 'pipeline') {
    tasks.push(runSynthesizer({ synthesizer, log, clock: systemClock, logger, signal: controller.signal }));
  }
  if (mode === 'transmit' || mode === 'pipeline') {
    const transmitter = new BatchTransmitter({
      config: config.transmit,
      log,
      cursor: config.cursorPath ? new FileCursorStore(config.cursorPath) : new MemoryCursorStore(),
      clock: systemClock,
      logger
    });
    tasks.push(transmitter.runLoop(controller.signal));
  }
  if (mode === 'serve') {
    tasks.push(listen(config, logger, controller.signal));
  }

  try {
    await Promise.all(tasks);
  } catch (e) {
    controller.abort();
    await Promise.allSettled(tasks);
    logger.error(`Fatal: ${errorMessage(e)}`);
    return 1;
  }
  logger.info('stopped');
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    consoleLogger.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exitCode = 1;
  }
);
