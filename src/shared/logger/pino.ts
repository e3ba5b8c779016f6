import { pino, type DestinationStream, type Logger } from 'pino';

import { loadEnv } from '@/shared/config/env.js';

let rootLogger: Logger | undefined;

function createRootLogger(): Logger {
  const env = loadEnv();
  const options = { level: env.LOG_LEVEL, base: { service: 'tiff-reel' } };

  if (!env.LOG_FILE) {
    return pino(options);
  }

  const streams: { level: pino.Level; stream: DestinationStream }[] = [
    { level: 'trace', stream: pino.destination({ dest: 1, sync: true }) },
    { level: 'trace', stream: pino.destination({ dest: env.LOG_FILE, mkdir: true, sync: true }) },
  ];

  return pino(options, pino.multistream(streams));
}

export function getRootLogger(): Logger {
  rootLogger ??= createRootLogger();
  return rootLogger;
}

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return getRootLogger().child(bindings);
}
