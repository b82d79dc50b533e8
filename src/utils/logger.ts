/**
 * Application logger (pino)
 */

import pino, { type DestinationStream, type LevelWithSilent } from 'pino';
import { config } from '../config/index.js';

export interface LoggerOptions {
  name: string;
  env: string;
  level: LevelWithSilent;
}

/**
 * Build a logger writing to one or more destinations
 */
export function createLogger(options: LoggerOptions, streams: DestinationStream[]) {
  const [primary, ...rest] = streams;
  // Multistream entries default to 'info'; the logger level does the filtering
  const destination =
    rest.length === 0
      ? primary
      : pino.multistream(streams.map((stream) => ({ stream, level: 'trace' as const })));

  return pino(
    {
      name: options.name,
      level: options.level,
      base: { env: options.env },
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { error: pino.stdSerializers.err },
    },
    destination
  );
}

function createStreams(): DestinationStream[] {
  const streams: DestinationStream[] = [pino.destination(1)];
  if (config.logging.file) {
    streams.push(pino.destination({ dest: config.logging.file, mkdir: true, sync: false }));
  }
  return streams;
}

export const logger = createLogger(
  { name: config.app.name, env: config.app.env, level: config.logging.level },
  createStreams()
);

export type Logger = typeof logger;
