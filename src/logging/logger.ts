import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import type { TrackbotConfig } from '../config.js';

/**
 * Logger used until the environment has been parsed. The level is fixed:
 * LOG_LEVEL is not validated yet and pino throws on levels it doesn't know.
 */
export function createBootLogger(stdout: DestinationStream = process.stdout): Logger {
  return pino({ level: 'info' }, stdout);
}

/** Every record goes to stdout and to the log file that !download_log exports. */
export function createLogger(
  cfg: Pick<TrackbotConfig, 'logLevel' | 'logFile'>,
  stdout: DestinationStream = process.stdout,
): Logger {
  return pino(
    { level: cfg.logLevel },
    pino.multistream([
      { level: 'trace', stream: stdout },
      { level: 'trace', stream: pino.destination({ dest: cfg.logFile, mkdir: true, sync: true }) },
    ]),
  );
}
