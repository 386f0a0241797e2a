import pino, { type Logger as PinoLogger, type LevelWithSilent } from 'pino';

export type Logger = PinoLogger;

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent'
];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Log level from the environment.
 *
 * PROJECTION_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent (the compiler runs inside other tools' builds)
 */
function getLogLevel(): LevelWithSilent {
  const level = process.env['PROJECTION_LOG_LEVEL']?.toLowerCase();
  return level && isLogLevel(level) ? level : 'silent';
}

/**
 * Creates the root logger. Output goes to stderr so generated code written to
 * stdout by a host CLI stays clean.
 */
export function createLogger(): Logger {
  return pino(
    {
      name: 'projection',
      level: getLogLevel(),
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err
      }
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Component logger derived from `root` (or a fresh root logger).
 */
export function componentLogger(component: string, root?: Logger): Logger {
  return (root ?? createLogger()).child({ component });
}
