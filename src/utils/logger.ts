/**
 * Application logger built on bunyan.
 *
 * Components take a child logger so every record carries its `component`:
 *
 *   const log = componentLogger('SheetMaterializer');
 *   log.info({ pages: [1, 2] }, 'Sheet written');
 */
import bunyan from 'bunyan';

export type LogLevel = bunyan.LogLevelString;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Create a named logger writing JSON records to stdout
 */
export function createLogger(name: string, level: LogLevel = 'info'): bunyan {
  return bunyan.createLogger({
    name,
    level,
    serializers: bunyan.stdSerializers,
  });
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL || '').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export const logger = createLogger('catalog-sheets', levelFromEnv());

// bunyan children copy their parent's streams, so a later level change has to
// reach each of them
const componentLoggers: bunyan[] = [];

export function componentLogger(component: string): bunyan {
  const child = logger.child({ component });
  componentLoggers.push(child);
  return child;
}

/**
 * Change the level of the root logger and every component logger
 */
export function setLogLevel(level: LogLevel): void {
  logger.level(level);
  for (const child of componentLoggers) {
    child.level(level);
  }
}

export default logger;
