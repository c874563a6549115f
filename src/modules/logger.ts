import { pino, type Logger, type LevelWithSilentOrString } from "pino";

const logger = pino({ level: process.env.LOG_LEVEL ?? "info" });
const componentLoggers: Logger[] = [];

/**
 * Creates a child logger that tags every line with the component name
 * @param component Name of the pipeline component, e.g. "gap-fixer"
 */
export function createLogger(component: string): Logger {
  const child = logger.child({ component });
  componentLoggers.push(child);
  return child;
}

/**
 * Updates the logger level for minimal or maximal logs
 * @param level pino log level (https://github.com/pinojs/pino/blob/main/docs/api.md#logger-level)
 */
export function setMinLogLevel(level: LevelWithSilentOrString) {
  logger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
}

export default logger;
