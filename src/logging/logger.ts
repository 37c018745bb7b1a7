import pino, { type Logger } from 'pino'

export type { Logger }

/**
 * Root logger. JSON lines on stderr so stdout stays free for callers.
 * The level comes from `LOG_LEVEL` and defaults to `info`.
 */
const rootLogger: Logger = pino(
  {
    name: 'agent-loop',
    level: process.env['LOG_LEVEL'] ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination({ dest: 2, sync: true })
)

/**
 * Creates a child logger tagged with a component name.
 *
 * @param component - Name of the module doing the logging
 * @returns Logger bound to the component
 */
export function createLogger(component: string): Logger {
  return rootLogger.child({ component })
}

/**
 * Changes the level of the root logger and every child created from it
 * afterwards.
 */
export function setLogLevel(level: string): void {
  rootLogger.level = level
}
