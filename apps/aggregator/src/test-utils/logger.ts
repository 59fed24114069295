import { createLogger, type ILogger, type LogEntry } from '@pricehound/logger'

export function createSilentLogger(): ILogger {
  return createLogger('test', { level: 'fatal', sink: () => undefined })
}

/** Logger that keeps every entry, debug included */
export function createRecordingLogger(): { logger: ILogger; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const logger = createLogger('test', {
    level: 'debug',
    format: 'json',
    sink: entry => {
      entries.push(entry)
    },
  })
  return { logger, entries }
}
