/**
 * Structured logging for the runtime gates.
 *
 * Emits one JSON line per event with:
 * - timestamp, level, event name, and any extra fields
 *
 * Lines go to stdout by default so any log aggregator that reads JSON
 * from stdout picks them up.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogSink = (line: string) => void

export interface Logger {
  log(level: LogLevel, event: string, fields?: Record<string, unknown>): void
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line + '\n')
}

export function createLogger(sink: LogSink = stdoutSink, now: () => Date = () => new Date()): Logger {
  return {
    log(level, event, fields = {}) {
      const entry = {
        ts: now().toISOString(),
        level,
        event,
        ...fields,
      }
      sink(JSON.stringify(entry))
    },
  }
}

export const defaultLogger: Logger = createLogger()
