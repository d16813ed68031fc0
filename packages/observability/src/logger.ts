export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
    return;
  }

  console.log(line);
};

let sink: LogSink = consoleSink;

/** Swap the output sink; pass nothing to restore console output. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? consoleSink;
}

export function log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    metadata: metadata ?? {}
  };

  sink(level, JSON.stringify(entry));
}
