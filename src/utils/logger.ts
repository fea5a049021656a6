import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level: LogLevel;
  /** Append-only log file written alongside stdout. Empty or omitted disables it. */
  file?: string;
}

const baseOptions = {
  base: null,
  timestamp: pino.stdTimeFunctions.isoTime
};

let instance: pino.Logger = pino({ ...baseOptions, level: 'info' });

export const configureLogger = ({ level, file }: LoggerOptions) => {
  const streams: pino.StreamEntry[] = [{ level, stream: process.stdout }];
  if (file) {
    streams.push({ level, stream: pino.destination({ dest: file, append: true, mkdir: true, sync: true }) });
  }
  instance = pino({ ...baseOptions, level }, pino.multistream(streams));
};

const write = (level: LogLevel) => (message: string, meta?: LogMeta) => {
  if (meta) {
    instance[level](meta, message);
  } else {
    instance[level](message);
  }
};

export const logger = {
  debug: write('debug'),
  info: write('info'),
  warn: write('warn'),
  error: write('error')
};
