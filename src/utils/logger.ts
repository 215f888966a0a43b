import pino, { type Logger } from 'pino';
import dayjs from 'dayjs';
import path from 'path';

const level = process.env.LOG_LEVEL || 'info';

// LOG_DIR='' keeps everything on stdout (used by the test runner)
function streams(): pino.StreamEntry[] {
  const out: pino.StreamEntry[] = [{ level: 'trace', stream: process.stdout }];
  const logsDir = process.env.LOG_DIR ?? path.join(process.cwd(), 'logs');
  if (logsDir) {
    const logfile = path.join(logsDir, `run-${dayjs().format('YYYYMMDD-HHmmss')}.log`);
    out.push({ level: 'trace', stream: pino.destination({ dest: logfile, sync: false, mkdir: true }) });
  }
  return out;
}

export const logger: Logger = pino({ level }, pino.multistream(streams()));

export type LogLevel = 'info' | 'warn' | 'error';

/**
 * Ordered history of one run. Every entry is mirrored to the process logger;
 * `entries()` is what ends up in the run's log files.
 */
export class RunLog {
  private lines: string[] = [];

  constructor(private sink: Logger = logger) {}

  push(level: LogLevel, msg: string) {
    this.lines.push(msg);
    this.sink[level](msg);
  }

  entries() { return [...this.lines]; }
}
