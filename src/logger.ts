import { Subject } from 'rxjs';
import type { Observable } from 'rxjs';
import type { LogEntry, LogLevel } from './types';

const PREFIX = '[ULink]';

/**
 * Debug-gated logger.
 *
 * While debug is on, every call prints to the console and is emitted on
 * `entries$`. Misuse warnings (`warnAlways`) print even when debug is off.
 */
export class Logger {
  private readonly subject = new Subject<LogEntry>();
  readonly entries$: Observable<LogEntry> = this.subject.asObservable();

  constructor(
    private readonly debugEnabled: boolean,
    private readonly now: () => number = Date.now
  ) {}

  debug(tag: string, message: string, detail?: unknown): void {
    this.log('debug', tag, message, detail);
  }

  info(tag: string, message: string, detail?: unknown): void {
    this.log('info', tag, message, detail);
  }

  warn(tag: string, message: string, detail?: unknown): void {
    this.log('warning', tag, message, detail);
  }

  error(tag: string, message: string, detail?: unknown): void {
    this.log('error', tag, message, detail);
  }

  /**
   * Console warning regardless of debug mode
   */
  warnAlways(message: string): void {
    console.warn(`${PREFIX} ${message}`);
  }

  close(): void {
    this.subject.complete();
  }

  private log(level: LogLevel, tag: string, message: string, detail?: unknown): void {
    if (!this.debugEnabled) {
      return;
    }

    const line = `${PREFIX}[${tag}] ${message}`;
    if (detail === undefined) {
      console.log(line);
    } else {
      console.log(line, detail);
    }

    this.subject.next({ level, tag, message, timestamp: this.now() });
  }
}
