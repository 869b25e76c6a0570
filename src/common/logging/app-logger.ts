import { appendFileSync } from 'fs';
import { ConsoleLogger, type ConsoleLoggerOptions } from '@nestjs/common';
import dayjs from 'dayjs';

export type DiagnosticsLevel = 'warn' | 'error';

export interface AppLoggerOptions extends ConsoleLoggerOptions {
  /** Append-only file that receives warnings and errors. */
  errorLogPath: string;
  /** Lowest severity written to the file. */
  fileLevel?: DiagnosticsLevel;
}

/**
 * Console logger that also keeps an append-only diagnostics file.
 * Per-asset pricing failures never fail a run, so this file is where they surface.
 */
export class AppLogger extends ConsoleLogger {
  private readonly errorLogPath: string;
  private readonly fileLevel: DiagnosticsLevel;

  constructor(context: string, options: AppLoggerOptions) {
    const { errorLogPath, fileLevel, ...consoleOptions } = options;
    super(context, consoleOptions);
    this.errorLogPath = errorLogPath;
    this.fileLevel = fileLevel ?? 'warn';
  }

  override warn(message: unknown, ...optionalParams: unknown[]) {
    super.warn(message, ...optionalParams);
    if (this.fileLevel === 'warn') {
      this.appendLine('WARN', message, optionalParams);
    }
  }

  override error(message: unknown, ...optionalParams: unknown[]) {
    super.error(message, ...optionalParams);
    this.appendLine('ERROR', message, optionalParams);
  }

  override fatal(message: unknown, ...optionalParams: unknown[]) {
    super.fatal(message, ...optionalParams);
    this.appendLine('FATAL', message, optionalParams);
  }

  private appendLine(level: string, message: unknown, optionalParams: unknown[]) {
    const last = optionalParams[optionalParams.length - 1];
    const context = typeof last === 'string' ? last : this.context;
    const text = message instanceof Error ? message.message : String(message);
    const line = `${dayjs().format('YYYY-MM-DD HH:mm:ss.SSS')} - ${level} - ${context ? `[${context}] ` : ''}${text}\n`;

    try {
      appendFileSync(this.errorLogPath, line, 'utf8');
    } catch (e) {
      // stdout still has the entry; report the file problem there
      super.error(`Cannot write diagnostics to ${this.errorLogPath}: ${(e as Error).message}`);
    }
  }
}
