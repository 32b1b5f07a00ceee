/**
 * 統一的 Logger 工具
 *
 * 輸出格式：[YYYY-MM-DD HH:mm:ss] [Prefix] message
 *
 * - 時區預設 UTC，可用 LOG_TIMEZONE 指定（例如 Asia/Taipei）
 * - debug() 只在 DEBUG 環境變數啟用時輸出
 * - useStderr 讓 info/warn/debug 走 stderr；raw() 固定寫 stdout，留給 CLI 的結果
 */

export interface LoggerOptions {
  /** 所有輸出走 stderr */
  useStderr?: boolean;
}

function formatTimestamp(): string {
  return new Date().toLocaleString('sv-SE', {
    timeZone: process.env.LOG_TIMEZONE || 'UTC',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
}

export class Logger {
  private prefix: string;
  private useStderr: boolean;

  constructor(prefix: string, options?: LoggerOptions) {
    this.prefix = prefix;
    this.useStderr = options?.useStderr ?? false;
  }

  private format(message: string): string {
    return `[${formatTimestamp()}] [${this.prefix}] ${message}`;
  }

  info(message: string, ...args: unknown[]): void {
    const formatted = this.format(message);
    if (this.useStderr) {
      console.error(formatted, ...args);
    } else {
      console.log(formatted, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    const formatted = this.format(message);
    if (this.useStderr) {
      console.error(formatted, ...args);
    } else {
      console.warn(formatted, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    console.error(this.format(message), ...args);
  }

  /**
   * Debug 訊息（僅在 DEBUG 環境變數啟用時輸出）
   */
  debug(message: string, ...args: unknown[]): void {
    if (!process.env.DEBUG) {
      return;
    }
    this.info(`[DEBUG] ${message}`, ...args);
  }

  /**
   * 原始輸出（無時間戳，給 CLI 結果用）
   */
  raw(message: string): void {
    console.log(message);
  }
}

export function createLogger(prefix: string, options?: LoggerOptions): Logger {
  return new Logger(prefix, options);
}

export default Logger;
