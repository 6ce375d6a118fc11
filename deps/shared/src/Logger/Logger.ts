export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export const logLevelRank: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

export type LogContext = {
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

/**
 * 三種呼叫方式：
 * - logger.info("訊息")
 * - logger.info({ event: "start" }, "訊息")
 * - logger.info({ event: "start" })`處理 ${count} 筆`
 */
export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger extends AsyncDisposable {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 新增一層命名空間，並合併 context */
  extend(name: string, context?: LogContext): Logger;
  /** 合併 context，不改變命名空間 */
  append(context: LogContext): Logger;
  /** 命名空間之間共用同一組 transport，dispose 任一個即全部關閉 */
  attachTransport(transport: LogTransport): void;
}

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: { name: string; message: string; stack?: string };
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}
