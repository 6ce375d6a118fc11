import kleur from "kleur";

import { dispose } from "~shared/utils/Disposeable";

import {
  type LogContext,
  type LogLevel,
  type LogMethod,
  type LogRecord,
  type LogTransport,
  type Logger,
  type TemplateLog,
  logLevelRank,
} from "./Logger";

export type EmojiMap = Record<string, string>;

export const defaultEmojiMap: EmojiMap = {
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
  start: "🏁",
  done: "✅",
};

const consoleWriters: Record<LogLevel, (line: string) => void> = {
  trace: (line) => console.debug(line),
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export class LoggerConsole implements Logger {
  readonly trace: LogMethod = this.method("trace");
  readonly debug: LogMethod = this.method("debug");
  readonly info: LogMethod = this.method("info");
  readonly warn: LogMethod = this.method("warn");
  readonly error: LogMethod = this.method("error");

  constructor(
    private readonly level: LogLevel = "info",
    private readonly path: readonly string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = defaultEmojiMap,
    private readonly transports: LogTransport[] = []
  ) {}

  extend(name: string, context: LogContext = {}): Logger {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): Logger {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    await dispose(...this.transports.splice(0));
  }

  private method(level: LogLevel): LogMethod {
    const write = (context: LogContext, message: string, plain: string) =>
      this.write(level, context, message, plain);

    function log(message: string): void;
    function log(context: LogContext, message: string): void;
    function log(context?: LogContext): TemplateLog;
    function log(
      contextOrMessage?: LogContext | string,
      message?: string
    ): TemplateLog | void {
      if (typeof contextOrMessage === "string") {
        write({}, contextOrMessage, contextOrMessage);
        return;
      }
      const context = contextOrMessage ?? {};
      if (message !== undefined) {
        write(context, message, message);
        return;
      }
      return (strings: TemplateStringsArray, ...values: unknown[]) => {
        let colored = "";
        let plain = "";
        const valueContext: Record<string, unknown> = {};
        strings.forEach((s, i) => {
          colored += s;
          plain += s;
          if (i < values.length) {
            colored += kleur.green(String(values[i]));
            plain += String(values[i]);
            valueContext[`__${i}`] = values[i];
          }
        });
        write({ ...context, ...valueContext }, colored, plain);
      };
    }

    return log;
  }

  private write(
    level: LogLevel,
    context: LogContext,
    message: string,
    plain: string
  ) {
    if (logLevelRank[level] < logLevelRank[this.level]) return;

    const { event, emoji, error, ...rest } = { ...this.context, ...context };
    const icon = this.resolveEmoji(level, context.emoji, event, emoji);
    const label = [...this.path, event ?? level].join(":");
    const extra =
      Object.keys(rest).length > 0 ? ` ${safeStringify(rest)}` : "";

    consoleWriters[level](`${icon} ${label}: ${message}${extra}`.trim());
    if (error !== undefined) {
      console.error(
        error instanceof Error
          ? (error.stack ?? error.message)
          : safeStringify(error)
      );
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path.join(":"),
      event,
      msg: plain,
      context: rest,
      err: toErrorRecord(error),
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }

  private resolveEmoji(
    level: LogLevel,
    callEmoji: string | undefined,
    event: string | undefined,
    inherited: string | undefined
  ) {
    if (callEmoji) return callEmoji;
    const eventEmoji = event ? this.emojiMap[event] : undefined;
    if (eventEmoji) return eventEmoji;
    if (level === "warn" || level === "error") {
      return this.emojiMap[level] ?? inherited ?? "";
    }
    return inherited ?? this.emojiMap[level] ?? "";
  }
}

function toErrorRecord(error: unknown): LogRecord["err"] {
  if (error === undefined) return undefined;
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "Error", message: safeStringify(error) };
}

export function safeStringify(value: unknown, space?: number): string {
  try {
    const json = JSON.stringify(
      value,
      (_key, v: unknown) => {
        if (typeof v === "bigint") return v.toString();
        if (v instanceof Error) return { name: v.name, message: v.message };
        if (v instanceof Map) return Object.fromEntries(v);
        return v;
      },
      space
    );
    return json ?? String(value);
  } catch {
    // 循環參照
    return String(value);
  }
}
