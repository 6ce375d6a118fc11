import { Type as t } from "@sinclair/typebox";

import { type EnvSource, buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole, defaultEmojiMap, type EmojiMap } from "./LoggerConsole";
export { RfsTransport, type RfsTransportOptions } from "./RfsTransport";

export const loggerConfigSchema = t.Object({
  LOG_LEVEL: t.Union(
    [
      t.Literal("trace"),
      t.Literal("debug"),
      t.Literal("info"),
      t.Literal("warn"),
      t.Literal("error"),
    ],
    { default: "info" }
  ),
  LOG_FILE: t.Optional(t.String()),
  LOG_DIR: t.String({ default: "logs" }),
});

/**
 * 依環境變數建立根 logger。
 * 設定 LOG_FILE 時會另外掛上輪替檔案輸出。
 */
export function createDefaultLoggerFromEnv(source?: EnvSource) {
  const { LOG_LEVEL, LOG_FILE, LOG_DIR } = buildConfigFactoryEnv(
    loggerConfigSchema,
    source
  )();
  const logger = new LoggerConsole(LOG_LEVEL);
  if (LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({ filename: LOG_FILE, rfs: { path: LOG_DIR } })
    );
  }
  return logger;
}
