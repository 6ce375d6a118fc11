import { type RotatingFileStream, createStream } from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";
import { safeStringify } from "./LoggerConsole";

export type RfsTransportOptions = {
  filename: string;
  rfs?: {
    path?: string;
    size?: string;
    interval?: string;
    maxFiles?: number;
  };
};

/** 以 JSON Lines 寫入輪替日誌檔 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: RfsTransportOptions) {
    const interval = options.rfs?.interval;
    this.stream = createStream(options.filename, {
      path: options.rfs?.path ?? "logs",
      size: options.rfs?.size ?? "10M",
      maxFiles: options.rfs?.maxFiles ?? 14,
      ...(interval ? { interval } : {}),
    });
  }

  write(record: LogRecord) {
    const { context, ...base } = record;
    this.stream.write(safeStringify({ ...context, ...base }) + "\n");
  }

  [Symbol.asyncDispose](): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}
