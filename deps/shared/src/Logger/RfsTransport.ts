import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

/**
 * 以 rotating-file-stream 將紀錄寫成 JSON lines。
 * 寫檔失敗只回報一次到 stderr，之後的紀錄不再寫入檔案，console 輸出不受影響。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;
  private failure?: Error;

  constructor(options: { filename: string; rfs?: Options }) {
    this.stream = createStream(options.filename, {
      size: "10M",
      maxFiles: 5,
      ...options.rfs,
    });
    this.stream.on("error", (error) => {
      if (this.failure) return;
      this.failure = error;
      console.error(`log 檔寫入失敗: ${error.message}`);
    });
  }

  get failed() {
    return this.failure !== undefined;
  }

  write(record: LogRecord) {
    if (this.failure) return;
    const line = JSON.stringify({
      time: record.time,
      level: record.level,
      path: record.path.join(":"),
      event: record.event,
      msg: record.msg,
      ...record.context,
      err: record.err,
    });
    this.stream.write(`${line}\n`);
  }

  async [Symbol.asyncDispose]() {
    if (this.failure || this.stream.destroyed) return;
    await new Promise<void>((resolve) => {
      this.stream.once("error", () => resolve());
      this.stream.end(() => resolve());
    });
  }
}
