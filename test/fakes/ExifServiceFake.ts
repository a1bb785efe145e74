import { type Result, err, ok } from "~shared/utils/Result";

import type {
  CaptureRecord,
  ExifService,
  ReadError,
} from "@/services/ExifService";

export class ExifServiceFake implements ExifService {
  private readonly records: Map<string, Result<CaptureRecord, ReadError>> =
    new Map();
  readonly reads: string[] = [];

  async readCapture(
    filePath: string
  ): Promise<Result<CaptureRecord, ReadError>> {
    this.reads.push(filePath);
    const record = this.records.get(filePath);
    if (!record) {
      return err({
        type: "FILE_NOT_FOUND",
        message: `No such file: ${filePath}`,
      });
    }
    return record;
  }

  setCapture(record: CaptureRecord) {
    this.records.set(record.filePath, ok(record));
  }

  setReadError(filePath: string, error: ReadError) {
    this.records.set(filePath, err(error));
  }
}
