import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { BurstDetectionService } from "./BurstDetectionService";
import type {
  BurstSession,
  BurstSessionService,
  SessionError,
} from "./BurstSessionService";
import type { BurstStore } from "./BurstStore";
import type { CaptureCollector } from "./CaptureCollector";

export class BurstSessionServiceDefault implements BurstSessionService {
  private readonly rootPath: string;
  private readonly store: BurstStore;
  private readonly collector: CaptureCollector;
  private readonly detector: BurstDetectionService;
  private readonly logger: Logger;

  constructor(deps: {
    rootPath: string;
    store: BurstStore;
    collector: CaptureCollector;
    detector: BurstDetectionService;
    logger: Logger;
  }) {
    this.rootPath = deps.rootPath;
    this.store = deps.store;
    this.collector = deps.collector;
    this.detector = deps.detector;
    this.logger = deps.logger.extend("BurstSessionServiceDefault");
  }

  async open(options?: {
    rescan?: boolean;
  }): Promise<Result<BurstSession, SessionError>> {
    if (options?.rescan) {
      const invalidated = await this.store.invalidate();
      if (isErr(invalidated)) return err(invalidated.error);
      this.logger.info({ emoji: "🧹" })`已清除連拍紀錄，重新偵測`;
    }

    if (await this.store.exists()) {
      const loaded = await this.store.load();
      if (isErr(loaded)) return err(loaded.error);
      return ok({ bursts: loaded.value, detected: false });
    }

    this.logger.info({
      event: "start",
    })`沒有連拍紀錄，開始偵測 ${this.rootPath}`;
    const collected = await this.collector.collect(this.rootPath);
    if (isErr(collected)) return err(collected.error);

    const { bursts, singletons } = this.detector.detect(collected.value);
    this.logger.info({
      event: "done",
      singletons: singletons.length,
    })`${collected.value.length} 張相片中偵測到 ${bursts.length} 組連拍`;

    const saved = await this.store.save(bursts);
    if (isErr(saved)) return err(saved.error);
    return ok({ bursts, detected: true });
  }
}
