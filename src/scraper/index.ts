import type { AppConfig } from "../config";
import type { LandRecordData, LandRecordKey } from "../types";
import { JamabandiFetcher } from "./jamabandi";

export interface RecordFetcher {
  /** One attempt; fails with FetchError, never returns a partial record. */
  fetch(key: LandRecordKey): Promise<LandRecordData>;
}

export function createFetcher(config: AppConfig): RecordFetcher {
  return new JamabandiFetcher({
    baseUrl: config.baseUrl,
    timeoutMs: config.requestTimeoutMs,
    userAgent: config.userAgent,
    htmlDir: config.nakalHtmlDir,
  });
}
