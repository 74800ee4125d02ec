import type { RecordFetcher } from "./scraper";
import type { RecordStore } from "./store/RecordStore";
import { LandRecord, LandRecordKey } from "./types";
import { log } from "./utils/logger";

export interface LookupDeps {
  store: RecordStore;
  fetcher: RecordFetcher;
}

export interface LookupResult {
  record: LandRecord;
  source: "store" | "portal";
}

/**
 * Returns the stored record for `key`, scraping and saving it first when it
 * is missing or `forceRefresh` is set. A failed fetch leaves the store untouched.
 */
export async function resolveRecord(
  key: LandRecordKey,
  { store, fetcher }: LookupDeps,
  forceRefresh = false
): Promise<LookupResult> {
  const stored = await store.find(key);
  if (stored && !forceRefresh) {
    log({ stage: "store_hit", id: stored.id });
    return { record: stored, source: "store" };
  }

  log({ stage: stored ? "refresh_start" : "store_miss", khasra_no: key.khasra_no });
  const data = await fetcher.fetch(key);
  const record = await store.save(data);
  log({ stage: stored ? "record_updated" : "record_inserted", id: record.id });
  return { record, source: "portal" };
}
