import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { FetchError } from "./errors";
import { resolveRecord } from "./lookup";
import type { RecordFetcher } from "./scraper";
import { SQLiteRecordStore } from "./store/sqlite";
import { LandRecordData, LandRecordKey, pickKey } from "./types";

const KEY: LandRecordKey = {
  district_name: "नुह",
  sub_district_name: "नगीना",
  village_name: "F. pur dehar",
  khasra_no: "1//17",
};

function scraped(khewat_no: string): LandRecordData {
  return {
    ...KEY,
    district_code: "18",
    sub_district_code: "107",
    village_code: "04817",
    jamabandi_year: "2021-2022",
    khewat_no,
    khatoni_no: "52",
    khasra_code: "121",
    nakal_village: "फ. पुर देहर",
    nakal_hadbast: "112",
    nakal_tehsil: "नगीना",
    nakal_district: "नुह",
    nakal_year: "2021-2022",
  };
}

describe("resolveRecord", () => {
  let store: SQLiteRecordStore;
  let fetchRecord: Mock<(key: LandRecordKey) => Promise<LandRecordData>>;
  let fetcher: RecordFetcher;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    store = new SQLiteRecordStore(":memory:");
    fetchRecord = vi.fn<(key: LandRecordKey) => Promise<LandRecordData>>(async () => scraped("36"));
    fetcher = { fetch: fetchRecord };
  });

  afterEach(async () => {
    await store.close();
    vi.restoreAllMocks();
  });

  it("fetches, inserts and returns a record missing from the store", async () => {
    const { record, source } = await resolveRecord(KEY, { store, fetcher });

    expect(source).toBe("portal");
    expect(fetchRecord).toHaveBeenCalledTimes(1);
    expect(fetchRecord).toHaveBeenCalledWith(KEY);
    expect(pickKey(record)).toEqual(KEY);
    expect(record.khewat_no).toBe("36");
    expect(await store.find(KEY)).toEqual(record);
  });

  it("returns the stored record without fetching", async () => {
    const stored = await store.save(scraped("36"));

    const { record, source } = await resolveRecord(KEY, { store, fetcher });

    expect(source).toBe("store");
    expect(record).toEqual(stored);
    expect(fetchRecord).not.toHaveBeenCalled();
  });

  it("refetches and overwrites the row when forced", async () => {
    const stored = await store.save(scraped("36"));
    fetchRecord.mockResolvedValueOnce(scraped("40"));

    const { record, source } = await resolveRecord(KEY, { store, fetcher }, true);

    expect(source).toBe("portal");
    expect(fetchRecord).toHaveBeenCalledTimes(1);
    expect(record.id).toBe(stored.id);
    expect(record.khewat_no).toBe("40");
    expect(await store.search({})).toHaveLength(1);
    expect((await store.find(KEY))?.khewat_no).toBe("40");
  });

  it("fetches once across repeated lookups", async () => {
    const first = await resolveRecord(KEY, { store, fetcher });
    const second = await resolveRecord(KEY, { store, fetcher });

    expect(fetchRecord).toHaveBeenCalledTimes(1);
    expect(second.record).toEqual(first.record);
  });

  it("propagates a fetch failure and writes nothing", async () => {
    fetchRecord.mockRejectedValueOnce(new FetchError("parse", "Failed to extract essential fields: nakals."));

    await expect(resolveRecord(KEY, { store, fetcher })).rejects.toThrow(FetchError);
    expect(await store.search({})).toEqual([]);
  });

  it("keeps the old row when a forced refresh fails", async () => {
    const stored = await store.save(scraped("36"));
    fetchRecord.mockRejectedValueOnce(new FetchError("http", "POST NakalRecord returned HTTP 500"));

    await expect(resolveRecord(KEY, { store, fetcher }, true)).rejects.toThrow(
      "POST NakalRecord returned HTTP 500"
    );
    expect(await store.find(KEY)).toEqual(stored);
  });
});
