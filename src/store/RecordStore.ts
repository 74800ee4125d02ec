import type { LandRecord, LandRecordData, LandRecordKey, LocationFilter } from '../types';

export interface RecordStore {
  find(key: LandRecordKey): Promise<LandRecord | undefined>;
  /** Inserts, or overwrites the payload of the row with the same key. */
  save(data: LandRecordData): Promise<LandRecord>;
  get(id: number): Promise<LandRecord | undefined>;
  search(filter: LocationFilter): Promise<LandRecord[]>;
  close(): Promise<void>;
}
