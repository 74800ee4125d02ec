import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { RecordStore } from './RecordStore';
import { StoreError } from '../errors';
import { KEY_FIELDS, LandRecord, LandRecordData, LandRecordKey, LocationFilter } from '../types';

const PAYLOAD_FIELDS = [
  'district_code',
  'sub_district_code',
  'village_code',
  'jamabandi_year',
  'khewat_no',
  'khatoni_no',
  'khasra_code',
  'nakal_village',
  'nakal_hadbast',
  'nakal_tehsil',
  'nakal_district',
  'nakal_year',
] as const satisfies readonly (keyof LandRecordData)[];

const DATA_FIELDS = [...KEY_FIELDS, ...PAYLOAD_FIELDS];

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS land_records (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ${DATA_FIELDS.map((field) => `${field} TEXT NOT NULL`).join(',\n    ')},
    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
    updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
  );
  CREATE UNIQUE INDEX IF NOT EXISTS idx_land_records_key
    ON land_records (district_name, sub_district_name, village_name, khasra_no);
  CREATE INDEX IF NOT EXISTS idx_land_records_location
    ON land_records (district_name, sub_district_name, village_name);
`;

const UPSERT = `
  INSERT INTO land_records (${DATA_FIELDS.join(', ')})
  VALUES (${DATA_FIELDS.map((field) => `@${field}`).join(', ')})
  ON CONFLICT (district_name, sub_district_name, village_name, khasra_no) DO UPDATE SET
    ${PAYLOAD_FIELDS.map((field) => `${field} = excluded.${field}`).join(',\n    ')},
    updated_at = CURRENT_TIMESTAMP
  RETURNING *
`;

const FIND = `
  SELECT * FROM land_records
  WHERE district_name = @district_name
    AND sub_district_name = @sub_district_name
    AND village_name = @village_name
    AND khasra_no = @khasra_no
`;

function toParams(data: LandRecordData): LandRecordData {
  return {
    district_name: data.district_name,
    sub_district_name: data.sub_district_name,
    village_name: data.village_name,
    khasra_no: data.khasra_no,
    district_code: data.district_code,
    sub_district_code: data.sub_district_code,
    village_code: data.village_code,
    jamabandi_year: data.jamabandi_year,
    khewat_no: data.khewat_no,
    khatoni_no: data.khatoni_no,
    khasra_code: data.khasra_code,
    nakal_village: data.nakal_village,
    nakal_hadbast: data.nakal_hadbast,
    nakal_tehsil: data.nakal_tehsil,
    nakal_district: data.nakal_district,
    nakal_year: data.nakal_year,
  };
}

export class SQLiteRecordStore implements RecordStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = this.guard('open database', () => {
      if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
      }
      const db = new Database(dbPath);
      db.exec(SCHEMA);
      return db;
    });
  }

  async find(key: LandRecordKey): Promise<LandRecord | undefined> {
    return this.guard('find record', () =>
      this.db.prepare<LandRecordKey, LandRecord>(FIND).get({
        district_name: key.district_name,
        sub_district_name: key.sub_district_name,
        village_name: key.village_name,
        khasra_no: key.khasra_no,
      })
    );
  }

  async save(data: LandRecordData): Promise<LandRecord> {
    const row = this.guard('save record', () =>
      this.db.prepare<LandRecordData, LandRecord>(UPSERT).get(toParams(data))
    );
    if (!row) {
      throw new StoreError(`save record returned no row for khasra ${data.khasra_no}`);
    }
    return row;
  }

  async get(id: number): Promise<LandRecord | undefined> {
    return this.guard('read record', () =>
      this.db.prepare<[number], LandRecord>('SELECT * FROM land_records WHERE id = ?').get(id)
    );
  }

  async search(filter: LocationFilter): Promise<LandRecord[]> {
    const clauses: string[] = [];
    const params: LocationFilter = {};
    for (const field of ['district_name', 'sub_district_name', 'village_name'] as const) {
      const value = filter[field];
      if (value) {
        clauses.push(`${field} = @${field}`);
        params[field] = value;
      }
    }
    return this.guard('search records', () => {
      if (clauses.length === 0) {
        return this.db.prepare<[], LandRecord>('SELECT * FROM land_records ORDER BY id ASC').all();
      }
      return this.db
        .prepare<LocationFilter, LandRecord>(
          `SELECT * FROM land_records WHERE ${clauses.join(' AND ')} ORDER BY id ASC`
        )
        .all(params);
    });
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      const detail = err instanceof Error ? err.message : String(err);
      throw new StoreError(`${action} failed: ${detail}`, { cause: err });
    }
  }
}
