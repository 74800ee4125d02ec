export interface LandRecordKey {
  district_name: string;
  sub_district_name: string;    // tehsil / sub-tehsil
  village_name: string;
  khasra_no: string;            // e.g. "1//17"
}

export interface LandRecordData extends LandRecordKey {
  district_code: string;
  sub_district_code: string;
  village_code: string;
  jamabandi_year: string;       // e.g. "2022-2023"
  khewat_no: string;
  khatoni_no: string;
  khasra_code: string;
  nakal_village: string;
  nakal_hadbast: string;
  nakal_tehsil: string;
  nakal_district: string;
  nakal_year: string;
}

export interface LandRecord extends LandRecordData {
  id: number;
  created_at: string;           // YYYY-MM-DD HH:MM:SS (UTC)
  updated_at: string;
}

export type LocationFilter = Partial<
  Pick<LandRecordKey, "district_name" | "sub_district_name" | "village_name">
>;

export const KEY_FIELDS = [
  "district_name",
  "sub_district_name",
  "village_name",
  "khasra_no",
] as const satisfies readonly (keyof LandRecordKey)[];

export function pickKey(record: LandRecordKey): LandRecordKey {
  return {
    district_name: record.district_name,
    sub_district_name: record.sub_district_name,
    village_name: record.village_name,
    khasra_no: record.khasra_no,
  };
}
