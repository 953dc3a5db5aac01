export type RecordId = number;
export type ExternalKey = string;

export interface RecordEntity {
  id: RecordId;          // store-assigned, never reused
  externalKey: ExternalKey;
  name: string;
  rights?: string;
  status?: string;
  remarks?: string;
  createdAt: number;     // epoch ms, set once
  updatedAt: number;     // epoch ms, refreshed on every update
}

// Write inputs carry no id or timestamps
export interface CreateRecordArgs {
  externalKey: ExternalKey;
  name: string;
  rights?: string;
  status?: string;
  remarks?: string;
}

/** Fields a caller may change after creation. */
export const MUTABLE_FIELDS = ['externalKey', 'name', 'rights', 'status', 'remarks'] as const;
export type MutableField = (typeof MUTABLE_FIELDS)[number];

// null / '' / undefined all mean "leave unchanged"
export type UpdateRecordArgs = { [K in MutableField]?: string | null };

// What actually reaches the store after the service drops empty fields
export type RecordPatch = { [K in MutableField]?: string };

export interface ListQuery {
  search?: string;
  skip?: number;
  limit?: number;
}

export interface RecordPage {
  records: RecordEntity[];
  total: number;
  skip: number;
  limit: number;
}

export type ExportFormat = 'csv' | 'json';
