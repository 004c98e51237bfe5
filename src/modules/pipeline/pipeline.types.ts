import { EntityKind } from '../../types/entity.types';

/** One row of the image URL table (`image_urls.csv`). */
export interface MediaRow {
  entityType: EntityKind;
  id: number;
  url: string | null;
  license: string | null;
  attribution: string | null;
  style: string | null;
  // comma-separated
  tags: string | null;
}

export type PerKind<T> = Record<EntityKind, T>;

export interface IngestCounts {
  file: string;
  rows: number;
  written: number;
  skipped: number;
  duplicates: number;
}

export interface CleanUrlTableResult {
  path: string;
  created: boolean;
  rows: number;
  dropped: number;
}

export type LocalizeStatus = 'downloaded' | 'cached' | 'kept' | 'skipped' | 'failed';

export interface LocalizeRowResult {
  entityType: EntityKind;
  id: number;
  url: string | null;
  status: LocalizeStatus;
  file?: string;
  error?: string;
}

export interface LocalizeResult {
  outputCsv: string;
  counts: Record<LocalizeStatus, number>;
  rows: LocalizeRowResult[];
}

export interface EmbedCounts {
  text: number;
  image: number;
  failed: number;
  imageErrors: number;
}

export interface LoadCounts {
  inserted: number;
  updated: number;
  failed: number;
  skipped: number;
  errors: string[];
}
