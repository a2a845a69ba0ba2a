import type { FinalSessionStatistics } from '@/lib/session/postureSession';

export const SESSION_RECORD_COLUMNS = [
  'timestamp',
  'session_id',
  'session_seconds',
  'total_frames',
  'good_frames',
  'bad_frames',
  'good_percent',
  'bad_percent',
  'average_score',
  'longest_bad_secs',
] as const;

export type SessionRecordColumn = (typeof SESSION_RECORD_COLUMNS)[number];

/** One persisted row per finished session, written once at session end. */
export interface StoredSessionRecord {
  timestamp: string;
  session_id: string;
  session_seconds: number;
  total_frames: number;
  good_frames: number;
  bad_frames: number;
  good_percent: number;
  bad_percent: number;
  average_score: number;
  longest_bad_secs: number;
}

/** A row as read back; numeric columns that do not parse come back as null. */
export type StoredSessionRow = {
  [K in SessionRecordColumn]: StoredSessionRecord[K] extends number
    ? number | null
    : StoredSessionRecord[K];
};

export interface StoreStatistics {
  total_sessions: number;
  total_duration_seconds: number;
  average_good_percent: number;
  average_bad_percent: number;
  average_score: number;
}

export interface SessionStore {
  append(record: StoredSessionRecord): Promise<void>;
  /** Oldest first. */
  list(): Promise<StoredSessionRow[]>;
  recent(limit: number): Promise<StoredSessionRow[]>;
  findById(sessionId: string): Promise<StoredSessionRow | null>;
  /** Resolves false when no row carried that id. */
  deleteById(sessionId: string): Promise<boolean>;
  clear(): Promise<void>;
  statistics(): Promise<StoreStatistics>;
}

const round2 = (value: number) => Math.round(value * 100) / 100;

export const toStoredSessionRecord = (stats: FinalSessionStatistics): StoredSessionRecord => ({
  timestamp: stats.end_time,
  session_id: stats.session_id,
  session_seconds: round2(stats.duration_seconds),
  total_frames: stats.total_frames,
  good_frames: stats.good_frames,
  bad_frames: stats.bad_frames,
  good_percent: round2(stats.good_percent),
  bad_percent: round2(stats.bad_percent),
  average_score: round2(stats.average_score),
  longest_bad_secs: round2(stats.longest_bad_duration),
});

/** Numeric when the whole value is a finite decimal number, otherwise null. */
export const parseNumeric = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string' || !/^\s*-?(\d+\.?\d*|\.\d+)\s*$/.test(value)) {
    return null;
  }
  return Number(value);
};

const averageOf = (values: (number | null)[]) => {
  const numeric = values.filter((value): value is number => value !== null);
  if (numeric.length === 0) return 0;
  return round2(numeric.reduce((sum, value) => sum + value, 0) / numeric.length);
};

/**
 * Aggregates across stored rows. Each figure only uses rows whose field is
 * numeric; the session count includes every row.
 */
export const computeStoreStatistics = (rows: StoredSessionRow[]): StoreStatistics => {
  const durations = rows
    .map((row) => row.session_seconds)
    .filter((value): value is number => value !== null);

  return {
    total_sessions: rows.length,
    total_duration_seconds: round2(durations.reduce((sum, value) => sum + value, 0)),
    average_good_percent: averageOf(rows.map((row) => row.good_percent)),
    average_bad_percent: averageOf(rows.map((row) => row.bad_percent)),
    average_score: averageOf(rows.map((row) => row.average_score)),
  };
};
