import type { SupabaseClient } from '@supabase/supabase-js';
import {
  computeStoreStatistics,
  parseNumeric,
  type SessionStore,
  type StoredSessionRecord,
  type StoredSessionRow,
  type StoreStatistics,
} from './sessionStore';

export const POSTURE_SESSIONS_TABLE = 'posture_sessions';

const asText = (value: unknown) => (typeof value === 'string' ? value : '');

export const toStoredSessionRow = (row: Record<string, unknown>): StoredSessionRow => ({
  timestamp: asText(row.timestamp),
  session_id: asText(row.session_id),
  session_seconds: parseNumeric(row.session_seconds),
  total_frames: parseNumeric(row.total_frames),
  good_frames: parseNumeric(row.good_frames),
  bad_frames: parseNumeric(row.bad_frames),
  good_percent: parseNumeric(row.good_percent),
  bad_percent: parseNumeric(row.bad_percent),
  average_score: parseNumeric(row.average_score),
  longest_bad_secs: parseNumeric(row.longest_bad_secs),
});

export class SupabaseSessionStore implements SessionStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string = POSTURE_SESSIONS_TABLE,
  ) {}

  async append(record: StoredSessionRecord): Promise<void> {
    const { error } = await this.client.from(this.table).insert(record);
    if (error) {
      throw new Error(`Failed to save session: ${error.message}`);
    }
  }

  async list(): Promise<StoredSessionRow[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select('*')
      .order('timestamp', { ascending: true });

    if (error) {
      throw new Error(`Failed to load sessions: ${error.message}`);
    }
    return (data ?? []).map(toStoredSessionRow);
  }

  async recent(limit: number): Promise<StoredSessionRow[]> {
    if (limit <= 0) return [];

    const { data, error } = await this.client
      .from(this.table)
      .select('*')
      .order('timestamp', { ascending: false })
      .limit(limit);

    if (error) {
      throw new Error(`Failed to load sessions: ${error.message}`);
    }
    return (data ?? []).map(toStoredSessionRow).reverse();
  }

  async findById(sessionId: string): Promise<StoredSessionRow | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select('*')
      .eq('session_id', sessionId)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to load session: ${error.message}`);
    }
    return data ? toStoredSessionRow(data) : null;
  }

  async deleteById(sessionId: string): Promise<boolean> {
    const { data, error } = await this.client
      .from(this.table)
      .delete()
      .eq('session_id', sessionId)
      .select('session_id');

    if (error) {
      throw new Error(`Failed to delete session: ${error.message}`);
    }
    return (data ?? []).length > 0;
  }

  async clear(): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .delete()
      .not('session_id', 'is', null);

    if (error) {
      throw new Error(`Failed to clear sessions: ${error.message}`);
    }
  }

  async statistics(): Promise<StoreStatistics> {
    return computeStoreStatistics(await this.list());
  }
}
