import { appendFile, mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  computeStoreStatistics,
  parseNumeric,
  SESSION_RECORD_COLUMNS,
  type SessionStore,
  type StoredSessionRecord,
  type StoredSessionRow,
  type StoreStatistics,
} from './sessionStore';

/**
 * Escape a string for CSV (wrap in quotes if contains comma, quote, or newline).
 */
function escapeCSV(value: string): string {
  if (!value) return '';
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function parseCSV(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];

    if (quoted) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i += 1;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i += 1;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter((cells) => !(cells.length === 1 && cells[0] === ''));
}

const HEADER_LINE = `${SESSION_RECORD_COLUMNS.join(',')}\n`;

const toLine = (record: StoredSessionRecord) =>
  `${SESSION_RECORD_COLUMNS.map((column) => escapeCSV(String(record[column]))).join(',')}\n`;

const toRow = (cells: Record<string, string>): StoredSessionRow => ({
  timestamp: cells.timestamp ?? '',
  session_id: cells.session_id ?? '',
  session_seconds: parseNumeric(cells.session_seconds),
  total_frames: parseNumeric(cells.total_frames),
  good_frames: parseNumeric(cells.good_frames),
  bad_frames: parseNumeric(cells.bad_frames),
  good_percent: parseNumeric(cells.good_percent),
  bad_percent: parseNumeric(cells.bad_percent),
  average_score: parseNumeric(cells.average_score),
  longest_bad_secs: parseNumeric(cells.longest_bad_secs),
});

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/** Append-only CSV file, one row per finished session, fixed column order. */
export class CsvSessionStore implements SessionStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Writes the header when the file is missing or empty. */
  private async ensureHeader() {
    let size = 0;
    try {
      ({ size } = await stat(this.filePath));
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      await mkdir(path.dirname(this.filePath), { recursive: true });
    }
    if (size === 0) {
      await writeFile(this.filePath, HEADER_LINE, 'utf8');
    }
  }

  private async readRaw(): Promise<Record<string, string>[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const [header, ...body] = parseCSV(text);
    if (!header) return [];

    return body.map((cells) =>
      Object.fromEntries(header.map((column, index) => [column, cells[index] ?? ''])),
    );
  }

  append(record: StoredSessionRecord): Promise<void> {
    return this.serialize(async () => {
      await this.ensureHeader();
      await appendFile(this.filePath, toLine(record), 'utf8');
    });
  }

  async list(): Promise<StoredSessionRow[]> {
    await this.queue;
    return (await this.readRaw()).map(toRow);
  }

  async recent(limit: number): Promise<StoredSessionRow[]> {
    const rows = await this.list();
    return limit > 0 ? rows.slice(-limit) : [];
  }

  async findById(sessionId: string): Promise<StoredSessionRow | null> {
    const rows = await this.list();
    return rows.find((row) => row.session_id === sessionId) ?? null;
  }

  deleteById(sessionId: string): Promise<boolean> {
    return this.serialize(async () => {
      const raw = await this.readRaw();
      const kept = raw.filter((cells) => cells.session_id !== sessionId);
      if (kept.length === raw.length) {
        return false;
      }

      const lines = kept.map(
        (cells) =>
          `${SESSION_RECORD_COLUMNS.map((column) => escapeCSV(cells[column] ?? '')).join(',')}\n`,
      );
      await writeFile(this.filePath, HEADER_LINE + lines.join(''), 'utf8');
      return true;
    });
  }

  clear(): Promise<void> {
    return this.serialize(async () => {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, HEADER_LINE, 'utf8');
    });
  }

  async statistics(): Promise<StoreStatistics> {
    return computeStoreStatistics(await this.list());
  }
}
