export type SessionStoreKind = 'csv' | 'supabase';

export type ServerEnv = {
  PORT: number;
  HOST: string;
  POSE_DETECTOR_URL: string;
  SESSION_STORE: SessionStoreKind;
  SESSION_CSV_PATH: string;
  SUPABASE_URL: string | null;
  SUPABASE_SERVICE_ROLE_KEY: string | null;
  MIN_FRAME_WIDTH: number;
  MIN_FRAME_HEIGHT: number;
};

const REQUIRED_SERVER_VARS = ['POSE_DETECTOR_URL'] as const;

const REQUIRED_SUPABASE_VARS = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY'] as const;

const STORE_KINDS: readonly SessionStoreKind[] = ['csv', 'supabase'];

function readInteger(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid integer for ${key}: ${raw}`);
  }
  return value;
}

function readStoreKind(): SessionStoreKind {
  const raw = process.env.SESSION_STORE || 'csv';
  const kind = STORE_KINDS.find((candidate) => candidate === raw);
  if (!kind) {
    throw new Error(`Invalid SESSION_STORE: ${raw} (expected ${STORE_KINDS.join(' or ')})`);
  }
  return kind;
}

export function loadServerEnv(): ServerEnv {
  const store = readStoreKind();
  const required: string[] = store === 'supabase'
    ? [...REQUIRED_SERVER_VARS, ...REQUIRED_SUPABASE_VARS]
    : [...REQUIRED_SERVER_VARS];
  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required server env vars: ${missing.join(', ')}`,
    );
  }

  return {
    PORT: readInteger('PORT', 8000),
    HOST: process.env.HOST || '0.0.0.0',
    POSE_DETECTOR_URL: process.env.POSE_DETECTOR_URL ?? '',
    SESSION_STORE: store,
    SESSION_CSV_PATH: process.env.SESSION_CSV_PATH || 'posture_sessions.csv',
    SUPABASE_URL: process.env.SUPABASE_URL || null,
    SUPABASE_SERVICE_ROLE_KEY: process.env.SUPABASE_SERVICE_ROLE_KEY || null,
    MIN_FRAME_WIDTH: readInteger('MIN_FRAME_WIDTH', 100),
    MIN_FRAME_HEIGHT: readInteger('MIN_FRAME_HEIGHT', 100),
  };
}

let cachedServerEnv: ServerEnv | null = null;

export function getServerEnv(): ServerEnv {
  if (!cachedServerEnv) {
    cachedServerEnv = loadServerEnv();
  }
  return cachedServerEnv;
}
