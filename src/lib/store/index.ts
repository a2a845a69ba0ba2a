import path from 'node:path';
import { createClient } from '@supabase/supabase-js';
import type { ServerEnv } from '@/lib/env/server';
import { CsvSessionStore } from './csvSessionStore';
import type { SessionStore } from './sessionStore';
import { SupabaseSessionStore } from './supabaseSessionStore';

export function createSessionStore(env: ServerEnv): SessionStore {
  if (env.SESSION_STORE === 'supabase') {
    if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) {
      throw new Error('Supabase session store requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
    }
    return new SupabaseSessionStore(
      createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
        auth: { persistSession: false, autoRefreshToken: false },
      }),
    );
  }

  return new CsvSessionStore(path.resolve(process.cwd(), env.SESSION_CSV_PATH));
}
