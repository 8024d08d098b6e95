// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import { getServices } from '@/src/server/services';
import { pingDatabase } from '@/src/store/pg/pool';
import { isSupabaseConfigured } from '@/src/server/supabase/server';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

export async function GET() {
  let dbReachable = false;
  let error: string | null = null;

  try {
    const result = await pingDatabase(getServices().pool);
    dbReachable = result.reachable;
    error = result.error;
  } catch (setupError) {
    error = setupError instanceof Error ? setupError.message : 'Service setup failed';
  }

  if (!dbReachable) {
    console.warn('[health] database unreachable', { error });
  }

  return Response.json(
    {
      ok: dbReachable,
      db_reachable: dbReachable,
      auth_configured: isSupabaseConfigured(),
      error
    },
    { status: dbReachable ? 200 : 503 }
  );
}
