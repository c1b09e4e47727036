/**
 * Supabase Client Configuration
 * The service talks to Postgres through the admin (service-role) client only;
 * agents never hold Supabase credentials.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { AppConfig } from './config.js';

/**
 * Postgres error code for unique constraint violations
 */
export const UNIQUE_VIOLATION = '23505';

/**
 * Postgres error code for a malformed value (e.g. a non-uuid id)
 */
export const INVALID_TEXT_REPRESENTATION = '22P02';

/**
 * Create a Supabase admin client that bypasses RLS
 */
export function createSupabaseAdmin(
  config: AppConfig['supabase']
): SupabaseClient {
  return createClient(config.url, config.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}

/**
 * PostgREST caps every response at the server's max-rows (1000 by default)
 */
export const SELECT_PAGE_SIZE = 1000;

export interface PageResponse {
  data: unknown[] | null;
  error: { message: string } | null;
}

/**
 * Read every row of an ordered select, one range at a time.
 * Stops on an empty page rather than a short one, so a server cap
 * below the page size cannot end the scan early.
 */
export async function selectAllPages(
  description: string,
  fetchPage: (from: number, to: number) => PromiseLike<PageResponse>,
  pageSize: number = SELECT_PAGE_SIZE
): Promise<unknown[]> {
  const rows: unknown[] = [];
  for (;;) {
    const from = rows.length;
    const { data, error } = await fetchPage(from, from + pageSize - 1);
    if (error !== null) {
      throw new Error(`Failed to list ${description}: ${error.message}`);
    }
    if (data === null || data.length === 0) {
      return rows;
    }
    rows.push(...data);
  }
}
