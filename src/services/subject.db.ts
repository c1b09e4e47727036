/**
 * Subject Directory Adapter
 * Resolves token subjects against the users table using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { INVALID_TEXT_REPRESENTATION } from '@/lib/supabase.js';
import type { Subject } from '@/types/index.js';

import type { SubjectDirectory } from './token-auth.service.js';

interface UserRow {
  id: string;
}

export function createSubjectDirectoryDb(
  supabase: SupabaseClient
): SubjectDirectory {
  return {
    async findSubject(subjectId: string): Promise<Subject | null> {
      const { data, error } = await supabase
        .from('users')
        .select('id')
        .eq('id', subjectId)
        .is('deleted_at', null)
        .maybeSingle();

      if (error !== null) {
        // Not a well-formed user id
        if (error.code === INVALID_TEXT_REPRESENTATION) {
          return null;
        }
        throw new Error(`Failed to look up subject: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      return { id: (data as UserRow).id };
    },
  };
}
