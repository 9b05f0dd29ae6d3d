/**
 * Supabase implementation of IFingerprintRepository.
 * The primary key on intelligence_fingerprints makes registration atomic.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  IFingerprintRepository,
  RegisterOutcome,
} from './IFingerprintRepository.js';

const UNIQUE_VIOLATION = '23505';

export class SupabaseFingerprintRepository implements IFingerprintRepository {
  constructor(private readonly db: SupabaseClient) {}

  async exists(fingerprint: string): Promise<boolean> {
    const { count, error } = await this.db
      .from('intelligence_fingerprints')
      .select('*', { count: 'exact', head: true })
      .eq('fingerprint', fingerprint);

    if (error) throw new Error(`Failed to look up fingerprint: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async registerIfAbsent(
    fingerprint: string,
    uuid: string
  ): Promise<RegisterOutcome> {
    const { error } = await this.db
      .from('intelligence_fingerprints')
      .insert({ fingerprint, uuid });

    if (!error) return 'created';
    if (error.code === UNIQUE_VIOLATION) return 'duplicate';
    throw new Error(`Failed to register fingerprint: ${error.message}`);
  }

  async release(fingerprint: string, uuid: string): Promise<void> {
    const { error } = await this.db
      .from('intelligence_fingerprints')
      .delete()
      .eq('fingerprint', fingerprint)
      .eq('uuid', uuid);

    if (error) throw new Error(`Failed to release fingerprint: ${error.message}`);
  }
}
