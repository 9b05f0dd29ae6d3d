/**
 * Fingerprint index — the single dedup authority across all partitions.
 */

export type RegisterOutcome = 'created' | 'duplicate';

export interface IFingerprintRepository {
  exists(fingerprint: string): Promise<boolean>;

  /**
   * Atomic under concurrent callers: exactly one caller per fingerprint
   * receives 'created'; all others receive 'duplicate'.
   */
  registerIfAbsent(fingerprint: string, uuid: string): Promise<RegisterOutcome>;

  /**
   * Remove a registration, but only if it still points at `uuid`.
   * Compensates a registration whose staging insert failed.
   */
  release(fingerprint: string, uuid: string): Promise<void>;
}
