/**
 * In-memory mock for IFingerprintRepository.
 * Check-and-set runs without an await in between, so it is atomic on the event loop.
 */

import type {
  IFingerprintRepository,
  RegisterOutcome,
} from '../../src/repositories/IFingerprintRepository.js';

export class MockFingerprintRepository implements IFingerprintRepository {
  private fingerprints = new Map<string, string>();

  async exists(fingerprint: string): Promise<boolean> {
    return this.fingerprints.has(fingerprint);
  }

  async registerIfAbsent(fingerprint: string, uuid: string): Promise<RegisterOutcome> {
    await Promise.resolve();
    if (this.fingerprints.has(fingerprint)) return 'duplicate';
    this.fingerprints.set(fingerprint, uuid);
    return 'created';
  }

  async release(fingerprint: string, uuid: string): Promise<void> {
    if (this.fingerprints.get(fingerprint) === uuid) {
      this.fingerprints.delete(fingerprint);
    }
  }

  // ── Test Helpers ──

  get size(): number {
    return this.fingerprints.size;
  }

  ownerOf(fingerprint: string): string | undefined {
    return this.fingerprints.get(fingerprint);
  }
}
