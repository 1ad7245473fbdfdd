/**
 * Message Deduplication Service
 *
 * WAHA redelivers webhooks on timeouts and echoes some events twice. Each
 * inbound message is claimed once through storage (atomic insert-on-conflict
 * for DbStorage); if storage fails, an in-process map takes over.
 */

import type { IStorage } from "../storage";
import { DEDUPE_CONSTANTS } from "../config/constants";
import { getErrorMessage } from "../utils/errorHandler";

const TTL_MS = DEDUPE_CONSTANTS.TTL_HOURS * 60 * 60 * 1000;

/**
 * `id:from:first-50-chars-of-body`. The body part catches gateways that
 * reuse ids across edited messages.
 */
export function buildDedupeKey(messageId: string, from: string, body: string): string {
  return `${messageId}:${from}:${body.slice(0, DEDUPE_CONSTANTS.KEY_BODY_CHARS)}`;
}

export class MessageDeduplicator {
  private memoryFallback = new Map<string, number>();
  private cleanupCounter = 0;
  private startupCleanupDone = false;

  constructor(
    private readonly storage: IStorage,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * @returns true if the message is new and now claimed, false for a duplicate
   */
  async claim(key: string): Promise<boolean> {
    try {
      const claimed = await this.storage.claimMessage(key);
      if (!claimed) {
        console.log(`[Dedupe] Duplicate detected (storage): ${key}`);
      }
      return claimed;
    } catch (error) {
      console.log(`[Dedupe] Storage error, falling back to memory: ${getErrorMessage(error)}`);
      return this.claimInMemory(key);
    }
  }

  private claimInMemory(key: string): boolean {
    const now = this.clock().getTime();
    if (this.memoryFallback.size > DEDUPE_CONSTANTS.MAX_MEMORY_SIZE) {
      const cutoff = now - TTL_MS;
      this.memoryFallback.forEach((timestamp, k) => {
        if (timestamp < cutoff) this.memoryFallback.delete(k);
      });
    }

    if (this.memoryFallback.has(key)) {
      console.log(`[Dedupe] Duplicate detected (memory): ${key}`);
      return false;
    }
    this.memoryFallback.set(key, now);
    return true;
  }

  async cleanupOldEntries(): Promise<number> {
    const cutoff = new Date(this.clock().getTime() - TTL_MS);
    const removed = await this.storage.pruneMessageClaims(cutoff);
    if (removed > 0) {
      console.log(`[Dedupe] Cleaned up ${removed} old entries`);
    }
    return removed;
  }

  /**
   * Prunes on the first call, then every CLEANUP_INTERVAL calls.
   */
  maybeCleanup(): void {
    if (this.startupCleanupDone) {
      this.cleanupCounter++;
      if (this.cleanupCounter < DEDUPE_CONSTANTS.CLEANUP_INTERVAL) return;
      this.cleanupCounter = 0;
    }
    this.startupCleanupDone = true;

    this.cleanupOldEntries().catch((error) => {
      console.log(`[Dedupe] Cleanup error: ${getErrorMessage(error)}`);
    });
  }
}
