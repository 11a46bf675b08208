/**
 * Single-slot, last-write-wins mailbox between the key listener and the sample loop
 */
export class PendingKey {
  private value: string | undefined;
  private fresh = false;

  /** Overwrites any key not yet taken */
  put(key: string): void {
    this.value = key;
    this.fresh = true;
  }

  /** Returns the newest key once, then undefined until the next put */
  take(): string | undefined {
    if (!this.fresh) return undefined;
    this.fresh = false;
    return this.value;
  }

  hasPending(): boolean {
    return this.fresh;
  }
}
