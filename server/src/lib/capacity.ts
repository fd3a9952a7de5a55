/**
 * Counts live connection handlers against the configured worker limit.
 */
export class Capacity {
  private active = 0;

  constructor(readonly limit: number) {}

  tryAcquire(): boolean {
    if (this.active >= this.limit) return false;
    this.active += 1;
    return true;
  }

  release(): void {
    if (this.active > 0) this.active -= 1;
  }

  get inUse(): number {
    return this.active;
  }
}
