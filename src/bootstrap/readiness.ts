/**
 * Process-wide "bootstrap finished" flag.
 *
 * Written only by the bootstrap orchestrator, read by the status server and
 * extensions. Reads never block; a reader may briefly see the old value.
 */
export class ReadinessFlag {
  private ready = false;
  private readyAt: number | null = null;

  isReady(): boolean {
    return this.ready;
  }

  /** `Date.now()` of the moment the flag was raised, or null while starting. */
  since(): number | null {
    return this.readyAt;
  }

  markReady(now: number = Date.now()): void {
    if (this.ready) return;
    this.ready = true;
    this.readyAt = now;
  }
}
