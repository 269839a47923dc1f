/**
 * Coverage: count-down barrier.
 *
 * Opens once every expected participant has arrived. Waiting always takes a
 * timeout so a cell that never reports cannot hold the run open.
 */

export type BarrierOutcome = 'complete' | 'timeout';

export class CountDownBarrier {
  private readonly pending: Set<string>;
  private readonly waiters = new Set<() => void>();
  private opened = false;

  constructor(participants: Iterable<string>) {
    this.pending = new Set(participants);
    if (this.pending.size === 0) {
      this.opened = true;
    }
  }

  get isOpen(): boolean {
    return this.opened;
  }

  /** Participants that have not arrived, in the order they were registered. */
  get remaining(): readonly string[] {
    return [...this.pending];
  }

  /**
   * Record an arrival. Unknown and repeated arrivals are ignored.
   *
   * @returns `true` when this arrival opened the barrier.
   */
  arrive(participant: string): boolean {
    if (this.opened || !this.pending.delete(participant)) {
      return false;
    }
    if (this.pending.size === 0) {
      this.open();
      return true;
    }
    return false;
  }

  /** Open the barrier regardless of who is still pending. */
  release(): void {
    if (!this.opened) {
      this.open();
    }
  }

  wait(timeoutMs: number): Promise<BarrierOutcome> {
    if (this.opened) {
      return Promise.resolve('complete');
    }

    return new Promise<BarrierOutcome>((resolve) => {
      const onOpen = (): void => {
        clearTimeout(timer);
        resolve('complete');
      };
      const timer = setTimeout(() => {
        this.waiters.delete(onOpen);
        resolve('timeout');
      }, Math.max(0, timeoutMs));
      this.waiters.add(onOpen);
    });
  }

  private open(): void {
    this.opened = true;
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const waiter of waiters) {
      waiter();
    }
  }
}
