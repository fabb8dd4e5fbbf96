/**
 * One-shot "target reached" flag shared by all workers
 */
export class TerminationSignal {
  private fired = false;
  private listeners: Array<() => void> = [];
  private settled: Promise<void>;
  private resolveSettled: () => void = () => {};

  constructor() {
    this.settled = new Promise<void>((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  /** Fire the signal. Later calls are no-ops. */
  set(): void {
    if (this.fired) return;
    this.fired = true;
    const listeners = this.listeners;
    this.listeners = [];
    for (const listener of listeners) listener();
    this.resolveSettled();
  }

  isSet(): boolean {
    return this.fired;
  }

  /** Run `listener` once when the signal fires (immediately if it already has). */
  onSet(listener: () => void): void {
    if (this.fired) {
      listener();
      return;
    }
    this.listeners.push(listener);
  }

  whenSet(): Promise<void> {
    return this.settled;
  }
}
