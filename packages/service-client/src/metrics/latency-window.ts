/**
 * Fixed-capacity ring buffer of latency samples. Once full, each new sample
 * overwrites the oldest one.
 */
export class LatencyWindow {
  private readonly samples: number[] = [];
  private next = 0;

  constructor(readonly capacity: number = 1000) {}

  get size(): number {
    return this.samples.length;
  }

  push(value: number): void {
    if (this.samples.length < this.capacity) {
      this.samples.push(value);
      return;
    }
    this.samples[this.next] = value;
    this.next = (this.next + 1) % this.capacity;
  }

  /** Samples from oldest to newest. */
  values(): number[] {
    return [...this.samples.slice(this.next), ...this.samples.slice(0, this.next)];
  }

  clear(): void {
    this.samples.length = 0;
    this.next = 0;
  }
}
