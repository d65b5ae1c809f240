import type {PPGSample} from '../types/PPGTypes';

/**
 * Fixed-capacity FIFO of samples. Once full, each append overwrites the
 * oldest sample, so `count` never exceeds `capacity`.
 */
export class SignalBuffer {
  private readonly slots: Array<PPGSample | undefined>;
  private head = 0;
  private length = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error('SignalBuffer capacity must be a positive integer');
    }
    this.slots = new Array<PPGSample | undefined>(capacity);
  }

  append(sample: PPGSample): void {
    this.slots[(this.head + this.length) % this.capacity] = sample;
    if (this.length < this.capacity) {
      this.length += 1;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /** Most recent `n` samples, oldest first. */
  windowed(n: number = this.length): readonly PPGSample[] {
    const take = Math.max(0, Math.min(Math.floor(n), this.length));
    const items: PPGSample[] = [];
    for (let i = this.length - take; i < this.length; i += 1) {
      const sample = this.slots[(this.head + i) % this.capacity];
      if (sample) {
        items.push(sample);
      }
    }
    return items;
  }

  values(n: number = this.length): number[] {
    return this.windowed(n).map(sample => sample.value);
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.length = 0;
  }

  get count(): number {
    return this.length;
  }

  get maxSamples(): number {
    return this.capacity;
  }

  isFull(): boolean {
    return this.length === this.capacity;
  }
}
