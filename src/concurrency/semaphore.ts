export interface Semaphore {
  tryAcquire(): boolean;
  acquire(): Promise<void>;
  release(): void;
  getInFlight(): number;
  getPeak(): number;
  getAvailable(): number;
  getWaiting(): number;
}

/**
 * Counting semaphore with a FIFO wait queue. A release hands its permit
 * straight to the oldest waiter, so permits + inFlight stays equal to
 * maxPermits.
 */
export class InMemorySemaphore implements Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];
  private currentInFlight: number = 0;
  private peakInFlight: number = 0;

  constructor(maxPermits: number) {
    if (!Number.isInteger(maxPermits) || maxPermits <= 0) {
      throw new Error('Semaphore maxPermits must be a positive integer');
    }
    this.permits = maxPermits;
  }

  tryAcquire(): boolean {
    if (this.permits > 0) {
      this.permits--;
      this.markAcquired();
      return true;
    }
    return false;
  }

  acquire(): Promise<void> {
    if (this.tryAcquire()) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    if (this.currentInFlight === 0) {
      throw new Error('Semaphore released more times than acquired');
    }

    this.currentInFlight--;

    const next = this.waiting.shift();
    if (next) {
      this.markAcquired();
      next();
    } else {
      this.permits++;
    }
  }

  getInFlight(): number {
    return this.currentInFlight;
  }

  getPeak(): number {
    return this.peakInFlight;
  }

  getAvailable(): number {
    return this.permits;
  }

  getWaiting(): number {
    return this.waiting.length;
  }

  private markAcquired(): void {
    this.currentInFlight++;
    if (this.currentInFlight > this.peakInFlight) {
      this.peakInFlight = this.currentInFlight;
    }
  }
}
