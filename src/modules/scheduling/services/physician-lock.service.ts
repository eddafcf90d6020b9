import { Injectable } from '@nestjs/common';

/**
 * Keyed async mutex. Tasks for the same physician run one after another in
 * arrival order; tasks for different physicians never wait on each other.
 */
@Injectable()
export class PhysicianLockService {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(physicianId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(physicianId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(physicianId, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(physicianId) === tail) {
        this.tails.delete(physicianId);
      }
    }
  }

  isLocked(physicianId: string): boolean {
    return this.tails.has(physicianId);
  }
}
