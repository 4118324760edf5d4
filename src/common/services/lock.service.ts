import { Injectable } from '@nestjs/common';

/**
 * Named mutual exclusion for jobs inside one process. Two instances of the
 * API each keep their own set.
 */
@Injectable()
export class LockService {
  private readonly held = new Set<string>();

  /** Runs the task under `name`, or resolves to null when it is already held. */
  async runExclusive<T>(name: string, task: () => Promise<T>): Promise<T | null> {
    if (this.held.has(name)) return null;
    this.held.add(name);
    try {
      return await task();
    } finally {
      this.held.delete(name);
    }
  }

  isHeld(name: string): boolean {
    return this.held.has(name);
  }
}
