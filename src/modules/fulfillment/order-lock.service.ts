import { Injectable } from '@nestjs/common';

const settled = (): void => undefined;

/**
 * In-process mutual exclusion keyed by organization and order. Tasks for the
 * same key run one after another in arrival order; a failing task releases
 * the key like a successful one.
 */
@Injectable()
export class OrderLockService {
  private readonly tails = new Map<string, Promise<void>>();

  static orderKey(organizationId: string, orderId: number): string {
    return `${organizationId}:order:${orderId}`;
  }

  static organizationKey(organizationId: string): string {
    return `${organizationId}:orders`;
  }

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(settled, settled);
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
