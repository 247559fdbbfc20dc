import { IdempotencyStore } from '../../src/middleware/idempotency.middleware';

export class InMemoryIdempotencyStore implements IdempotencyStore {
  readonly entries = new Map<string, { value: string; ttlSeconds: number }>();
  failing = false;

  async get(key: string): Promise<string | null> {
    this.check();
    return this.entries.get(key)?.value ?? null;
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    this.check();
    if (this.entries.has(key)) return false;
    this.entries.set(key, { value, ttlSeconds });
    return true;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.check();
    this.entries.set(key, { value, ttlSeconds });
  }

  async del(key: string): Promise<void> {
    this.check();
    this.entries.delete(key);
  }

  private check(): void {
    if (this.failing) throw new Error('redis unavailable');
  }
}
