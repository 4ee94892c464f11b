type IdempotencyKey = string & { readonly __idempotencyKey: unique symbol };

interface IdempotencyEntry<T> {
  response: T;
  expiresAt: number;
}

export class IdempotencyStore<T> {
  private entries = new Map<IdempotencyKey, IdempotencyEntry<T>>();

  constructor(
    private readonly ttlSeconds = 60,
    private readonly clock: () => Date = () => new Date()
  ) {}

  get(key: string): T | undefined {
    const k = key.trim() as IdempotencyKey;
    const entry = this.entries.get(k);

    if (!entry) return undefined;

    if (this.clock().getTime() > entry.expiresAt) {
      this.entries.delete(k);
      return undefined;
    }

    return entry.response;
  }

  set(key: string, response: T): void {
    const k = key.trim() as IdempotencyKey;
    const now = this.clock().getTime();
    this.sweep(now);
    this.entries.set(k, { response, expiresAt: now + this.ttlSeconds * 1000 });
  }

  get size(): number {
    return this.entries.size;
  }

  // keys that are never looked up again would otherwise stay forever
  private sweep(now: number): void {
    for (const [k, entry] of this.entries) {
      if (now > entry.expiresAt) this.entries.delete(k);
    }
  }
}
