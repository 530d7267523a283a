// node/src/services/cache/kv-store.ts: durable key-value contract with per-key expiry

export interface KeyValueStore {
  readonly name: string;
  /** Writes atomically with an expiry of `ttlSeconds`. */
  put(key: string, value: string, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | null>;
  delete(key: string): Promise<void>;
  /** Every live key starting with `prefix`. */
  scanKeys(prefix: string): Promise<string[]>;
  isAvailable(): boolean;
}

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

/** Process-local store. Expired keys are dropped when touched. */
export class InMemoryKeyValueStore implements KeyValueStore {
  readonly name = 'memory';
  private readonly memory = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.memory.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async get(key: string): Promise<string | null> {
    const entry = this.memory.get(key);
    if (!entry) return null;
    if (this.now() >= entry.expiresAt) {
      this.memory.delete(key);
      return null;
    }
    return entry.value;
  }

  async delete(key: string): Promise<void> {
    this.memory.delete(key);
  }

  async scanKeys(prefix: string): Promise<string[]> {
    const now = this.now();
    const keys: string[] = [];
    for (const [key, entry] of this.memory) {
      if (now >= entry.expiresAt) {
        this.memory.delete(key);
        continue;
      }
      if (key.startsWith(prefix)) keys.push(key);
    }
    return keys;
  }

  isAvailable(): boolean {
    return true;
  }

  /** Physically stored keys, expired or not. */
  get rawSize(): number {
    return this.memory.size;
  }
}
