import type { CanonicalAssetRecord, StoredAsset } from '@/lib/ingest/canonical';
import type { InventoryStore } from '@/lib/inventory/store';

type CacheEntry<T> = {
  expiresAt: number;
  value: T;
};

/**
 * TTL cache over the read side of another store. Any write drops every cached entry, so reads after a write always
 * reach the backing store.
 */
export class CachedInventoryStore implements InventoryStore {
  private all: CacheEntry<StoredAsset[]> | null = null;
  private readonly byKey = new Map<string, CacheEntry<StoredAsset | null>>();

  constructor(
    private readonly inner: InventoryStore,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  private fresh<T>(entry: CacheEntry<T> | null | undefined): entry is CacheEntry<T> {
    return !!entry && this.now() <= entry.expiresAt;
  }

  async getAll(): Promise<StoredAsset[]> {
    if (this.ttlMs > 0 && this.fresh(this.all)) return this.all.value;
    const value = await this.inner.getAll();
    if (this.ttlMs > 0) this.all = { value, expiresAt: this.now() + this.ttlMs };
    return value;
  }

  async getByIdentity(key: string): Promise<StoredAsset | null> {
    const cached = this.byKey.get(key);
    if (this.ttlMs > 0 && this.fresh(cached)) return cached.value;
    if (cached) this.byKey.delete(key);

    const value = await this.inner.getByIdentity(key);
    if (this.ttlMs > 0) this.byKey.set(key, { value, expiresAt: this.now() + this.ttlMs });
    return value;
  }

  async create(record: CanonicalAssetRecord): Promise<string> {
    this.invalidate();
    try {
      return await this.inner.create(record);
    } finally {
      this.invalidate();
    }
  }

  async update(id: string, record: CanonicalAssetRecord): Promise<void> {
    this.invalidate();
    try {
      await this.inner.update(id, record);
    } finally {
      this.invalidate();
    }
  }

  invalidate(): void {
    this.all = null;
    this.byKey.clear();
  }
}
