import { answersTo } from '@/lib/inventory/store';

import type { CanonicalAssetRecord, StoredAsset } from '@/lib/ingest/canonical';
import type { InventoryStore } from '@/lib/inventory/store';

/** In-process store; records are cloned on the way in and out so callers cannot mutate stored state. */
export class MemoryInventoryStore implements InventoryStore {
  private readonly assets = new Map<string, CanonicalAssetRecord>();
  private nextId = 1;

  constructor(seed: StoredAsset[] = []) {
    for (const asset of seed) {
      this.assets.set(asset.id, structuredClone(asset.record));
      const numeric = Number(asset.id.replace(/^asset-/, ''));
      if (Number.isInteger(numeric) && numeric >= this.nextId) this.nextId = numeric + 1;
    }
  }

  async getAll(): Promise<StoredAsset[]> {
    return Array.from(this.assets, ([id, record]) => ({ id, record: structuredClone(record) }));
  }

  async getByIdentity(key: string): Promise<StoredAsset | null> {
    for (const [id, record] of this.assets) {
      const asset = { id, record };
      if (answersTo(asset, key)) return { id, record: structuredClone(record) };
    }
    return null;
  }

  async create(record: CanonicalAssetRecord): Promise<string> {
    const id = `asset-${this.nextId}`;
    this.nextId += 1;
    this.assets.set(id, structuredClone(record));
    return id;
  }

  async update(id: string, record: CanonicalAssetRecord): Promise<void> {
    if (!this.assets.has(id)) throw new Error(`unknown asset id: ${id}`);
    this.assets.set(id, structuredClone(record));
  }

  get size(): number {
    return this.assets.size;
  }
}
