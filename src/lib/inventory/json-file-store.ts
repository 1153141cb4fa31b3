import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod/v4';

import { MemoryInventoryStore } from '@/lib/inventory/memory-store';
import { inventoryReadError, inventoryWriteError } from '@/lib/inventory/store';
import { isCanonicalAsset } from '@/lib/schema/validate';

import type { CanonicalAssetRecord, StoredAsset } from '@/lib/ingest/canonical';
import type { InventoryStore } from '@/lib/inventory/store';

const InventoryFileSchema = z.object({
  version: z.literal(1),
  assets: z.array(z.object({ id: z.string().min(1), record: z.unknown() })),
});

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Inventory persisted as one JSON document. The file is loaded on first use and rewritten (temp file + rename) after
 * every write; writes are serialized, and a write that fails to reach the file leaves the loaded state untouched.
 */
export class JsonFileInventoryStore implements InventoryStore {
  private memory: Promise<MemoryInventoryStore> | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  private load(): Promise<MemoryInventoryStore> {
    if (this.memory) return this.memory;

    const loading = this.read();
    this.memory = loading;
    // A failed load is retried on the next call.
    void loading.catch(() => {
      if (this.memory === loading) this.memory = null;
    });
    return loading;
  }

  private async read(): Promise<MemoryInventoryStore> {
    let text: string | null = null;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (!isNotFound(err)) throw inventoryReadError(err, { path: this.filePath });
    }

    const seed: StoredAsset[] = [];
    if (text !== null) {
      let parsed: z.output<typeof InventoryFileSchema>;
      try {
        parsed = InventoryFileSchema.parse(JSON.parse(text));
      } catch (err) {
        throw inventoryReadError(err, { path: this.filePath });
      }

      for (const asset of parsed.assets) {
        if (!isCanonicalAsset(asset.record)) {
          throw inventoryReadError(new Error(`asset ${asset.id} is not a canonical-asset-v1 record`), {
            path: this.filePath,
          });
        }
        seed.push({ id: asset.id, record: asset.record });
      }
    }

    return new MemoryInventoryStore(seed);
  }

  private async persist(memory: MemoryInventoryStore): Promise<void> {
    const assets = await memory.getAll();
    const tmp = `${this.filePath}.tmp`;
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(tmp, `${JSON.stringify({ version: 1, assets }, null, 2)}\n`, 'utf8');
    await rename(tmp, this.filePath);
  }

  private serialized<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  async getAll(): Promise<StoredAsset[]> {
    const memory = await this.load();
    return memory.getAll();
  }

  async getByIdentity(key: string): Promise<StoredAsset | null> {
    const memory = await this.load();
    return memory.getByIdentity(key);
  }

  /** Applies a write to a copy, persists the copy and only then makes it the live state. */
  private commit<T>(change: (staged: MemoryInventoryStore) => Promise<{ value: T; id: string }>): Promise<T> {
    return this.serialized(async () => {
      const memory = await this.load();
      const staged = new MemoryInventoryStore(await memory.getAll());
      const { value, id } = await change(staged);
      try {
        await this.persist(staged);
      } catch (err) {
        throw inventoryWriteError(err, { path: this.filePath, id });
      }
      this.memory = Promise.resolve(staged);
      return value;
    });
  }

  create(record: CanonicalAssetRecord): Promise<string> {
    return this.commit(async (staged) => {
      const id = await staged.create(record);
      return { value: id, id };
    });
  }

  update(id: string, record: CanonicalAssetRecord): Promise<void> {
    return this.commit(async (staged) => {
      await staged.update(id, record);
      return { value: undefined, id };
    });
  }
}
