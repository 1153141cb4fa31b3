import { describe, expect, it } from 'vitest';

import { MemoryInventoryStore } from '@/lib/inventory/memory-store';
import { canonicalFixture } from '@/test/fixtures';

describe('MemoryInventoryStore', () => {
  it('creates with sequential ids and finds records by key or alias', async () => {
    const store = new MemoryInventoryStore();
    const id = await store.create(canonicalFixture());

    expect(id).toBe('asset-1');
    expect((await store.getByIdentity('serial:PF3X'))?.id).toBe('asset-1');
    expect((await store.getByIdentity('mac:aabbccddeeff'))?.id).toBe('asset-1');
    expect(await store.getByIdentity('mac:000000000001')).toBeNull();
  });

  it('continues numbering after seeded ids', async () => {
    const store = new MemoryInventoryStore([{ id: 'asset-7', record: canonicalFixture() }]);
    const id = await store.create(canonicalFixture({ identity_key: 'serial:OTHER', identity_aliases: [] }));
    expect(id).toBe('asset-8');
    expect(store.size).toBe(2);
  });

  it('isolates stored records from caller mutation', async () => {
    const store = new MemoryInventoryStore();
    const record = canonicalFixture();
    const id = await store.create(record);
    record.display_name = 'changed';

    const [stored] = await store.getAll();
    expect(stored).toEqual({ id, record: canonicalFixture() });
  });

  it('rejects updates for unknown ids', async () => {
    const store = new MemoryInventoryStore();
    await expect(store.update('asset-99', canonicalFixture())).rejects.toThrow('unknown asset id: asset-99');
  });
});
