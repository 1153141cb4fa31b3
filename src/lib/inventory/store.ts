import { ErrorCode } from '@/lib/errors/error-codes';
import { causeOf } from '@/lib/errors/error';

import type { AppError } from '@/lib/errors/error';
import type { CanonicalAssetRecord, StoredAsset } from '@/lib/ingest/canonical';

/** Downstream asset inventory. Every call may reject; callers treat rejections as per-record failures. */
export interface InventoryStore {
  getAll(): Promise<StoredAsset[]>;
  /** Matches the record's primary identity key or any of its aliases. */
  getByIdentity(key: string): Promise<StoredAsset | null>;
  create(record: CanonicalAssetRecord): Promise<string>;
  update(id: string, record: CanonicalAssetRecord): Promise<void>;
}

export function inventoryReadError(err: unknown, context: Record<string, string> = {}): AppError {
  return {
    code: ErrorCode.INVENTORY_READ_FAILED,
    category: 'inventory',
    message: 'Inventory read failed',
    retryable: true,
    redacted_context: { ...context, cause: causeOf(err) },
  };
}

export function inventoryWriteError(err: unknown, context: Record<string, string> = {}): AppError {
  return {
    code: ErrorCode.INVENTORY_WRITE_FAILED,
    category: 'inventory',
    message: 'Inventory write failed',
    retryable: true,
    redacted_context: { ...context, cause: causeOf(err) },
  };
}

export function answersTo(asset: StoredAsset, key: string): boolean {
  return asset.record.identity_key === key || asset.record.identity_aliases.includes(key);
}
