export const ErrorCode = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_RULES_INVALID: 'CONFIG_RULES_INVALID',
  CONFIG_STATIC_OVERRIDES_INVALID: 'CONFIG_STATIC_OVERRIDES_INVALID',

  SOURCE_ACQUISITION_FAILED: 'SOURCE_ACQUISITION_FAILED',
  SOURCE_PARSE_FAILED: 'SOURCE_PARSE_FAILED',

  SCHEMA_VALIDATION_FAILED: 'SCHEMA_VALIDATION_FAILED',
  MERGE_CONFLICT: 'MERGE_CONFLICT',

  INVENTORY_READ_FAILED: 'INVENTORY_READ_FAILED',
  INVENTORY_WRITE_FAILED: 'INVENTORY_WRITE_FAILED',
  INVENTORY_WRITE_TIMEOUT: 'INVENTORY_WRITE_TIMEOUT',

  SYNC_CANCELLED: 'SYNC_CANCELLED',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];
