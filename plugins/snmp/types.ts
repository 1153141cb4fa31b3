/** One responsive host: OID -> value as returned by the poller (leading dots allowed). */
export type SnmpHostResult = {
  ip: string;
  polled_at?: string | null;
  oids: Record<string, string | number | null>;
};
