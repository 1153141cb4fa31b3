export type ScanPort = {
  state?: string;
  name?: string;
  product?: string;
  version?: string;
};

/** One host from a port-scan result, keyed the way common scanners export it. */
export type ScanHost = {
  addresses?: { ipv4?: string | null; mac?: string | null };
  hostnames?: Array<{ name?: string | null; type?: string | null }>;
  vendor?: Record<string, string>;
  osmatch?: Array<{ name?: string | null; accuracy?: string | number | null }>;
  status?: { state?: string | null };
  tcp?: Record<string, ScanPort>;
  udp?: Record<string, ScanPort>;
  scanned_at?: string | null;
};
