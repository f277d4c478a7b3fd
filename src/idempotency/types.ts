export type DedupResult =
  | { status: 'new'; fingerprint: string }
  | { status: 'duplicate'; fingerprint: string; firstSeenAt: Date };

export interface DedupOptions {
  expireWindowSeconds: number;
  maxSize: number;
}

export interface DedupStats {
  size: number;
  maxSize: number;
  expireWindowMs: number;
  admitted: number;
  rejected: number;
}
