import type { ParseError } from "./errors";

/** Serialized `(port, protocol)` pair, e.g. `"443,tcp"`. */
export type LookupKey = string;

export interface LookupEntry {
  port: number;
  protocol: string;
  tag: string;
  lineNumber: number;
}

export type LookupTable = ReadonlyMap<LookupKey, string>;

export interface FlowLogRecord {
  lineNumber: number;
  version: number;
  srcPort: number | null;
  dstPort: number;
  protocol: string;
  action: string;
  logStatus: string;
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseError };

export interface PortProtocolCount {
  port: number;
  protocol: string;
  count: number;
}

export type TagCounts = Map<string, number>;

export type PortProtocolCounts = Map<LookupKey, PortProtocolCount>;

export interface ClassificationStats {
  totalLines: number;
  parsedLines: number;
  skippedLines: number;
}

export interface ClassificationResult {
  tagCounts: TagCounts;
  portProtocolCounts: PortProtocolCounts;
  stats: ClassificationStats;
}

export type SortOrder = "seen" | "count";

export type LogLevel = "error" | "warn" | "info" | "debug";
