import { PORT_REPORT_HEADER, TAG_REPORT_HEADER, UNTAGGED } from "./constants";
import { encodeCsvField } from "./filters";
import { writeTextFile } from "./files";
import type { Logger } from "./logger";
import type {
  ClassificationResult,
  PortProtocolCount,
  PortProtocolCounts,
  SortOrder,
  TagCounts,
} from "./types";

export interface ReportPaths {
  tagOutput: string;
  portOutput: string;
}

function toCsv(header: string, rows: string[][]): string {
  const lines = [header, ...rows.map((row) => row.map(encodeCsvField).join(","))];
  return `${lines.join("\n")}\n`;
}

export function formatTagCounts(counts: TagCounts, sort: SortOrder = "seen"): string {
  const entries = [...counts.entries()].filter(([tag]) => tag !== UNTAGGED);
  if (sort === "count") {
    entries.sort(([a, x], [b, y]) => y - x || a.localeCompare(b));
  }
  const rows = entries.map(([tag, count]) => [tag, String(count)]);
  rows.push([UNTAGGED, String(counts.get(UNTAGGED) ?? 0)]);
  return toCsv(TAG_REPORT_HEADER, rows);
}

function comparePairs(a: PortProtocolCount, b: PortProtocolCount): number {
  return b.count - a.count || a.port - b.port || a.protocol.localeCompare(b.protocol);
}

export function formatPortProtocolCounts(
  counts: PortProtocolCounts,
  sort: SortOrder = "seen"
): string {
  const pairs = [...counts.values()];
  if (sort === "count") {
    pairs.sort(comparePairs);
  }
  const rows = pairs.map(({ port, protocol, count }) => [
    String(port),
    protocol,
    String(count),
  ]);
  return toCsv(PORT_REPORT_HEADER, rows);
}

export function writeReports(
  result: ClassificationResult,
  paths: ReportPaths,
  sort: SortOrder,
  logger: Logger
): void {
  writeTextFile(paths.tagOutput, formatTagCounts(result.tagCounts, sort));
  logger.debug(`report: wrote tag counts to ${paths.tagOutput}`);
  writeTextFile(paths.portOutput, formatPortProtocolCounts(result.portProtocolCounts, sort));
  logger.debug(`report: wrote port/protocol counts to ${paths.portOutput}`);
}
