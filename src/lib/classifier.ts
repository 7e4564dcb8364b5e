import { UNTAGGED } from "./constants";
import { readTextFile } from "./files";
import { lookupKey, splitLines } from "./filters";
import { parseFlowLogLine } from "./flow-log";
import type { Logger } from "./logger";
import type { ClassificationResult, LookupKey, LookupTable, PortProtocolCount } from "./types";

export function classifyLines(
  lines: Iterable<string>,
  table: LookupTable,
  logger: Logger
): ClassificationResult {
  const result: ClassificationResult = {
    tagCounts: new Map<string, number>(),
    portProtocolCounts: new Map<LookupKey, PortProtocolCount>(),
    stats: { totalLines: 0, parsedLines: 0, skippedLines: 0 },
  };
  const { tagCounts, portProtocolCounts, stats } = result;

  let lineNumber = 0;
  for (const line of lines) {
    lineNumber += 1;
    if (!line.trim()) {
      continue;
    }
    stats.totalLines += 1;

    const parsed = parseFlowLogLine(line, lineNumber);
    if (!parsed.ok) {
      stats.skippedLines += 1;
      logger.warn(`flow log: ${parsed.error.message}, skipped`);
      continue;
    }
    stats.parsedLines += 1;

    const { dstPort, protocol } = parsed.value;
    const key = lookupKey(dstPort, protocol);
    const pair = portProtocolCounts.get(key);
    if (pair) {
      pair.count += 1;
    } else {
      portProtocolCounts.set(key, { port: dstPort, protocol, count: 1 });
    }

    const tag = table.get(key) ?? UNTAGGED;
    tagCounts.set(tag, (tagCounts.get(tag) ?? 0) + 1);
  }

  return result;
}

export function classifyFlowLog(
  path: string,
  table: LookupTable,
  logger: Logger
): ClassificationResult {
  return classifyLines(splitLines(readTextFile(path)), table, logger);
}
