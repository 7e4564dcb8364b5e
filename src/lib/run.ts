import { classifyFlowLog } from "./classifier";
import type { RunOptions } from "./config";
import type { Logger } from "./logger";
import { loadLookupTable } from "./lookup";
import { writeReports } from "./report";
import type { ClassificationResult } from "./types";

export function run(options: RunOptions, logger: Logger): ClassificationResult {
  const table = loadLookupTable(options.lookupFile, logger);
  const result = classifyFlowLog(options.logFile, table, logger);
  writeReports(result, options, options.sort, logger);

  const { totalLines, parsedLines, skippedLines } = result.stats;
  logger.info(`parsed ${parsedLines} of ${totalLines} lines, skipped ${skippedLines}`);
  return result;
}
