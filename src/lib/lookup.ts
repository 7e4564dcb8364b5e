import { ParseError } from "./errors";
import { readTextFile } from "./files";
import {
  lookupKey,
  normalizeProtocolToken,
  normalizeTagToken,
  parsePort,
  splitCsvRow,
  splitLines,
} from "./filters";
import type { Logger } from "./logger";
import type { LookupEntry, LookupKey, LookupTable } from "./types";

/** Parses one `port,protocol,tag` row. Throws {@link ParseError}. */
export function parseLookupRow(line: string, lineNumber: number): LookupEntry {
  const fields = splitCsvRow(line);
  if (fields.length !== 3) {
    throw new ParseError(`expected 3 columns, found ${fields.length}`, lineNumber, line);
  }
  const [rawPort, rawProtocol, rawTag] = fields;
  const port = parsePort(rawPort);
  if (port === null) {
    throw new ParseError(`invalid port "${rawPort.trim()}"`, lineNumber, line);
  }
  const protocol = normalizeProtocolToken(rawProtocol);
  if (protocol === null) {
    throw new ParseError(`invalid protocol "${rawProtocol.trim()}"`, lineNumber, line);
  }
  const tag = normalizeTagToken(rawTag);
  if (!tag) {
    throw new ParseError("empty tag", lineNumber, line);
  }
  return { port, protocol, tag, lineNumber };
}

export function buildLookupTable(lines: Iterable<string>, logger: Logger): LookupTable {
  const table = new Map<LookupKey, string>();
  let lineNumber = 0;
  for (const line of lines) {
    lineNumber += 1;
    if (!line.trim()) {
      continue;
    }
    let entry: LookupEntry;
    try {
      entry = parseLookupRow(line, lineNumber);
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      if (lineNumber === 1) {
        logger.debug(`lookup: skipping header "${line.trim()}"`);
      } else {
        logger.warn(`lookup: ${error.message}, skipped`);
      }
      continue;
    }
    const key = lookupKey(entry.port, entry.protocol);
    const previous = table.get(key);
    if (previous !== undefined && previous !== entry.tag) {
      logger.debug(`lookup: line ${lineNumber} replaces tag "${previous}" for ${key}`);
    }
    table.set(key, entry.tag);
  }
  return table;
}

export function loadLookupTable(path: string, logger: Logger): LookupTable {
  const table = buildLookupTable(splitLines(readTextFile(path)), logger);
  logger.debug(`lookup: loaded ${table.size} entries from ${path}`);
  return table;
}
