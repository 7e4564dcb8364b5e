import {
  FIELD_ACTION,
  FIELD_DST_PORT,
  FIELD_LOG_STATUS,
  FIELD_PROTOCOL,
  FIELD_SRC_PORT,
  FIELD_VERSION,
  FLOW_LOG_FIELD_COUNT,
  FLOW_LOG_VERSION,
  LOG_STATUS_OK,
} from "./constants";
import { ParseError } from "./errors";
import { normalizeProtocolToken, parsePort } from "./filters";
import type { FlowLogRecord, ParseResult } from "./types";

function fail(message: string, lineNumber: number, line: string): ParseResult<FlowLogRecord> {
  return { ok: false, error: new ParseError(message, lineNumber, line) };
}

/**
 * Parses a version 2 flow log record:
 *
 * `version account-id interface-id srcaddr dstaddr srcport dstport protocol
 * packets bytes start end action log-status`
 */
export function parseFlowLogLine(line: string, lineNumber: number): ParseResult<FlowLogRecord> {
  const fields = line.trim().split(/\s+/);
  if (fields.length !== FLOW_LOG_FIELD_COUNT) {
    return fail(
      `expected ${FLOW_LOG_FIELD_COUNT} fields, found ${fields.length}`,
      lineNumber,
      line
    );
  }

  const version = Number(fields[FIELD_VERSION]);
  if (version !== FLOW_LOG_VERSION) {
    return fail(`unsupported version "${fields[FIELD_VERSION]}"`, lineNumber, line);
  }

  const logStatus = fields[FIELD_LOG_STATUS];
  if (logStatus !== LOG_STATUS_OK) {
    return fail(`log status is ${logStatus}`, lineNumber, line);
  }

  const dstPort = parsePort(fields[FIELD_DST_PORT]);
  if (dstPort === null) {
    return fail(`invalid destination port "${fields[FIELD_DST_PORT]}"`, lineNumber, line);
  }

  const protocol = normalizeProtocolToken(fields[FIELD_PROTOCOL]);
  if (protocol === null) {
    return fail(`unsupported protocol "${fields[FIELD_PROTOCOL]}"`, lineNumber, line);
  }

  return {
    ok: true,
    value: {
      lineNumber,
      version,
      srcPort: parsePort(fields[FIELD_SRC_PORT]),
      dstPort,
      protocol,
      action: fields[FIELD_ACTION],
      logStatus,
    },
  };
}
