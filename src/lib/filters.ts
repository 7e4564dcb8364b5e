import { KEY_SEPARATOR, MAX_PORT, PROTOCOL_NAMES } from "./constants";
import type { LookupKey } from "./types";

const DIGITS = /^\d+$/;
const PROTOCOL_NAME = /^[a-z][a-z0-9-]*$/;

export function normalizeTagToken(value: string): string {
  if (!value) {
    return "";
  }
  return value.trim().toLowerCase();
}

/**
 * Lowercases a protocol name, or translates an IANA protocol number to its
 * name. Returns `null` for anything that is neither.
 */
export function normalizeProtocolToken(value: string): string | null {
  const token = value ? value.trim().toLowerCase() : "";
  if (!token) {
    return null;
  }
  if (DIGITS.test(token)) {
    return PROTOCOL_NAMES[Number.parseInt(token, 10)] ?? null;
  }
  return PROTOCOL_NAME.test(token) ? token : null;
}

export function parsePort(value: string): number | null {
  const token = value ? value.trim() : "";
  if (!DIGITS.test(token)) {
    return null;
  }
  const port = Number.parseInt(token, 10);
  if (port > MAX_PORT) {
    return null;
  }
  return port;
}

export function lookupKey(port: number, protocol: string): LookupKey {
  return `${port}${KEY_SEPARATOR}${protocol}`;
}

export function splitCsvRow(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
      continue;
    }
    if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      fields.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  fields.push(current);
  return fields;
}

export function encodeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function splitLines(text: string): string[] {
  return text.split("\n").map((line) => line.replace(/\r$/, ""));
}
