import { readFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createSink, createTempDir } from "../test-utils/fixtures";
import { FileError } from "./errors";
import { createLogger } from "./logger";
import { formatPortProtocolCounts, formatTagCounts, writeReports } from "./report";
import type { ClassificationResult, PortProtocolCounts } from "./types";

const pairs: PortProtocolCounts = new Map([
  ["443,tcp", { port: 443, protocol: "tcp", count: 1 }],
  ["53,udp", { port: 53, protocol: "udp", count: 3 }],
  ["25,tcp", { port: 25, protocol: "tcp", count: 3 }],
]);

describe("formatTagCounts", () => {
  const counts = new Map([
    ["Untagged", 2],
    ["http", 1],
    ["dns", 3],
  ]);

  it("writes tags in first-seen order with Untagged last", () => {
    expect(formatTagCounts(counts)).toBe("Tag,Count\nhttp,1\ndns,3\nUntagged,2\n");
  });

  it("sorts by count when asked", () => {
    expect(formatTagCounts(counts, "count")).toBe("Tag,Count\ndns,3\nhttp,1\nUntagged,2\n");
    expect(formatTagCounts(new Map([["b", 1], ["a", 1]]), "count")).toBe(
      "Tag,Count\na,1\nb,1\nUntagged,0\n"
    );
  });

  it("always writes an Untagged row", () => {
    expect(formatTagCounts(new Map())).toBe("Tag,Count\nUntagged,0\n");
  });

  it("quotes tags that need it", () => {
    expect(formatTagCounts(new Map([["web, secure", 4]]))).toBe(
      'Tag,Count\n"web, secure",4\nUntagged,0\n'
    );
  });
});

describe("formatPortProtocolCounts", () => {
  it("writes pairs in first-seen order", () => {
    expect(formatPortProtocolCounts(pairs)).toBe(
      "Port,Protocol,Count\n443,tcp,1\n53,udp,3\n25,tcp,3\n"
    );
  });

  it("sorts by count, then port", () => {
    expect(formatPortProtocolCounts(pairs, "count")).toBe(
      "Port,Protocol,Count\n25,tcp,3\n53,udp,3\n443,tcp,1\n"
    );
  });
});

describe("writeReports", () => {
  let dir: string;
  let cleanup: () => void;

  const result: ClassificationResult = {
    tagCounts: new Map([["email", 2]]),
    portProtocolCounts: new Map([["110,tcp", { port: 110, protocol: "tcp", count: 2 }]]),
    stats: { totalLines: 2, parsedLines: 2, skippedLines: 0 },
  };

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
  });

  afterEach(() => {
    cleanup();
  });

  it("overwrites both output files", () => {
    const tagOutput = join(dir, "tags.csv");
    const portOutput = join(dir, "ports.csv");
    writeReports(result, { tagOutput, portOutput }, "seen", createLogger("warn", createSink()));
    writeReports(result, { tagOutput, portOutput }, "seen", createLogger("warn", createSink()));

    expect(readFileSync(tagOutput, "utf8")).toBe("Tag,Count\nemail,2\nUntagged,0\n");
    expect(readFileSync(portOutput, "utf8")).toBe("Port,Protocol,Count\n110,tcp,2\n");
  });

  it("fails with FileError when an output cannot be written", () => {
    const tagOutput = join(dir, "missing", "tags.csv");
    let caught: unknown;
    try {
      writeReports(
        result,
        { tagOutput, portOutput: join(dir, "ports.csv") },
        "seen",
        createLogger("warn", createSink())
      );
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(FileError);
    expect(caught).toMatchObject({ operation: "write", path: tagOutput });
  });
});
