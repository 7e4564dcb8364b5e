import { readFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveRunOptions } from "../src/lib/config";
import { createLogger } from "../src/lib/logger";
import { parseLookupRow } from "../src/lib/lookup";
import { parseFlowLogLine } from "../src/lib/flow-log";
import { run } from "../src/lib/run";
import { createSink, createTempDir } from "../src/test-utils/fixtures";
import { createFlowLogLine, createLookupRows, sampleServices, writeSamples } from "./sample-data";

describe("sample data", () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
  });

  afterEach(() => {
    cleanup();
  });

  it("writes a header followed by one row per service", () => {
    const rows = createLookupRows();
    expect(rows[0]).toBe("dstport,protocol,tag");
    expect(rows).toHaveLength(sampleServices.length + 1);
    expect(parseLookupRow(rows[1], 2)).toEqual({
      port: 25,
      protocol: "tcp",
      tag: "sv_p1",
      lineNumber: 2,
    });
  });

  it("generates records the parser accepts", () => {
    for (let i = 0; i < 20; i += 1) {
      expect(parseFlowLogLine(createFlowLogLine(), i + 1).ok).toBe(true);
    }
  });

  it("produces files the whole pipeline can classify", () => {
    const { lookupFile, logFile } = writeSamples(dir, 10);
    expect(readFileSync(logFile, "utf8").trimEnd().split("\n")).toHaveLength(10);

    const options = resolveRunOptions({
      lookupFile,
      logFile,
      tagOutput: join(dir, "tags.csv"),
      portOutput: join(dir, "ports.csv"),
    });
    const result = run(options, createLogger("warn", createSink()));

    expect(result.stats).toEqual({ totalLines: 10, parsedLines: 10, skippedLines: 0 });
    expect(readFileSync(options.tagOutput, "utf8").split("\n")[0]).toBe("Tag,Count");
  });
});
