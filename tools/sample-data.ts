import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { DEFAULT_LOG_FILE, DEFAULT_LOOKUP_FILE } from "../src/lib/constants";
import { writeTextFile } from "../src/lib/files";

const SAMPLE_LINE_COUNT = 200;
const SAMPLE_ACCOUNT_ID = "123456789012";

export interface SampleService {
  port: number;
  protocol: "tcp" | "udp" | "icmp";
  tag: string;
}

export const sampleServices: SampleService[] = [
  { port: 25, protocol: "tcp", tag: "sv_P1" },
  { port: 68, protocol: "udp", tag: "sv_P2" },
  { port: 23, protocol: "tcp", tag: "sv_P1" },
  { port: 31, protocol: "udp", tag: "SV_P3" },
  { port: 443, protocol: "tcp", tag: "sv_P2" },
  { port: 22, protocol: "tcp", tag: "sv_P4" },
  { port: 3389, protocol: "tcp", tag: "sv_P5" },
  { port: 0, protocol: "icmp", tag: "sv_P5" },
  { port: 110, protocol: "tcp", tag: "email" },
  { port: 993, protocol: "tcp", tag: "email" },
  { port: 143, protocol: "tcp", tag: "email" },
];

const protocolNumbers: Record<SampleService["protocol"], number> = {
  icmp: 1,
  tcp: 6,
  udp: 17,
};

// Ports that have no lookup row, so the samples exercise "Untagged".
const untaggedPorts = [49153, 49154, 49155, 49156, 80, 1024];
const actions = ["ACCEPT", "REJECT"];

const randomInt = (min: number, max: number) =>
  Math.floor(Math.random() * (max - min + 1)) + min;
const pick = <T>(list: T[]) => list[randomInt(0, list.length - 1)];
const randomIp = () => `10.0.${randomInt(0, 255)}.${randomInt(0, 255)}`;
const randomEni = () => `eni-${Math.random().toString(16).slice(2, 10)}`;

export function createLookupRows(services: SampleService[] = sampleServices): string[] {
  return [
    "dstport,protocol,tag",
    ...services.map(({ port, protocol, tag }) => `${port},${protocol},${tag}`),
  ];
}

export function createFlowLogLine(time = new Date()): string {
  const tagged = Math.random() < 0.7;
  const service = pick(sampleServices);
  const dstPort = tagged ? service.port : pick(untaggedPorts);
  const protocol = tagged ? protocolNumbers[service.protocol] : protocolNumbers.tcp;
  const start = Math.floor(time.getTime() / 1000);
  const end = start + randomInt(10, 120);
  return [
    2,
    SAMPLE_ACCOUNT_ID,
    randomEni(),
    randomIp(),
    randomIp(),
    randomInt(1024, 65535),
    dstPort,
    protocol,
    randomInt(1, 40),
    randomInt(60, 90000),
    start,
    end,
    pick(actions),
    "OK",
  ].join(" ");
}

export function createFlowLog(count = SAMPLE_LINE_COUNT): string[] {
  const now = Date.now();
  const lines: string[] = [];
  for (let i = count; i > 0; i -= 1) {
    lines.push(createFlowLogLine(new Date(now - i * 900)));
  }
  return lines;
}

export function writeSamples(
  dir: string,
  count = SAMPLE_LINE_COUNT
): { lookupFile: string; logFile: string } {
  mkdirSync(dir, { recursive: true });
  const lookupFile = join(dir, DEFAULT_LOOKUP_FILE);
  const logFile = join(dir, DEFAULT_LOG_FILE);
  writeTextFile(lookupFile, `${createLookupRows().join("\n")}\n`);
  writeTextFile(logFile, `${createFlowLog(count).join("\n")}\n`);
  return { lookupFile, logFile };
}

if (require.main === module) {
  const { lookupFile, logFile } = writeSamples(process.argv[2] ?? ".");
  console.info(`wrote ${lookupFile} and ${logFile}`);
}
