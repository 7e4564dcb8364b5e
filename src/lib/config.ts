import { z } from "zod";
import {
  DEFAULT_LOG_FILE,
  DEFAULT_LOOKUP_FILE,
  DEFAULT_PORT_OUTPUT,
  DEFAULT_TAG_OUTPUT,
} from "./constants";

const path = (name: string) =>
  z
    .string({ invalid_type_error: `${name} must be a path` })
    .trim()
    .min(1, `${name} must not be empty`);

export const RunOptionsSchema = z
  .object({
    lookupFile: path("--lookup-file").default(DEFAULT_LOOKUP_FILE),
    logFile: path("--log-file").default(DEFAULT_LOG_FILE),
    tagOutput: path("--tag-output").default(DEFAULT_TAG_OUTPUT),
    portOutput: path("--port-output").default(DEFAULT_PORT_OUTPUT),
    sort: z.enum(["seen", "count"]).default("seen"),
    logLevel: z.enum(["error", "warn", "info", "debug"]).default("warn"),
  })
  .refine((options) => options.tagOutput !== options.portOutput, {
    message: "--tag-output and --port-output must be different files",
    path: ["portOutput"],
  });

export type RunOptions = Readonly<z.infer<typeof RunOptionsSchema>>;

export class OptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OptionsError";
  }
}

export function resolveRunOptions(raw: unknown): RunOptions {
  const parsed = RunOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message);
    throw new OptionsError(issues.join("; "));
  }
  return Object.freeze(parsed.data);
}
