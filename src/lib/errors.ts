export type FileOperation = "read" | "write";

const reasons: Record<string, string> = {
  ENOENT: "file not found",
  EACCES: "permission denied",
  EPERM: "operation not permitted",
  EISDIR: "is a directory",
  ENOTDIR: "parent is not a directory",
};

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? cause.code : "";
    return reasons[code] ?? cause.message;
  }
  return String(cause);
}

/** Missing or unreadable input, unwritable output. Aborts the run. */
export class FileError extends Error {
  readonly path: string;
  readonly operation: FileOperation;

  constructor(operation: FileOperation, path: string, cause: unknown) {
    super(`Cannot ${operation} "${path}": ${describeCause(cause)}`, { cause });
    this.name = "FileError";
    this.path = path;
    this.operation = operation;
  }
}

/** A lookup row or log line that cannot be used. The line is skipped. */
export class ParseError extends Error {
  readonly lineNumber: number;
  readonly line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`line ${lineNumber}: ${message}`);
    this.name = "ParseError";
    this.lineNumber = lineNumber;
    this.line = line;
  }
}
