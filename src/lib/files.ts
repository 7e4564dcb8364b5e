import { readFileSync, writeFileSync } from "node:fs";
import { FileError } from "./errors";

export function readTextFile(path: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (error) {
    throw new FileError("read", path, error);
  }
}

/** Replaces the file's contents, creating it when missing. */
export function writeTextFile(path: string, contents: string): void {
  try {
    writeFileSync(path, contents, "utf8");
  } catch (error) {
    throw new FileError("write", path, error);
  }
}
