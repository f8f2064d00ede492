import type { Stats } from "fs";
import fs from "fs/promises";
import { isErrnoException } from "./errors";
import type { DestState } from "./types";

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);
const UNRESOLVABLE_LINK_CODES = new Set(["ENOENT", "ENOTDIR", "ELOOP"]);

function hasCode(error: unknown, codes: Set<string>): boolean {
  return isErrnoException(error) && typeof error.code === "string" && codes.has(error.code);
}

/** Classifies whatever occupies `destPath` without following or modifying it. */
export async function inspectDestination(destPath: string): Promise<DestState> {
  let stat: Stats;
  try {
    stat = await fs.lstat(destPath);
  } catch (error) {
    if (hasCode(error, MISSING_CODES)) {
      return { kind: "absent" };
    }
    throw error;
  }

  if (!stat.isSymbolicLink()) {
    return { kind: "entry", isDirectory: stat.isDirectory() };
  }

  const target = await fs.readlink(destPath);
  try {
    await fs.stat(destPath);
  } catch (error) {
    if (hasCode(error, UNRESOLVABLE_LINK_CODES)) {
      return { kind: "broken-symlink", target };
    }
    throw error;
  }
  return { kind: "symlink", target };
}

export function describeState(state: DestState): string {
  switch (state.kind) {
    case "absent":
      return "absent";
    case "symlink":
      return `symlink to ${state.target}`;
    case "broken-symlink":
      return `broken symlink to ${state.target}`;
    case "entry":
      return state.isDirectory ? "directory" : "file";
  }
}
