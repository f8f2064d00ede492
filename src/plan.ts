import fs from "fs/promises";
import path from "path";
import { hashPath, targetExists } from "./filesystem";
import { inspectDestination } from "./inspect";
import type { DestState, PlanEntry, ResolvedItem } from "./types";

export const SOURCE_NOT_FOUND = "source not found";

/** Whether a link's text, read relative to the link itself, names `srcPath`. */
export function linkPointsTo(destPath: string, linkTarget: string, srcPath: string): boolean {
  return path.resolve(path.dirname(destPath), linkTarget) === srcPath;
}

/**
 * Copy destinations match when the same kind of entry holds the same content
 * hash as the source.
 */
export async function copyMatchesSource(item: ResolvedItem, state: DestState): Promise<boolean> {
  if (state.kind !== "entry") {
    return false;
  }
  const sourceStat = await fs.stat(item.srcPath);
  if (sourceStat.isDirectory() !== state.isDirectory) {
    return false;
  }
  const [sourceHash, destHash] = await Promise.all([
    hashPath(item.srcPath),
    hashPath(item.destPath)
  ]);
  return sourceHash === destHash;
}

function planSymlink(item: ResolvedItem, state: DestState): PlanEntry {
  switch (state.kind) {
    case "absent":
      return { item, state, operation: "create-link", destructive: false };
    case "symlink":
      if (linkPointsTo(item.destPath, state.target, item.srcPath)) {
        return { item, state, operation: "noop", destructive: false };
      }
      return { item, state, operation: "replace-link", destructive: true };
    case "broken-symlink":
      return { item, state, operation: "replace-link", destructive: false };
    case "entry":
      return { item, state, operation: "replace-link", destructive: true };
  }
}

async function planCopy(item: ResolvedItem, state: DestState): Promise<PlanEntry> {
  if (state.kind === "absent") {
    return { item, state, operation: "create-copy", destructive: false };
  }
  if (await copyMatchesSource(item, state)) {
    return { item, state, operation: "noop", destructive: false };
  }
  return { item, state, operation: "replace-with-copy", destructive: true };
}

export async function planItem(item: ResolvedItem): Promise<PlanEntry> {
  const state = await inspectDestination(item.destPath);
  if (!(await targetExists(item.srcPath))) {
    return { item, state, operation: "skip", destructive: false, reason: SOURCE_NOT_FOUND };
  }
  if (item.action === "symlink") {
    return planSymlink(item, state);
  }
  return await planCopy(item, state);
}
