import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { ConfirmPort, PlanEntry } from "../src/types";

export async function createTempDir(): Promise<string> {
  const created = await fs.mkdtemp(path.join(os.tmpdir(), "dotplace-"));
  return await fs.realpath(created);
}

export async function withTempDir<T>(fn: (root: string) => Promise<T>): Promise<T> {
  const root = await createTempDir();
  try {
    return await fn(root);
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
}

export async function writeFile(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, "utf8");
}

export async function isAbsent(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return false;
  } catch {
    return true;
  }
}

/** One line per entry below `root`, enough to notice any mutation. */
export async function snapshotTree(root: string): Promise<string[]> {
  const lines: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir);
    entries.sort();
    for (const entry of entries) {
      const full = path.join(dir, entry);
      const stat = await fs.lstat(full);
      const relative = path.relative(root, full);
      if (stat.isSymbolicLink()) {
        lines.push(`link ${relative} -> ${await fs.readlink(full)}`);
      } else if (stat.isDirectory()) {
        lines.push(`dir ${relative} ${stat.mtimeMs}`);
        await walk(full);
      } else {
        lines.push(`file ${relative} ${stat.mtimeMs} ${await fs.readFile(full, "utf8")}`);
      }
    }
  };
  await walk(root);
  return lines;
}

export interface ScriptedConfirm {
  confirm: ConfirmPort;
  asked: PlanEntry[];
}

export function scriptedConfirm(answer: boolean): ScriptedConfirm {
  const asked: PlanEntry[] = [];
  return {
    asked,
    confirm: async (entry) => {
      asked.push(entry);
      return answer;
    }
  };
}
