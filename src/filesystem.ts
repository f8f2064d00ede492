import crypto from "crypto";
import { constants, createReadStream } from "fs";
import fs from "fs/promises";
import path from "path";
import { IOError, isErrnoException } from "./errors";

export async function ensureDir(target: string): Promise<void> {
  await fs.mkdir(target, { recursive: true });
}

export async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

/** Like fileExists, but follows symlinks: a dangling link does not count. */
export async function targetExists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

export async function hashFile(target: string): Promise<string> {
  const hash = crypto.createHash("sha256");
  await new Promise<void>((resolve, reject) => {
    const stream = createReadStream(target);
    stream.on("data", (chunk) => {
      hash.update(chunk);
    });
    stream.on("error", (error) => {
      reject(error);
    });
    stream.on("end", () => {
      resolve();
    });
  });
  return hash.digest("hex");
}

async function hashDirectory(target: string): Promise<string> {
  const entries = await fs.readdir(target);
  entries.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const hash = crypto.createHash("sha256");
  for (const entry of entries) {
    const fullPath = path.join(target, entry);
    const stat = await fs.lstat(fullPath);
    if (stat.isSymbolicLink()) {
      hash.update(`link:${entry}:${await fs.readlink(fullPath)}\n`);
    } else if (stat.isDirectory()) {
      hash.update(`dir:${entry}:${await hashDirectory(fullPath)}\n`);
    } else {
      hash.update(`file:${entry}:${await hashFile(fullPath)}\n`);
    }
  }
  return hash.digest("hex");
}

/**
 * Content hash of a file or a whole directory tree. Symlinks inside a tree
 * contribute their link text rather than what they point at.
 */
export async function hashPath(target: string): Promise<string> {
  const stat = await fs.stat(target);
  if (stat.isDirectory()) {
    return await hashDirectory(target);
  }
  return await hashFile(target);
}

export async function copyFileOrDir(source: string, target: string): Promise<void> {
  const stat = await fs.lstat(source);
  if (stat.isSymbolicLink()) {
    await ensureDir(path.dirname(target));
    await fs.symlink(await fs.readlink(source), target);
    return;
  }
  if (stat.isDirectory()) {
    await ensureDir(target);
    const entries = await fs.readdir(source);
    for (const entry of entries) {
      await copyFileOrDir(path.join(source, entry), path.join(target, entry));
    }
    return;
  }
  await ensureDir(path.dirname(target));
  await fs.copyFile(source, target);
}

function stagingPath(target: string): string {
  return `${target}.dotplace-tmp-${process.pid}`;
}

/**
 * Copies `source` to a sibling staging path, then swaps it in for whatever is
 * at `target`. If the copy fails, `target` is left as it was and the staging
 * copy is removed.
 */
export async function copyIntoPlace(source: string, target: string): Promise<void> {
  const staging = stagingPath(target);
  await removeEntry(staging);
  try {
    await copyFileOrDir(source, staging);
    await removeEntry(target);
    await fs.rename(staging, target);
  } catch (error) {
    await removeEntry(staging);
    throw error;
  }
}

/** Removes a file, directory tree or symlink (never what the link points at). */
export async function removeEntry(target: string): Promise<void> {
  await fs.rm(target, { recursive: true, force: true });
}

async function nearestExistingAncestor(target: string): Promise<string> {
  let current = target;
  for (;;) {
    if (await fileExists(current)) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return current;
    }
    current = parent;
  }
}

/**
 * Checks, without touching anything, that an entry could be created or
 * replaced at `target`.
 */
export async function assertCanWrite(target: string): Promise<void> {
  const ancestor = await nearestExistingAncestor(path.dirname(target));
  const stat = await fs.stat(ancestor);
  if (!stat.isDirectory()) {
    throw new IOError(`Not a directory: ${ancestor}`, ancestor, "ENOTDIR");
  }
  await fs.access(ancestor, constants.W_OK | constants.X_OK);
}

export async function assertCanRead(target: string): Promise<void> {
  await fs.access(target, constants.R_OK);
}
