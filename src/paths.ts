import fs from "fs/promises";
import os from "os";
import path from "path";
import { InvalidPathError, isErrnoException } from "./errors";
import type { ResolvedItem, SyncItem } from "./types";

export interface ResolveOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

function currentHomeDir(): string {
  try {
    return os.homedir();
  } catch (_error) {
    return "";
  }
}

export function expandHome(inputPath: string, homeDir: string = currentHomeDir()): string {
  if (inputPath !== "~" && !inputPath.startsWith("~/")) {
    return inputPath;
  }
  if (homeDir.length === 0) {
    throw new InvalidPathError(`Cannot expand ${inputPath}: home directory is unknown`);
  }
  if (inputPath === "~") {
    return homeDir;
  }
  return path.join(homeDir, inputPath.slice(2));
}

export function expandEnv(inputPath: string, env: NodeJS.ProcessEnv): string {
  const resolved = inputPath.replace(
    /\$\{([A-Z0-9_]+)(:-([^}]*))?\}/gi,
    (
      _match: string,
      varName: string,
      _fallbackGroup: string | undefined,
      fallback: string | undefined
    ): string => {
      const value = env[varName];
      if (value && value.length > 0) {
        return value;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      return "";
    }
  );
  return resolved;
}

export function resolvePath(inputPath: string, env: NodeJS.ProcessEnv, homeDir?: string): string {
  const expanded = expandHome(expandEnv(inputPath, env), homeDir);
  if (path.isAbsolute(expanded)) {
    return path.normalize(expanded);
  }
  return path.resolve(expanded);
}

export function resolveFromRoot(root: string, relativePath: string): string {
  if (path.isAbsolute(relativePath)) {
    return path.resolve(relativePath);
  }
  return path.resolve(path.join(root, relativePath));
}

/**
 * Resolves symlinks along `target`. When the leaf (or more) is missing, the
 * nearest existing ancestor is resolved and the missing tail is kept as given.
 */
export async function realpathOrSelf(target: string): Promise<string> {
  try {
    return await fs.realpath(target);
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      const parent = path.dirname(target);
      if (parent === target) {
        return target;
      }
      return path.join(await realpathOrSelf(parent), path.basename(target));
    }
    throw error;
  }
}

function expandItemPath(
  item: SyncItem,
  field: "src" | "dest",
  configDir: string,
  options: ResolveOptions
): string {
  const raw = item[field];
  const expanded = expandHome(expandEnv(raw, options.env ?? process.env), options.homeDir);
  if (expanded.trim().length === 0) {
    throw new InvalidPathError(`Item "${item.name}" has an empty ${field} path`);
  }
  return resolveFromRoot(configDir, expanded);
}

/**
 * Turns a configured item into absolute paths. The source is fully resolved
 * through symlinks; for the destination only the parent directory is, so the
 * leaf itself can still be inspected as whatever it is.
 */
export async function resolveItem(
  item: SyncItem,
  configDir: string,
  options: ResolveOptions = {}
): Promise<ResolvedItem> {
  const src = expandItemPath(item, "src", configDir, options);
  const dest = expandItemPath(item, "dest", configDir, options);
  if (dest === path.parse(dest).root) {
    throw new InvalidPathError(`Item "${item.name}" cannot use a filesystem root as dest`);
  }

  const srcPath = await realpathOrSelf(src);
  const destParent = await realpathOrSelf(path.dirname(dest));

  return {
    name: item.name,
    action: item.action,
    srcPath,
    destPath: path.join(destParent, path.basename(dest))
  };
}

export function displayPath(
  target: string,
  cwd: string = process.cwd(),
  homeDir: string = currentHomeDir()
): string {
  const relativeToCwd = path.relative(cwd, target);
  if (relativeToCwd === "") {
    return ".";
  }
  if (!relativeToCwd.startsWith("..") && !path.isAbsolute(relativeToCwd)) {
    return `./${relativeToCwd.split(path.sep).join("/")}`;
  }
  if (homeDir.length > 0) {
    const relativeToHome = path.relative(homeDir, target);
    if (relativeToHome === "") {
      return "~";
    }
    if (!relativeToHome.startsWith("..") && !path.isAbsolute(relativeToHome)) {
      return `~/${relativeToHome.split(path.sep).join("/")}`;
    }
  }
  return target;
}
