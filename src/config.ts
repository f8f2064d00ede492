import type { Stats } from "fs";
import fs from "fs/promises";
import path from "path";
import { minimatch } from "minimatch";
import { parse, stringify, YAMLError } from "yaml";
import { DotplaceError, ExitCodes, isErrnoException } from "./errors";
import type { LoadedSyncConfig, SyncAction, SyncItem } from "./types";

const YAML_EXTENSIONS = new Set(["", ".yaml", ".yml", ".json"]);

interface RawSyncItem {
  action: SyncAction;
  src: string;
  dest: string;
}

export type ConfigMap = Map<unknown, unknown>;

function isConfigMap(value: unknown): value is ConfigMap {
  return value instanceof Map;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isSyncAction(value: unknown): value is SyncAction {
  return value === "symlink" || value === "copy";
}

function invalid(configPath: string, message: string): DotplaceError {
  return new DotplaceError(`Invalid config in ${configPath}: ${message}`, ExitCodes.Validation);
}

const ITEM_KEYS = new Set<unknown>(["action", "src", "dest"]);

function toSyncItem(configPath: string, name: string, value: ConfigMap): RawSyncItem {
  const action = value.get("action");
  const src = value.get("src");
  const dest = value.get("dest");
  if (!isSyncAction(action)) {
    throw invalid(configPath, `item "${name}" has action ${JSON.stringify(action)}`);
  }
  if (!isNonEmptyString(src)) {
    throw invalid(configPath, `item "${name}" needs a non-empty src`);
  }
  if (!isNonEmptyString(dest)) {
    throw invalid(configPath, `item "${name}" needs a non-empty dest`);
  }
  const extra = Array.from(value.keys()).filter((key) => !ITEM_KEYS.has(key));
  if (extra.length > 0) {
    throw invalid(configPath, `item "${name}" has unknown keys: ${extra.map(String).join(", ")}`);
  }
  return { action, src, dest };
}

function itemKey(configPath: string, key: unknown, prefix: string): string {
  if (typeof key !== "string" && typeof key !== "number") {
    const where = prefix ? ` in "${prefix}"` : "";
    throw invalid(configPath, `item names must be strings, got ${JSON.stringify(key)}${where}`);
  }
  const name = String(key);
  return prefix ? `${prefix}.${name}` : name;
}

/**
 * Flattens a parsed config into named items, in document order. Values
 * carrying an `action` are items; any other mapping is a group whose items are
 * named `group.item`.
 */
export function collectItems(configPath: string, parsed: ConfigMap, prefix = ""): SyncItem[] {
  const items: SyncItem[] = [];
  for (const [key, value] of parsed) {
    const name = itemKey(configPath, key, prefix);
    if (!isConfigMap(value)) {
      throw invalid(configPath, `item "${name}" must be a mapping`);
    }
    if (value.has("action")) {
      items.push({ name, ...toSyncItem(configPath, name, value) });
      continue;
    }
    items.push(...collectItems(configPath, value, name));
  }
  return items;
}

function formatYamlError(error: unknown, configPath: string): DotplaceError {
  if (error instanceof YAMLError) {
    const linePos = error.linePos?.[0];
    const location = linePos ? ` (line ${linePos.line}, col ${linePos.col})` : "";
    return new DotplaceError(
      `Invalid YAML in ${configPath}${location}: ${error.message}`,
      ExitCodes.Validation
    );
  }
  if (error instanceof Error) {
    return new DotplaceError(
      `Invalid YAML in ${configPath}: ${error.message}`,
      ExitCodes.Validation
    );
  }
  return new DotplaceError(`Invalid YAML in ${configPath}`, ExitCodes.Validation);
}

export async function readSyncConfigFile(configPath: string): Promise<SyncItem[]> {
  const extension = path.extname(configPath).toLowerCase();
  if (!YAML_EXTENSIONS.has(extension)) {
    throw new DotplaceError(
      `Unsupported config format "${extension}": ${configPath}`,
      ExitCodes.Validation
    );
  }

  const raw = await fs.readFile(configPath, "utf8");
  let parsed: unknown;
  try {
    parsed = parse(raw, { prettyErrors: true, mapAsMap: true });
  } catch (error) {
    throw formatYamlError(error, configPath);
  }

  if (parsed === null || parsed === undefined) {
    return [];
  }
  if (!isConfigMap(parsed)) {
    throw invalid(configPath, "top level must be a mapping of item names");
  }
  return collectItems(configPath, parsed);
}

export async function findConfigFiles(directory: string, patterns: string[]): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => patterns.some((pattern) => minimatch(name, pattern, { dot: true })))
    .sort()
    .map((name) => path.join(directory, name));
}

function mergeItems(target: Map<string, SyncItem>, items: SyncItem[]): void {
  for (const item of items) {
    target.set(item.name, item);
  }
}

/**
 * Loads a single config file, or every matching config file in a directory.
 * Files are merged in name order, so a later file overrides an item of the
 * same name from an earlier one.
 */
export async function loadSyncConfig(
  target: string,
  patterns: string[]
): Promise<LoadedSyncConfig> {
  const targetPath = path.resolve(target);
  let stat: Stats;
  try {
    stat = await fs.stat(targetPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new DotplaceError(`Missing config: ${targetPath}`, ExitCodes.Validation);
    }
    throw error;
  }

  if (!stat.isDirectory()) {
    return {
      configDir: path.dirname(targetPath),
      files: [targetPath],
      items: await readSyncConfigFile(targetPath)
    };
  }

  const files = await findConfigFiles(targetPath, patterns);
  if (files.length === 0) {
    throw new DotplaceError(
      `No config files in ${targetPath} matching ${patterns.join(", ")}`,
      ExitCodes.Validation
    );
  }
  const merged = new Map<string, SyncItem>();
  for (const file of files) {
    mergeItems(merged, await readSyncConfigFile(file));
  }
  return { configDir: targetPath, files, items: Array.from(merged.values()) };
}

function toJson(document: Map<string, RawSyncItem>): string {
  if (document.size === 0) {
    return "{}\n";
  }
  const members = Array.from(document, ([name, item]) => {
    const body = JSON.stringify(item, null, 2).replace(/\n/g, "\n  ");
    return `  ${JSON.stringify(name)}: ${body}`;
  });
  return `{\n${members.join(",\n")}\n}\n`;
}

/** Writes items in their given order; numeric-looking names are not hoisted. */
export function serializeSyncConfig(items: SyncItem[], format: "yaml" | "json"): string {
  const document = new Map<string, RawSyncItem>();
  for (const item of items) {
    document.set(item.name, { action: item.action, src: item.src, dest: item.dest });
  }
  if (format === "json") {
    return toJson(document);
  }
  return stringify(document);
}

export async function writeSyncConfig(
  configPath: string,
  items: SyncItem[],
  format: "yaml" | "json"
): Promise<void> {
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, serializeSyncConfig(items, format), "utf8");
}
