import path from "path";
import { writeSyncConfig } from "./config";
import { DotplaceError, ExitCodes } from "./errors";
import { fileExists } from "./filesystem";
import { createStarterItems } from "./templates";
import type { AppSettings, SyncItem } from "./types";

export type ConfigFormat = "yaml" | "json";

export interface InitOptions {
  format?: ConfigFormat;
  force?: boolean;
  items?: SyncItem[];
}

export function getConfigPath(
  directory: string,
  settings: AppSettings,
  format: ConfigFormat
): string {
  return path.join(directory, `${settings.defaultConfigFilename}.${format}`);
}

export async function initSyncConfig(
  directory: string,
  settings: AppSettings,
  options: InitOptions = {}
): Promise<{ action: "created" | "overwritten"; configPath: string }> {
  const format = options.format ?? "yaml";
  const configPath = getConfigPath(path.resolve(directory), settings, format);
  const exists = await fileExists(configPath);

  if (exists && !options.force) {
    throw new DotplaceError(`Config already exists: ${configPath}`, ExitCodes.Conflict);
  }

  await writeSyncConfig(configPath, options.items ?? createStarterItems(), format);
  return { action: exists ? "overwritten" : "created", configPath };
}
