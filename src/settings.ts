import fs from "fs/promises";
import path from "path";
import { parse, stringify, YAMLError } from "yaml";
import { DotplaceError, ExitCodes, isErrnoException } from "./errors";
import { resolvePath } from "./paths";
import type { AppSettings } from "./types";

export const SETTINGS_ENV = "DOTPLACE_SETTINGS";
export const DEFAULT_SETTINGS_PATH = "~/.config/dotplace/settings.yaml";

export function createDefaultSettings(): AppSettings {
  return {
    configPatterns: [".dotplace*", "dotplace*", ".sync*"],
    defaultConfigFilename: "dotplace"
  };
}

export function getSettingsPath(explicit: string | undefined, env: NodeJS.ProcessEnv): string {
  const fromEnv = env[SETTINGS_ENV];
  const chosen = explicit ?? (fromEnv && fromEnv.length > 0 ? fromEnv : DEFAULT_SETTINGS_PATH);
  return resolvePath(chosen, env);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((entry) => typeof entry === "string" && entry.length > 0)
  );
}

function invalidSettings(settingsPath: string, message: string): DotplaceError {
  return new DotplaceError(
    `Invalid settings in ${settingsPath}: ${message}`,
    ExitCodes.Validation
  );
}

/** Layers a raw settings document over the defaults, rejecting unknown keys. */
export function parseSettings(raw: unknown, settingsPath: string): AppSettings {
  const settings = createDefaultSettings();
  if (raw === null || raw === undefined) {
    return settings;
  }
  if (!isRecord(raw)) {
    throw invalidSettings(settingsPath, "expected a mapping");
  }
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "configPatterns":
        if (!isStringList(value) || value.length === 0) {
          throw invalidSettings(settingsPath, "configPatterns must be a non-empty list of globs");
        }
        settings.configPatterns = value;
        break;
      case "defaultConfigFilename":
        if (typeof value !== "string" || value.trim().length === 0) {
          throw invalidSettings(settingsPath, "defaultConfigFilename must be a non-empty string");
        }
        settings.defaultConfigFilename = value;
        break;
      default:
        throw invalidSettings(settingsPath, `unknown key "${key}"`);
    }
  }
  return settings;
}

export async function loadSettings(settingsPath: string): Promise<AppSettings> {
  let raw: string;
  try {
    raw = await fs.readFile(settingsPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return createDefaultSettings();
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (error) {
    const detail = error instanceof YAMLError ? error.message : String(error);
    throw new DotplaceError(`Invalid YAML in ${settingsPath}: ${detail}`, ExitCodes.Validation);
  }
  return parseSettings(parsed, settingsPath);
}

export async function saveSettings(settingsPath: string, settings: AppSettings): Promise<void> {
  await fs.mkdir(path.dirname(settingsPath), { recursive: true });
  await fs.writeFile(settingsPath, stringify(settings), "utf8");
}

/**
 * Applies `key=value` assignments from the command line. List settings take a
 * comma-separated value.
 */
export function applySettingAssignments(
  settings: AppSettings,
  assignments: string[],
  settingsPath: string
): AppSettings {
  const next: Record<string, unknown> = { ...settings };
  for (const assignment of assignments) {
    const separator = assignment.indexOf("=");
    if (separator <= 0) {
      throw new DotplaceError(`Expected key=value, got "${assignment}"`, ExitCodes.Usage);
    }
    const key = assignment.slice(0, separator).trim();
    const value = assignment.slice(separator + 1).trim();
    next[key] =
      key === "configPatterns"
        ? value
            .split(",")
            .map((entry) => entry.trim())
            .filter((entry) => entry.length > 0)
        : value;
  }
  return parseSettings(next, settingsPath);
}
