import { DotplaceError, ExitCodes } from "./errors";
import type { ConfigFormat } from "./init";

export type Command = "init" | "sync" | "unsync" | "status" | "settings";

const COMMANDS: readonly Command[] = ["init", "sync", "unsync", "status", "settings"];

export interface ParsedArgs {
  command: Command | null;
  positionals: string[];
  dryRun: boolean;
  assumeYes: boolean;
  force: boolean;
  verbosity: number;
  format: ConfigFormat;
  settingsPath?: string;
  help: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new DotplaceError(`Missing value for ${flag}`, ExitCodes.Usage);
  }
  return value;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    command: null,
    positionals: [],
    dryRun: false,
    assumeYes: false,
    force: false,
    verbosity: 0,
    format: "yaml",
    help: false
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg.startsWith("-")) {
      if (result.command) {
        result.positionals.push(arg);
        continue;
      }
      if (!isCommand(arg)) {
        throw new DotplaceError(`Unknown command: ${arg}`, ExitCodes.Usage);
      }
      result.command = arg;
      continue;
    }
    if (arg === "--dry-run" || arg === "-n") {
      result.dryRun = true;
      continue;
    }
    if (arg === "--yes" || arg === "-y") {
      result.assumeYes = true;
      continue;
    }
    if (arg === "--force") {
      result.force = true;
      continue;
    }
    if (/^-v+$/.test(arg)) {
      result.verbosity += arg.length - 1;
      continue;
    }
    if (arg === "--verbose") {
      result.verbosity += 1;
      continue;
    }
    if (arg === "--format" || arg === "-f") {
      const value = requireValue(args, i, arg);
      if (value !== "yaml" && value !== "json") {
        throw new DotplaceError(`Unsupported format: ${value}`, ExitCodes.Usage);
      }
      result.format = value;
      i += 1;
      continue;
    }
    if (arg === "--settings") {
      result.settingsPath = requireValue(args, i, arg);
      i += 1;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      result.help = true;
      continue;
    }
    throw new DotplaceError(`Unknown option: ${arg}`, ExitCodes.Usage);
  }

  result.verbosity = Math.min(result.verbosity, 3);
  return result;
}

export const HELP_TEXT = [
  "dotplace <command> [options]",
  "",
  "Commands:",
  "  sync [path]              Link or copy every configured item into place",
  "  unsync [path]            Remove what sync created, leaving modified files alone",
  "  status [path]            Show what sync would do for each item",
  "  init [path]              Write a starter config",
  "  settings dump            Print the effective settings",
  "  settings set key=value   Update the settings file",
  "",
  "Options:",
  "  -n, --dry-run            Report what would change without touching anything",
  "  -y, --yes                Replace existing destinations without asking",
  "  -f, --format <yaml|json> Config format for init (default: yaml)",
  "  --force                  Let init overwrite an existing config",
  "  --settings <path>        Settings file (default: $DOTPLACE_SETTINGS or",
  "                           ~/.config/dotplace/settings.yaml)",
  "  -v, -vv, -vvv            More log output on stderr",
  "  -h, --help               Show help"
].join("\n");
