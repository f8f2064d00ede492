#!/usr/bin/env node
import { stringify } from "yaml";
import { HELP_TEXT, parseArgs } from "./args";
import type { ParsedArgs } from "./args";
import { loadSyncConfig } from "./config";
import { DotplaceError, ExitCodes } from "./errors";
import { initSyncConfig } from "./init";
import { createLogger } from "./logger";
import { createTerminalConfirm } from "./prompt";
import { formatPlanEntry, formatResult, formatSummary } from "./report";
import {
  applySettingAssignments,
  getSettingsPath,
  loadSettings,
  saveSettings
} from "./settings";
import { planItems, syncItems } from "./sync";
import type { Logger, RunReport } from "./types";
import { unsyncItems } from "./unsync";

interface InterruptWatch {
  signal: AbortSignal;
  interrupt: () => void;
  dispose: () => void;
}

function watchInterrupt(logger: Logger): InterruptWatch {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      process.exit(ExitCodes.Failure);
    }
    logger.warn("Interrupt received; stopping after the current item");
    controller.abort();
  };
  process.on("SIGINT", onInterrupt);
  return {
    signal: controller.signal,
    interrupt: onInterrupt,
    dispose: () => {
      process.off("SIGINT", onInterrupt);
    }
  };
}

function finishRun(report: RunReport): void {
  console.log(formatSummary(report));
  if (report.summary.failed > 0 || report.interrupted) {
    process.exitCode = ExitCodes.Failure;
  }
}

async function runSettings(args: ParsedArgs, settingsPath: string): Promise<void> {
  const [subcommand, ...assignments] = args.positionals;
  const settings = await loadSettings(settingsPath);
  switch (subcommand) {
    case "dump":
      console.log(stringify(settings).trimEnd());
      return;
    case "set": {
      if (assignments.length === 0) {
        throw new DotplaceError("No values provided to set", ExitCodes.Usage);
      }
      const next = applySettingAssignments(settings, assignments, settingsPath);
      await saveSettings(settingsPath, next);
      console.log(`Updated ${settingsPath}`);
      return;
    }
    default:
      throw new DotplaceError(
        `Unknown settings command: ${String(subcommand)}`,
        ExitCodes.Usage
      );
  }
}

async function run(): Promise<void> {
  const args = parseArgs(process.argv);
  if (args.help || !args.command) {
    console.log(HELP_TEXT);
    return;
  }

  const logger = createLogger(args.verbosity);
  const settingsPath = getSettingsPath(args.settingsPath, process.env);
  logger.debug(`Using settings from ${settingsPath}`);

  if (args.command === "settings") {
    await runSettings(args, settingsPath);
    return;
  }

  const settings = await loadSettings(settingsPath);
  const target = args.positionals[0] ?? ".";

  if (args.command === "init") {
    const result = await initSyncConfig(target, settings, {
      format: args.format,
      force: args.force
    });
    console.log(`${result.action === "created" ? "Created" : "Overwrote"} ${result.configPath}`);
    return;
  }

  const config = await loadSyncConfig(target, settings.configPatterns);
  logger.info(`Loaded ${config.items.length} item(s) from ${config.files.join(", ")}`);
  const context = { configDir: config.configDir };

  switch (args.command) {
    case "status": {
      const planned = await planItems(config.items, context, logger);
      planned.forEach((entry) => console.log(formatPlanEntry(entry)));
      return;
    }
    case "sync": {
      const interrupt = watchInterrupt(logger);
      try {
        const report = await syncItems(
          config.items,
          context,
          { dryRun: args.dryRun, assumeYes: args.assumeYes, signal: interrupt.signal },
          {
            confirm: createTerminalConfirm(logger, interrupt.interrupt),
            report: (result) => console.log(formatResult(result)),
            logger
          }
        );
        finishRun(report);
      } finally {
        interrupt.dispose();
      }
      return;
    }
    case "unsync": {
      const interrupt = watchInterrupt(logger);
      try {
        const report = await unsyncItems(
          config.items,
          context,
          { dryRun: args.dryRun, signal: interrupt.signal },
          { report: (result) => console.log(formatResult(result)), logger }
        );
        finishRun(report);
      } finally {
        interrupt.dispose();
      }
      return;
    }
  }
}

run().catch((error: unknown) => {
  if (error instanceof DotplaceError) {
    console.error(error.message);
    process.exit(error.code);
  }
  if (error instanceof Error) {
    console.error(error.message);
  } else {
    console.error("Unexpected error");
  }
  process.exit(ExitCodes.Failure);
});
