import { DestinationDivergedError, SourceNotFoundError, toItemError } from "./errors";
import { applyEntry, createResult, runSequentially, simulateEntry } from "./execute";
import { targetExists } from "./filesystem";
import { inspectDestination } from "./inspect";
import { silentLogger } from "./logger";
import { resolveItem } from "./paths";
import { copyMatchesSource, linkPointsTo, SOURCE_NOT_FOUND } from "./plan";
import { failedItem } from "./sync";
import type { EngineContext } from "./sync";
import type {
  DestState,
  EnginePorts,
  PlanEntry,
  ResolvedItem,
  RunReport,
  RunResult,
  SyncItem,
  UnsyncOptions
} from "./types";

export const MODIFIED_SINCE_SYNC = "modified since sync";
export const NOTHING_TO_REMOVE = "nothing to remove";

async function matchesSyncedState(item: ResolvedItem, state: DestState): Promise<boolean> {
  if (item.action === "symlink") {
    return (
      (state.kind === "symlink" || state.kind === "broken-symlink") &&
      linkPointsTo(item.destPath, state.target, item.srcPath)
    );
  }
  return await copyMatchesSource(item, state);
}

/**
 * Decides what unsync does for one item. Only a destination that still looks
 * exactly like what sync produces is planned for removal.
 */
export async function planRemoval(item: ResolvedItem): Promise<PlanEntry> {
  const state = await inspectDestination(item.destPath);
  if (state.kind === "absent") {
    return { item, state, operation: "noop", destructive: false, reason: NOTHING_TO_REMOVE };
  }
  if (item.action === "copy" && !(await targetExists(item.srcPath))) {
    return { item, state, operation: "skip", destructive: false, reason: SOURCE_NOT_FOUND };
  }
  if (await matchesSyncedState(item, state)) {
    return { item, state, operation: "remove", destructive: false };
  }
  return { item, state, operation: "skip", destructive: false, reason: MODIFIED_SINCE_SYNC };
}

async function unsyncItem(
  item: SyncItem,
  context: EngineContext,
  options: UnsyncOptions,
  ports: Pick<EnginePorts, "logger">
): Promise<RunResult> {
  const logger = ports.logger ?? silentLogger;
  let resolved: ResolvedItem;
  try {
    resolved = await resolveItem(item, context.configDir, context.resolve);
  } catch (error) {
    return failedItem(item, error);
  }

  let entry: PlanEntry;
  try {
    entry = await planRemoval(resolved);
  } catch (error) {
    return failedItem(item, error, resolved);
  }

  if (entry.operation === "noop") {
    return createResult(entry, "unchanged", { reason: entry.reason });
  }
  if (entry.operation === "skip") {
    logger.debug(`${item.name}: leaving ${resolved.destPath} (${entry.reason ?? ""})`);
    const error =
      entry.reason === MODIFIED_SINCE_SYNC
        ? new DestinationDivergedError(resolved.destPath)
        : new SourceNotFoundError(resolved.srcPath);
    return createResult(entry, "skipped", { reason: entry.reason, error });
  }

  try {
    if (options.dryRun) {
      await simulateEntry(entry);
      return createResult(entry, "would-apply");
    }
    await applyEntry(entry);
    logger.info(`${item.name}: removed ${resolved.destPath}`);
    return createResult(entry, "applied");
  } catch (error) {
    return createResult(entry, "failed", { error: toItemError(error, resolved.destPath) });
  }
}

export async function unsyncItems(
  items: SyncItem[],
  context: EngineContext,
  options: UnsyncOptions,
  ports: Omit<EnginePorts, "confirm"> = {}
): Promise<RunReport> {
  const logger = ports.logger ?? silentLogger;
  return await runSequentially(
    items,
    async (item) => {
      const result = await unsyncItem(item, context, options, ports);
      if (result.status === "failed" && result.error) {
        logger.error(`${item.name}: ${result.error.message}`);
      }
      return result;
    },
    options.signal,
    ports
  );
}
