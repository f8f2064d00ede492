import { toItemError } from "./errors";
import { executeEntry, runSequentially } from "./execute";
import { silentLogger } from "./logger";
import { resolveItem } from "./paths";
import type { ResolveOptions } from "./paths";
import { planItem } from "./plan";
import type {
  EnginePorts,
  ExecuteOptions,
  Logger,
  PlanEntry,
  ResolvedItem,
  RunReport,
  RunResult,
  SyncItem
} from "./types";

export type PlannedItem =
  | { ok: true; entry: PlanEntry }
  | { ok: false; result: RunResult };

export interface EngineContext {
  configDir: string;
  resolve?: ResolveOptions;
}

export function failedItem(item: SyncItem, error: unknown, resolved?: ResolvedItem): RunResult {
  return {
    name: item.name,
    srcPath: resolved?.srcPath ?? null,
    destPath: resolved?.destPath ?? null,
    operation: null,
    destructive: false,
    status: "failed",
    error: toItemError(error, resolved?.destPath ?? item.dest)
  };
}

/**
 * Resolves and plans one item. Errors never escape: they come back as a
 * failed result for that item alone.
 */
export async function planSyncItem(
  item: SyncItem,
  context: EngineContext,
  logger: Logger = silentLogger
): Promise<PlannedItem> {
  let resolved: ResolvedItem;
  try {
    resolved = await resolveItem(item, context.configDir, context.resolve);
  } catch (error) {
    return { ok: false, result: failedItem(item, error) };
  }

  try {
    const entry = await planItem(resolved);
    logger.debug(
      `${item.name}: ${entry.state.kind} -> ${entry.operation}` +
        (entry.destructive ? " (destructive)" : "")
    );
    return { ok: true, entry };
  } catch (error) {
    return { ok: false, result: failedItem(item, error, resolved) };
  }
}

export async function planItems(
  items: SyncItem[],
  context: EngineContext,
  logger: Logger = silentLogger
): Promise<PlannedItem[]> {
  const planned: PlannedItem[] = [];
  for (const item of items) {
    planned.push(await planSyncItem(item, context, logger));
  }
  return planned;
}

/**
 * Plans each item against the filesystem as it is just before that item runs,
 * then executes it.
 */
export async function syncItems(
  items: SyncItem[],
  context: EngineContext,
  options: ExecuteOptions,
  ports: EnginePorts
): Promise<RunReport> {
  const logger = ports.logger ?? silentLogger;
  return await runSequentially(
    items,
    async (item) => {
      const planned = await planSyncItem(item, context, logger);
      if (planned.ok) {
        return await executeEntry(planned.entry, options, ports);
      }
      if (planned.result.error) {
        logger.error(`${item.name}: ${planned.result.error.message}`);
      }
      return planned.result;
    },
    options.signal,
    ports
  );
}
