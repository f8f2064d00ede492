import fs from "fs/promises";
import path from "path";
import { SourceNotFoundError, toItemError } from "./errors";
import {
  assertCanRead,
  assertCanWrite,
  copyIntoPlace,
  ensureDir,
  removeEntry
} from "./filesystem";
import { silentLogger } from "./logger";
import { SOURCE_NOT_FOUND } from "./plan";
import type {
  EnginePorts,
  ExecuteOptions,
  PlanEntry,
  RunReport,
  RunResult,
  RunStatus,
  RunSummary
} from "./types";

export const DECLINED = "declined";

export function createResult(
  entry: PlanEntry,
  status: RunStatus,
  extra: Pick<RunResult, "reason" | "error"> = {}
): RunResult {
  return {
    name: entry.item.name,
    srcPath: entry.item.srcPath,
    destPath: entry.item.destPath,
    operation: entry.operation,
    destructive: entry.destructive,
    status,
    ...extra
  };
}

export function summarize(results: RunResult[]): RunSummary {
  const summary: RunSummary = {
    total: results.length,
    applied: 0,
    unchanged: 0,
    skipped: 0,
    failed: 0,
    "would-apply": 0
  };
  for (const result of results) {
    summary[result.status] += 1;
  }
  return summary;
}

async function createLink(entry: PlanEntry): Promise<void> {
  const { srcPath, destPath } = entry.item;
  await ensureDir(path.dirname(destPath));
  if (entry.state.kind !== "absent") {
    await removeEntry(destPath);
  }
  const sourceStat = await fs.stat(srcPath);
  await fs.symlink(srcPath, destPath, sourceStat.isDirectory() ? "dir" : "file");
}

async function createCopy(entry: PlanEntry): Promise<void> {
  const { srcPath, destPath } = entry.item;
  await ensureDir(path.dirname(destPath));
  await copyIntoPlace(srcPath, destPath);
}

export async function applyEntry(entry: PlanEntry): Promise<void> {
  switch (entry.operation) {
    case "create-link":
    case "replace-link":
      await createLink(entry);
      return;
    case "create-copy":
    case "replace-with-copy":
      await createCopy(entry);
      return;
    case "remove":
      await removeEntry(entry.item.destPath);
      return;
    case "noop":
    case "skip":
      return;
  }
}

/** Runs the same checks a real run would hit first, without mutating anything. */
export async function simulateEntry(entry: PlanEntry): Promise<void> {
  if (entry.operation !== "remove") {
    await assertCanRead(entry.item.srcPath);
  }
  await assertCanWrite(entry.item.destPath);
}

export async function executeEntry(
  entry: PlanEntry,
  options: ExecuteOptions,
  ports: EnginePorts
): Promise<RunResult> {
  const logger = ports.logger ?? silentLogger;
  const { name, destPath } = entry.item;

  if (entry.operation === "noop") {
    logger.debug(`${name}: ${destPath} already in sync`);
    return createResult(entry, "unchanged");
  }
  if (entry.operation === "skip") {
    logger.debug(`${name}: skipped (${entry.reason ?? "no reason"})`);
    const error =
      entry.reason === SOURCE_NOT_FOUND ? new SourceNotFoundError(entry.item.srcPath) : undefined;
    return createResult(entry, "skipped", { reason: entry.reason, error });
  }

  try {
    if (options.dryRun) {
      await simulateEntry(entry);
      logger.debug(`${name}: would ${entry.operation} ${destPath}`);
      return createResult(entry, "would-apply");
    }

    if (entry.destructive && !options.assumeYes) {
      const accepted = await ports.confirm(entry);
      if (!accepted) {
        logger.info(`${name}: replacement of ${destPath} declined`);
        return createResult(entry, "skipped", { reason: DECLINED });
      }
    }

    await applyEntry(entry);
    logger.info(`${name}: ${entry.operation} ${destPath}`);
    return createResult(entry, "applied");
  } catch (error) {
    const itemError = toItemError(error, destPath);
    logger.error(`${name}: ${itemError.message}`);
    return createResult(entry, "failed", { error: itemError });
  }
}

/**
 * Runs `step` for each input in order, reporting every result as it lands. An
 * aborted signal stops the run before the next input.
 */
export async function runSequentially<T>(
  inputs: readonly T[],
  step: (input: T) => Promise<RunResult>,
  signal: AbortSignal | undefined,
  ports: Pick<EnginePorts, "report" | "logger">
): Promise<RunReport> {
  const logger = ports.logger ?? silentLogger;
  const results: RunResult[] = [];
  let interrupted = false;

  for (const input of inputs) {
    if (signal?.aborted) {
      interrupted = true;
      logger.warn("Interrupted; remaining items were not processed");
      break;
    }
    const result = await step(input);
    results.push(result);
    ports.report?.(result);
  }

  return { results, summary: summarize(results), interrupted };
}

export async function execute(
  entries: PlanEntry[],
  options: ExecuteOptions,
  ports: EnginePorts
): Promise<RunReport> {
  return await runSequentially(
    entries,
    async (entry) => await executeEntry(entry, options, ports),
    options.signal,
    ports
  );
}
