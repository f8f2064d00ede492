import { createInterface } from "readline/promises";
import type { Interface } from "readline/promises";
import { describeState } from "./inspect";
import type { ConfirmPort, Logger, PlanEntry } from "./types";

export function confirmQuestion(entry: PlanEntry): string {
  return `Replace ${entry.item.destPath} (${describeState(entry.state)})? (y/N) `;
}

export function isAffirmative(answer: string): boolean {
  return /^(y|yes)$/i.test(answer.trim());
}

/**
 * Asks one confirmation question. Ctrl+C at the question counts as a decline
 * and calls `onInterrupt`, so the caller can stop the run.
 */
export async function askConfirmation(
  readline: Interface,
  entry: PlanEntry,
  onInterrupt: () => void
): Promise<boolean> {
  const controller = new AbortController();
  const onSigint = (): void => {
    controller.abort();
  };
  readline.on("SIGINT", onSigint);
  try {
    const answer = await readline.question(confirmQuestion(entry), {
      signal: controller.signal
    });
    return isAffirmative(answer);
  } catch (error) {
    if (controller.signal.aborted) {
      onInterrupt();
      return false;
    }
    throw error;
  } finally {
    readline.off("SIGINT", onSigint);
  }
}

/**
 * Asks on the terminal before each destructive change. Without a TTY there is
 * nobody to ask, so every destructive change is declined.
 */
export function createTerminalConfirm(logger: Logger, onInterrupt: () => void): ConfirmPort {
  return async (entry) => {
    if (!process.stdin.isTTY || !process.stdout.isTTY) {
      logger.warn(`Not a terminal; declining to replace ${entry.item.destPath} (use --yes)`);
      return false;
    }
    const readline = createInterface({ input: process.stdin, output: process.stdout });
    try {
      return await askConfirmation(readline, entry, onInterrupt);
    } finally {
      readline.close();
    }
  };
}
