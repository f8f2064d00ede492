import chalk from "chalk";
import { displayPath } from "./paths";
import type { PlannedItem } from "./sync";
import type { RunReport, RunResult, RunStatus } from "./types";

export interface FormatOptions {
  color?: boolean;
  cwd?: string;
  homeDir?: string;
}

const STATUS_LABELS: Record<RunStatus, string> = {
  applied: "applied",
  unchanged: "unchanged",
  skipped: "skipped",
  failed: "failed",
  "would-apply": "would apply"
};

const LABEL_WIDTH = Math.max(...Object.values(STATUS_LABELS).map((label) => label.length));

function palette(options: FormatOptions): chalk.Chalk {
  return new chalk.Instance({ level: options.color === false ? 0 : chalk.level });
}

function colorFor(colors: chalk.Chalk, status: RunStatus): (text: string) => string {
  switch (status) {
    case "applied":
      return colors.green;
    case "unchanged":
      return colors.blue;
    case "skipped":
      return colors.yellow;
    case "failed":
      return colors.red;
    case "would-apply":
      return colors.cyan;
  }
}

function showPath(target: string | null, options: FormatOptions): string {
  if (target === null) {
    return "";
  }
  return ` ${displayPath(target, options.cwd, options.homeDir)}`;
}

export function formatResult(result: RunResult, options: FormatOptions = {}): string {
  const colors = palette(options);
  const label = colorFor(colors, result.status)(STATUS_LABELS[result.status].padEnd(LABEL_WIDTH));
  const operation =
    result.operation && (result.status === "applied" || result.status === "would-apply")
      ? colors.dim(` [${result.operation}]`)
      : "";
  const detail = result.error?.message ?? result.reason;
  const suffix = detail ? ` - ${detail}` : "";
  const destination = showPath(result.destPath, options);
  return `${label} ${colors.bold(result.name)}${destination}${operation}${suffix}`;
}

export function formatSummary(report: RunReport, options: FormatOptions = {}): string {
  const colors = palette(options);
  const { summary } = report;
  const parts = [
    `Total: ${summary.total}`,
    colors.green(`applied: ${summary.applied}`),
    colors.blue(`unchanged: ${summary.unchanged}`),
    colors.yellow(`skipped: ${summary.skipped}`),
    colors.red(`failed: ${summary.failed}`),
    colors.cyan(`would apply: ${summary["would-apply"]}`)
  ];
  const line = parts.join(", ");
  return report.interrupted ? `${line} ${colors.yellow("(interrupted)")}` : line;
}

export function formatPlanEntry(planned: PlannedItem, options: FormatOptions = {}): string {
  if (!planned.ok) {
    return formatResult(planned.result, options);
  }
  const colors = palette(options);
  const { entry } = planned;
  const marker = entry.destructive ? colors.red(" (destructive)") : "";
  const reason = entry.reason ? ` - ${entry.reason}` : "";
  return (
    `${entry.operation.padEnd(LABEL_WIDTH + 6)} ${colors.bold(entry.item.name)}` +
    `${showPath(entry.item.destPath, options)}${marker}${reason}`
  );
}
