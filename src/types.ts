import type { DotplaceError } from "./errors";

export type SyncAction = "symlink" | "copy";

export interface SyncItem {
  name: string;
  action: SyncAction;
  src: string;
  dest: string;
}

export interface LoadedSyncConfig {
  configDir: string;
  files: string[];
  items: SyncItem[];
}

export interface ResolvedItem {
  name: string;
  action: SyncAction;
  srcPath: string;
  destPath: string;
}

export type DestState =
  | { kind: "absent" }
  | { kind: "symlink"; target: string }
  | { kind: "broken-symlink"; target: string }
  | { kind: "entry"; isDirectory: boolean };

export type Operation =
  | "noop"
  | "create-link"
  | "create-copy"
  | "replace-link"
  | "replace-with-copy"
  | "remove"
  | "skip";

export interface PlanEntry {
  item: ResolvedItem;
  state: DestState;
  operation: Operation;
  destructive: boolean;
  reason?: string;
}

export type RunStatus = "applied" | "unchanged" | "skipped" | "failed" | "would-apply";

export interface RunResult {
  name: string;
  srcPath: string | null;
  destPath: string | null;
  operation: Operation | null;
  destructive: boolean;
  status: RunStatus;
  reason?: string;
  error?: DotplaceError;
}

export type RunSummary = Record<RunStatus, number> & { total: number };

export interface RunReport {
  results: RunResult[];
  summary: RunSummary;
  interrupted: boolean;
}

export interface ExecuteOptions {
  dryRun: boolean;
  assumeYes: boolean;
  signal?: AbortSignal;
}

export interface UnsyncOptions {
  dryRun: boolean;
  signal?: AbortSignal;
}

export type ConfirmPort = (entry: PlanEntry) => Promise<boolean>;

export type ReportPort = (result: RunResult) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface EnginePorts {
  confirm: ConfirmPort;
  report?: ReportPort;
  logger?: Logger;
}

export interface AppSettings {
  configPatterns: string[];
  defaultConfigFilename: string;
}
