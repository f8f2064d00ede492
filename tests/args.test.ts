import test from "node:test";
import assert from "node:assert/strict";
import { parseArgs } from "../src/args";
import { DotplaceError, ExitCodes } from "../src/errors";

function argv(...args: string[]): string[] {
  return ["node", "dotplace", ...args];
}

void test("parseArgs reads the command, its path and the run flags", () => {
  const parsed = parseArgs(argv("sync", "dots", "-n", "-vv", "--yes"));
  assert.equal(parsed.command, "sync");
  assert.deepEqual(parsed.positionals, ["dots"]);
  assert.equal(parsed.dryRun, true);
  assert.equal(parsed.assumeYes, true);
  assert.equal(parsed.verbosity, 2);
});

void test("parseArgs defaults to an interactive, quiet run", () => {
  const parsed = parseArgs(argv("unsync"));
  assert.equal(parsed.command, "unsync");
  assert.deepEqual(parsed.positionals, []);
  assert.equal(parsed.dryRun, false);
  assert.equal(parsed.assumeYes, false);
  assert.equal(parsed.verbosity, 0);
  assert.equal(parsed.format, "yaml");
});

void test("parseArgs caps verbosity and collects settings assignments", () => {
  const parsed = parseArgs(
    argv("settings", "set", "defaultConfigFilename=home", "-vvvv", "--settings", "s.yaml")
  );
  assert.equal(parsed.command, "settings");
  assert.deepEqual(parsed.positionals, ["set", "defaultConfigFilename=home"]);
  assert.equal(parsed.verbosity, 3);
  assert.equal(parsed.settingsPath, "s.yaml");
});

void test("parseArgs accepts init options", () => {
  const parsed = parseArgs(argv("init", "--format", "json", "--force"));
  assert.equal(parsed.format, "json");
  assert.equal(parsed.force, true);
});

void test("parseArgs rejects unknown commands, options and formats", () => {
  const isUsageError = (error: unknown): boolean => {
    assert.ok(error instanceof DotplaceError);
    assert.equal(error.code, ExitCodes.Usage);
    return true;
  };
  assert.throws(() => parseArgs(argv("deploy")), isUsageError);
  assert.throws(() => parseArgs(argv("sync", "--force-all")), isUsageError);
  assert.throws(() => parseArgs(argv("init", "--format", "toml")), isUsageError);
  assert.throws(() => parseArgs(argv("sync", "--settings")), isUsageError);
});

void test("parseArgs without a command asks for help", () => {
  const parsed = parseArgs(argv("--help"));
  assert.equal(parsed.command, null);
  assert.equal(parsed.help, true);
});
