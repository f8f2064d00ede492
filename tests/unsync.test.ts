import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { DestinationDivergedError, SourceNotFoundError } from "../src/errors";
import { SOURCE_NOT_FOUND } from "../src/plan";
import { syncItems } from "../src/sync";
import type { EngineContext } from "../src/sync";
import type { SyncItem } from "../src/types";
import { MODIFIED_SINCE_SYNC, NOTHING_TO_REMOVE, unsyncItems } from "../src/unsync";
import { isAbsent, scriptedConfirm, snapshotTree, withTempDir, writeFile } from "./helpers";

const zsh: SyncItem = { name: "zsh", action: "symlink", src: "./zshrc", dest: "~/.zshrc" };
const vim: SyncItem = { name: "vim", action: "copy", src: "./vim", dest: "~/.vim" };

async function setup(root: string): Promise<{ dots: string; home: string; context: EngineContext }> {
  const dots = path.join(root, "dots");
  const home = path.join(root, "home");
  await writeFile(path.join(dots, "zshrc"), "export EDITOR=vim\n");
  await writeFile(path.join(dots, "vim", "vimrc"), "set number\n");
  await writeFile(path.join(dots, "vim", "colors", "dark.vim"), "hi Normal\n");
  await fs.mkdir(home, { recursive: true });
  return { dots, home, context: { configDir: dots, resolve: { homeDir: home, env: {} } } };
}

async function syncAll(items: SyncItem[], context: EngineContext): Promise<void> {
  await syncItems(items, context, { dryRun: false, assumeYes: true }, {
    confirm: scriptedConfirm(true).confirm
  });
}

void test("unsync removes links and copies that still match what sync created", async () => {
  await withTempDir(async (root) => {
    const { dots, home, context } = await setup(root);
    await syncAll([zsh, vim], context);

    const report = await unsyncItems([zsh, vim], context, { dryRun: false });

    assert.deepEqual(
      report.results.map((result) => [result.name, result.status, result.operation]),
      [
        ["zsh", "applied", "remove"],
        ["vim", "applied", "remove"]
      ]
    );
    assert.equal(await isAbsent(path.join(home, ".zshrc")), true);
    assert.equal(await isAbsent(path.join(home, ".vim")), true);
    assert.equal(await fs.readFile(path.join(dots, "zshrc"), "utf8"), "export EDITOR=vim\n");
    assert.equal(await fs.readFile(path.join(dots, "vim", "vimrc"), "utf8"), "set number\n");
  });
});

void test("unsync leaves a copy that was edited after sync", async () => {
  await withTempDir(async (root) => {
    const { home, context } = await setup(root);
    await syncAll([vim], context);
    await writeFile(path.join(home, ".vim", "vimrc"), "set relativenumber\n");

    const report = await unsyncItems([vim], context, { dryRun: false });

    assert.equal(report.results[0].status, "skipped");
    assert.equal(report.results[0].reason, MODIFIED_SINCE_SYNC);
    assert.ok(report.results[0].error instanceof DestinationDivergedError);
    assert.equal(
      await fs.readFile(path.join(home, ".vim", "vimrc"), "utf8"),
      "set relativenumber\n"
    );
  });
});

void test("unsync never removes content sync did not create", async () => {
  await withTempDir(async (root) => {
    const { home, context } = await setup(root);
    await writeFile(path.join(root, "other"), "other");
    await fs.symlink(path.join(root, "other"), path.join(home, ".zshrc"));
    await fs.mkdir(path.join(home, ".vim"));
    const items: SyncItem[] = [
      zsh,
      vim,
      { name: "plain", action: "symlink", src: "./zshrc", dest: "~/.plain" }
    ];
    await writeFile(path.join(home, ".plain"), "a regular file");
    const before = await snapshotTree(home);

    const report = await unsyncItems(items, context, { dryRun: false });

    assert.deepEqual(
      report.results.map((result) => [result.status, result.reason]),
      [
        ["skipped", MODIFIED_SINCE_SYNC],
        ["skipped", MODIFIED_SINCE_SYNC],
        ["skipped", MODIFIED_SINCE_SYNC]
      ]
    );
    assert.deepEqual(await snapshotTree(home), before);
  });
});

void test("unsync reports absent destinations as unchanged", async () => {
  await withTempDir(async (root) => {
    const { context } = await setup(root);

    const report = await unsyncItems([zsh], context, { dryRun: false });

    assert.equal(report.results[0].status, "unchanged");
    assert.equal(report.results[0].reason, NOTHING_TO_REMOVE);
  });
});

void test("unsync removes a link to a source that has since been deleted", async () => {
  await withTempDir(async (root) => {
    const { dots, home, context } = await setup(root);
    await syncAll([zsh], context);
    await fs.rm(path.join(dots, "zshrc"));

    const report = await unsyncItems([zsh], context, { dryRun: false });

    assert.equal(report.results[0].status, "applied");
    assert.equal(await isAbsent(path.join(home, ".zshrc")), true);
  });
});

void test("unsync removes a link to a deleted source reached through a symlinked config dir", async () => {
  await withTempDir(async (root) => {
    const { dots, home } = await setup(root);
    await fs.symlink(dots, path.join(root, "dots-alias"));
    const context: EngineContext = {
      configDir: path.join(root, "dots-alias"),
      resolve: { homeDir: home, env: {} }
    };
    await syncAll([zsh], context);
    assert.equal(await fs.readlink(path.join(home, ".zshrc")), path.join(dots, "zshrc"));
    await fs.rm(path.join(dots, "zshrc"));

    const report = await unsyncItems([zsh], context, { dryRun: false });

    assert.equal(report.results[0].status, "applied");
    assert.equal(report.results[0].srcPath, path.join(dots, "zshrc"));
    assert.equal(await isAbsent(path.join(home, ".zshrc")), true);
  });
});

void test("unsync cannot prove a copy matches once its source is gone", async () => {
  await withTempDir(async (root) => {
    const { dots, home, context } = await setup(root);
    await syncAll([vim], context);
    await fs.rm(path.join(dots, "vim"), { recursive: true });

    const report = await unsyncItems([vim], context, { dryRun: false });

    assert.equal(report.results[0].status, "skipped");
    assert.equal(report.results[0].reason, SOURCE_NOT_FOUND);
    assert.ok(report.results[0].error instanceof SourceNotFoundError);
    assert.equal(await fs.readFile(path.join(home, ".vim", "vimrc"), "utf8"), "set number\n");
  });
});

void test("unsync dry run reports removals without performing them", async () => {
  await withTempDir(async (root) => {
    const { context } = await setup(root);
    await syncAll([zsh, vim], context);
    const before = await snapshotTree(root);

    const report = await unsyncItems([zsh, vim], context, { dryRun: true });

    assert.deepEqual(
      report.results.map((result) => result.status),
      ["would-apply", "would-apply"]
    );
    assert.equal(report.summary["would-apply"], 2);
    assert.deepEqual(await snapshotTree(root), before);
  });
});

void test("unsync reports each result as it goes", async () => {
  await withTempDir(async (root) => {
    const { context } = await setup(root);
    await syncAll([zsh], context);
    const seen: string[] = [];

    await unsyncItems([zsh, vim], context, { dryRun: false }, {
      report: (result) => seen.push(`${result.name}:${result.status}`)
    });

    assert.deepEqual(seen, ["zsh:applied", "vim:unchanged"]);
  });
});
