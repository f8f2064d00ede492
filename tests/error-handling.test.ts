import test from "node:test";
import assert from "node:assert/strict";
import {
  DestinationDivergedError,
  DotplaceError,
  ExitCodes,
  IOError,
  PermissionError,
  SourceNotFoundError,
  toItemError
} from "../src/errors";
import { createLogger } from "../src/logger";

function errnoError(code: string, message: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

void test("toItemError maps permission failures to PermissionError", () => {
  const denied = toItemError(errnoError("EACCES", "EACCES: permission denied"), "/home/u/.zshrc");
  assert.ok(denied instanceof PermissionError);
  assert.equal(denied.code, ExitCodes.Filesystem);
  assert.equal(denied.path, "/home/u/.zshrc");

  const notPermitted = toItemError(errnoError("EPERM", "EPERM: not permitted"), "/x");
  assert.ok(notPermitted instanceof PermissionError);
});

void test("toItemError maps other filesystem failures to IOError", () => {
  const error = toItemError(errnoError("EISDIR", "EISDIR: illegal operation"), "/x");
  assert.ok(error instanceof IOError);
  assert.equal(error.errno, "EISDIR");
  assert.equal(error.message, "EISDIR: illegal operation");

  const plain = toItemError("boom", "/y");
  assert.ok(plain instanceof IOError);
  assert.equal(plain.message, "boom");
});

void test("toItemError keeps errors that are already classified", () => {
  const original = new SourceNotFoundError("/dots/zshrc");
  assert.equal(toItemError(original, "/home/u/.zshrc"), original);
});

void test("error classes carry their names and exit codes", () => {
  const diverged = new DestinationDivergedError("/home/u/.vim");
  assert.ok(diverged instanceof DotplaceError);
  assert.equal(diverged.name, "DestinationDivergedError");
  assert.equal(diverged.code, ExitCodes.Conflict);
  assert.equal(diverged.message, "Destination modified since sync: /home/u/.vim");
});

void test("createLogger filters by verbosity", () => {
  const lines: string[] = [];
  const quiet = createLogger(0, (line) => lines.push(line));
  quiet.debug("d");
  quiet.info("i");
  quiet.warn("w");
  quiet.error("e");
  assert.equal(lines.length, 1);
  assert.ok(lines[0].endsWith(" e"));

  lines.length = 0;
  const loud = createLogger(3, (line) => lines.push(line));
  loud.debug("d");
  loud.info("i");
  loud.warn("w");
  loud.error("e");
  assert.deepEqual(
    lines.map((line) => line.slice(-2)),
    [" d", " i", " w", " e"]
  );
});
