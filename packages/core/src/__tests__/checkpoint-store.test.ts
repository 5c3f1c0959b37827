/**
 * Tests for checkpoint-store.ts
 *
 * Each test gets its own temp state directory.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { StorageError, createSilentLogger } from "@trace-relay/shared";
import { CHECKPOINT_FILENAME, CheckpointStore } from "../checkpoint-store.js";

let tmpDir: string;
let store: CheckpointStore;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-checkpoint-test-"));
  store = new CheckpointStore({ stateDir: tmpDir, logger: createSilentLogger() });
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

const checkpoint = (lastLineConsumed: number, turnCount: number) => ({
  lastLineConsumed,
  turnCount,
  updatedAt: "2026-03-01T10:00:00.000Z",
});

describe("CheckpointStore", () => {
  test("missing file loads as empty", () => {
    expect(store.load()).toEqual({});
    expect(store.get("nope")).toBeUndefined();
  });

  test("save then load round-trips the mapping", () => {
    store.save({ a: checkpoint(10, 2), b: checkpoint(3, 1) });
    expect(store.load()).toEqual({ a: checkpoint(10, 2), b: checkpoint(3, 1) });
  });

  test("saved file is pretty JSON with a trailing newline", () => {
    store.save({ a: checkpoint(1, 1) });
    const text = fs.readFileSync(path.join(tmpDir, CHECKPOINT_FILENAME), "utf-8");
    expect(text).toBe(JSON.stringify({ a: checkpoint(1, 1) }, null, 2) + "\n");
  });

  test("set replaces one session and keeps the rest", () => {
    store.save({ a: checkpoint(10, 2), b: checkpoint(3, 1) });
    store.set("b", checkpoint(8, 4));
    expect(store.load()).toEqual({ a: checkpoint(10, 2), b: checkpoint(8, 4) });
    expect(store.get("b")).toEqual(checkpoint(8, 4));
  });

  test("set creates the state directory", () => {
    const nested = new CheckpointStore({
      stateDir: path.join(tmpDir, "deep", "state"),
      logger: createSilentLogger(),
    });
    nested.set("a", checkpoint(1, 1));
    expect(nested.get("a")).toEqual(checkpoint(1, 1));
  });

  test("corrupt JSON loads as empty", () => {
    fs.writeFileSync(path.join(tmpDir, CHECKPOINT_FILENAME), "{ not json");
    expect(store.load()).toEqual({});
  });

  test("a document that is not an object loads as empty", () => {
    fs.writeFileSync(path.join(tmpDir, CHECKPOINT_FILENAME), JSON.stringify([checkpoint(1, 1)]));
    expect(store.load()).toEqual({});
  });

  test("an invalid entry is dropped and the others kept", () => {
    fs.writeFileSync(
      path.join(tmpDir, CHECKPOINT_FILENAME),
      JSON.stringify({
        a: checkpoint(10, 2),
        bad: { lastLineConsumed: "ten" },
        old: { last_line: 40, turn_count: 9, updated: "2025-12-01T00:00:00+00:00" },
        b: checkpoint(3, 1),
      }),
    );

    expect(store.load()).toEqual({ a: checkpoint(10, 2), b: checkpoint(3, 1) });
    expect(store.get("bad")).toBeUndefined();
  });

  test("set after a dropped entry rewrites the file without it", () => {
    fs.writeFileSync(
      path.join(tmpDir, CHECKPOINT_FILENAME),
      JSON.stringify({ a: checkpoint(10, 2), bad: { turnCount: -1 } }),
    );

    store.set("c", checkpoint(5, 1));

    const onDisk: unknown = JSON.parse(
      fs.readFileSync(path.join(tmpDir, CHECKPOINT_FILENAME), "utf-8"),
    );
    expect(onDisk).toEqual({ a: checkpoint(10, 2), c: checkpoint(5, 1) });
  });

  test("save leaves no temp files behind", () => {
    store.save({ a: checkpoint(1, 1) });
    expect(fs.readdirSync(tmpDir)).toEqual([CHECKPOINT_FILENAME]);
  });

  test("save failure is a StorageError", () => {
    // A regular file where the state directory should be
    const blocker = path.join(tmpDir, "blocker");
    fs.writeFileSync(blocker, "");
    const broken = new CheckpointStore({
      stateDir: path.join(blocker, "state"),
      logger: createSilentLogger(),
    });

    expect(() => broken.save({ a: checkpoint(1, 1) })).toThrow(StorageError);
  });
});
