// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { existsSync, mkdirSync, readdirSync, symlinkSync, utimesSync } from "node:fs";
import { join } from "node:path";
import { FileSystem } from "@effect/platform";
import { SystemError as PlatformSystemError } from "@effect/platform/Error";
import { Effect, Layer, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { type BackupRecord, recordName } from "../../src/backup/record";
import {
  SECONDS_PER_DAY,
  computeCutoff,
  floorAllowsDeletion,
  planRetention,
  pruneBackups,
  shouldDeleteAged,
} from "../../src/backup/retention";
import { formatBackupDate } from "../../src/lib/format";
import { type AbsolutePath, path, pathJoin } from "../../src/lib/types";
import { runTest } from "../helpers/layers";
import { type TestProject, makeProject, nowSeconds } from "../helpers/project";

const fakeRecord = (timestamp: number): BackupRecord => ({
  name: recordName("2026-01-01_00-00-00", timestamp),
  path: path("/backups/unused"),
  formattedDate: "2026-01-01_00-00-00",
  timestamp,
});

/** The real filesystem, except that removing a `blocked` path fails. */
const blockRemoval = (
  blocked: readonly string[],
  attempts: string[]
): Layer.Layer<FileSystem.FileSystem, never, FileSystem.FileSystem> =>
  Layer.effect(
    FileSystem.FileSystem,
    Effect.map(
      FileSystem.FileSystem,
      (fs): FileSystem.FileSystem => ({
        ...fs,
        remove: (p, options) => {
          attempts.push(p);
          return blocked.includes(p)
            ? Effect.fail(
                new PlatformSystemError({
                  reason: "PermissionDenied",
                  module: "FileSystem",
                  method: "remove",
                  pathOrDescriptor: p,
                })
              )
            : fs.remove(p, options);
        },
      })
    )
  );

const tenRecords: readonly BackupRecord[] = Array.from({ length: 10 }, (_, i) =>
  fakeRecord(i + 1)
);

describe("computeCutoff", () => {
  test("subtracts whole days", () => {
    expect(computeCutoff(1_000_000, 7, true)).toBe(395_200);
  });

  test("keeps fractional days with precise arithmetic", () => {
    expect(computeCutoff(1_000_000, 1.5, true)).toBe(870_400);
  });

  test("truncates fractional days without precise arithmetic", () => {
    expect(computeCutoff(1_000_000, 1.5, false)).toBe(913_600);
  });
});

describe("shouldDeleteAged", () => {
  test("deletes strictly older records", () => {
    expect(shouldDeleteAged(fakeRecord(99), 100)).toBe(true);
    expect(shouldDeleteAged(fakeRecord(100), 100)).toBe(false);
  });
});

describe("floorAllowsDeletion", () => {
  test("a zero floor never blocks", () => {
    expect(floorAllowsDeletion(1, 0)).toBe(true);
  });

  test("blocks once the live count reaches the floor", () => {
    expect(floorAllowsDeletion(6, 5)).toBe(true);
    expect(floorAllowsDeletion(5, 5)).toBe(false);
  });
});

describe("planRetention", () => {
  test("max-age 7, floor 0: every aged record goes", () => {
    const plan = planRetention(tenRecords, { maxAgeDays: 7, minCount: 0 }, Option.some(100));
    expect(plan.aged).toHaveLength(10);
    expect(plan.excess).toHaveLength(0);
  });

  test("max-age 7, floor 5: the five oldest go", () => {
    const plan = planRetention(tenRecords, { maxAgeDays: 7, minCount: 5 }, Option.some(100));
    expect(plan.aged.map((r) => r.timestamp)).toEqual([1, 2, 3, 4, 5]);
    expect(plan.excess).toHaveLength(0);
  });

  test("without age pruning the oldest excess goes down to the floor", () => {
    const plan = planRetention(tenRecords.slice(0, 8), { maxAgeDays: 0, minCount: 5 }, Option.none());
    expect(plan.aged).toHaveLength(0);
    expect(plan.excess.map((r) => r.timestamp)).toEqual([1, 2, 3]);
  });

  test("a floor above the record count keeps everything", () => {
    const plan = planRetention(tenRecords.slice(0, 3), { maxAgeDays: 7, minCount: 5 }, Option.some(100));
    expect(plan.aged).toHaveLength(0);
    expect(plan.excess).toHaveLength(0);
  });

  test("pinned records count toward the floor but are never chosen", () => {
    const [first] = tenRecords;
    const pinned = new Set(first === undefined ? [] : [first.name]);
    const plan = planRetention(tenRecords, { maxAgeDays: 7, minCount: 5 }, Option.some(100), pinned);
    expect(plan.aged.map((r) => r.timestamp)).toEqual([2, 3, 4, 5, 6]);
  });
});

describe("pruneBackups", () => {
  let project: TestProject;
  let errorDir: AbsolutePath;

  const makeRecordDir = (timestamp: number): string => {
    const name = recordName(formatBackupDate(new Date(timestamp * 1000)), timestamp);
    mkdirSync(join(project.backupsDir, name, "uploads"), { recursive: true });
    return name;
  };

  /** Ten records, all between eight and nine days old. */
  const seedOldRecords = (): readonly string[] => {
    const base = nowSeconds() - 8 * SECONDS_PER_DAY;
    return Array.from({ length: 10 }, (_, i) => makeRecordDir(base - (10 - i) * 60));
  };

  const remainingRecords = (): readonly string[] =>
    readdirSync(project.backupsDir)
      .filter((n) => n.startsWith("backup_") && n !== "backup_latest")
      .sort();

  beforeEach(() => {
    project = makeProject();
    errorDir = pathJoin(project.backupsDir, "error_logs");
    mkdirSync(project.backupsDir, { recursive: true });
  });

  afterEach(() => {
    project.cleanup();
  });

  const pruning = (minCount: number) =>
    pruneBackups({
      backupsDir: project.backupsDir,
      errorDir,
      retention: { maxAgeDays: 7, minCount },
      errorLogRetentionDays: 30,
      preciseArithmetic: true,
      now: new Date(),
    });

  const prune = (minCount: number) => runTest(pruning(minCount));

  test("floor 0 removes all ten aged records", async () => {
    seedOldRecords();
    const summary = await prune(0);
    expect(summary.aged).toBe(10);
    expect(remainingRecords()).toEqual([]);
  });

  test("floor 5 removes the five oldest", async () => {
    const names = seedOldRecords();
    const summary = await prune(5);
    expect(summary.aged).toBe(5);
    expect(summary.excess).toBe(0);
    expect(remainingRecords()).toEqual([...names.slice(5)].sort());
  });

  test("a record that cannot be removed stays live and is tried once", async () => {
    const names = seedOldRecords();
    const [first = ""] = names;
    const blocked = join(project.backupsDir, first);
    const attempts: string[] = [];

    const summary = await runTest(
      pruning(5).pipe(Effect.provide(blockRemoval([blocked], attempts)))
    );

    expect(summary.aged).toBe(5);
    expect(remainingRecords()).toEqual([first, ...names.slice(6)].sort());
    expect(attempts.filter((p) => p === blocked)).toHaveLength(1);
  });

  test("floor applies to fresh records as well", async () => {
    const base = nowSeconds() - 3600;
    const names = Array.from({ length: 7 }, (_, i) => makeRecordDir(base + i * 60));
    const summary = await prune(5);
    expect(summary.excess).toBe(2);
    expect(remainingRecords()).toEqual([...names.slice(2)].sort());
  });

  test("removes invalid names and keeps links and fresh staging", async () => {
    const kept = makeRecordDir(nowSeconds() - 60);
    mkdirSync(join(project.backupsDir, "backup_garbage"));
    mkdirSync(join(project.backupsDir, "temp_job-fresh"));
    symlinkSync(kept, join(project.backupsDir, "backup_latest"));

    const summary = await prune(0);

    expect(summary.invalid).toBe(1);
    expect(summary.staging).toBe(0);
    expect(existsSync(join(project.backupsDir, "backup_garbage"))).toBe(false);
    expect(existsSync(join(project.backupsDir, "temp_job-fresh"))).toBe(true);
    expect(existsSync(join(project.backupsDir, "backup_latest"))).toBe(true);
  });

  test("removes abandoned staging and stale error records by age", async () => {
    const staging = join(project.backupsDir, "temp_job-old");
    const staleError = join(errorDir, "error_2026-01-01_00-00-00_job-old");
    const freshError = join(errorDir, "error_2026-01-02_00-00-00_job-new");
    mkdirSync(staging);
    mkdirSync(staleError, { recursive: true });
    mkdirSync(freshError, { recursive: true });

    const twoDaysAgo = new Date(Date.now() - 2 * SECONDS_PER_DAY * 1000);
    const fortyDaysAgo = new Date(Date.now() - 40 * SECONDS_PER_DAY * 1000);
    utimesSync(staging, twoDaysAgo, twoDaysAgo);
    utimesSync(staleError, fortyDaysAgo, fortyDaysAgo);

    const summary = await prune(0);

    expect(summary.staging).toBe(1);
    expect(summary.errorRecords).toBe(1);
    expect(existsSync(staging)).toBe(false);
    expect(existsSync(staleError)).toBe(false);
    expect(existsSync(freshError)).toBe(true);
  });
});
