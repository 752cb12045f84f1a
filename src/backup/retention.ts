// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Retention pruning.
 *
 * Order: stale staging, invalid records, aged records, excess records,
 * stale error records. The count floor wins over age. Nothing here fails
 * the job; every removal failure is a warning.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Option, pipe } from "effect";
import type { RetentionPolicy } from "../config/backup";
import { type AbsolutePath, pathJoin } from "../lib/types";
import {
  directoryExists,
  isSymlink,
  listDirectory,
  modifiedTime,
  removeTree,
} from "../system/fs";
import {
  type BackupRecord,
  type BackupsRootScan,
  ERROR_RECORD_PREFIX,
  scanBackupsRoot,
} from "./record";

export const SECONDS_PER_DAY = 86_400;
export const STAGING_MAX_AGE_DAYS = 1;

// ============================================================================
// Pure planning
// ============================================================================

/**
 * Unix cutoff for age deletion. Without precise arithmetic the day count is
 * truncated to an integer first.
 */
export const computeCutoff = (nowSeconds: number, maxAgeDays: number, precise: boolean): number =>
  nowSeconds - Math.floor((precise ? maxAgeDays : Math.trunc(maxAgeDays)) * SECONDS_PER_DAY);

export const shouldDeleteAged = (record: BackupRecord, cutoff: number): boolean =>
  record.timestamp < cutoff;

/** Whether deleting one more record keeps the live count at or above the floor. */
export const floorAllowsDeletion = (liveCount: number, minCount: number): boolean =>
  minCount === 0 || liveCount > minCount;

export interface RetentionPlan {
  readonly aged: readonly BackupRecord[];
  readonly excess: readonly BackupRecord[];
}

/**
 * Which records go, assuming every deletion succeeds. Pinned records count
 * toward the floor but are never chosen.
 *
 * @param records sorted oldest first
 */
export const planRetention = (
  records: readonly BackupRecord[],
  policy: RetentionPolicy,
  cutoff: Option.Option<number>,
  pinned: ReadonlySet<string> = new Set()
): RetentionPlan => {
  const candidates = records.filter((r) => !pinned.has(r.name));
  const agedStep = Arr.reduce(
    candidates,
    { live: records.length, aged: Arr.empty<BackupRecord>() },
    (acc, record) =>
      Option.isSome(cutoff) &&
      shouldDeleteAged(record, cutoff.value) &&
      floorAllowsDeletion(acc.live, policy.minCount)
        ? { live: acc.live - 1, aged: Arr.append(acc.aged, record) }
        : acc
  );

  const excessCount = policy.minCount > 0 ? Math.max(0, agedStep.live - policy.minCount) : 0;
  return {
    aged: agedStep.aged,
    excess: candidates.filter((r) => !agedStep.aged.includes(r)).slice(0, excessCount),
  };
};

// ============================================================================
// Effectful pruning
// ============================================================================

export interface PruneSummary {
  readonly staging: number;
  readonly invalid: number;
  readonly aged: number;
  readonly excess: number;
  readonly errorRecords: number;
}

export interface PruneOptions {
  readonly backupsDir: AbsolutePath;
  readonly errorDir: AbsolutePath;
  readonly retention: RetentionPolicy;
  readonly errorLogRetentionDays: number;
  readonly preciseArithmetic: boolean;
  readonly now: Date;
}

/** True when removed; failures become warnings. */
const tryRemove = (
  path: AbsolutePath,
  reason: string
): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  removeTree(path).pipe(
    Effect.zipRight(Effect.logInfo(`Removed ${reason}: ${path}`)),
    Effect.as(true),
    Effect.catchAll((e) => Effect.as(Effect.logWarning(e.message), false))
  );

const countRemoved = (results: readonly boolean[]): number => results.filter(Boolean).length;

/** Paths whose mtime is older than `maxAgeSeconds`; unknown mtimes are kept. */
const olderThan = (
  paths: readonly AbsolutePath[],
  nowMs: number,
  maxAgeSeconds: number
): Effect.Effect<readonly AbsolutePath[], never, FileSystem.FileSystem> =>
  Effect.filter(paths, (p) =>
    pipe(
      modifiedTime(p),
      Effect.map(
        Option.match({
          onNone: () => false,
          onSome: (mtime) => (nowMs - mtime.getTime()) / 1000 > maxAgeSeconds,
        })
      ),
      Effect.orElseSucceed(() => false)
    )
  );

const errorRecordPaths = (
  errorDir: AbsolutePath
): Effect.Effect<readonly AbsolutePath[], never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* directoryExists(errorDir))) {
      return [];
    }
    const names = yield* listDirectory(errorDir).pipe(Effect.orElseSucceed(() => []));
    const candidates = names
      .filter((n) => n.startsWith(ERROR_RECORD_PREFIX))
      .map((n) => pathJoin(errorDir, n));
    return yield* Effect.filter(candidates, (p) =>
      Effect.zipWith(isSymlink(p), directoryExists(p), (link, dir) => !link && dir)
    );
  });

/** `error_*` directories older than the error-log retention; 0 days keeps them all. */
const pruneErrorRecords = (
  errorDir: AbsolutePath,
  retentionDays: number,
  nowMs: number
): Effect.Effect<number, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (retentionDays <= 0) {
      return 0;
    }
    const stale = yield* olderThan(
      yield* errorRecordPaths(errorDir),
      nowMs,
      retentionDays * SECONDS_PER_DAY
    );
    return countRemoved(yield* Effect.forEach(stale, (p) => tryRemove(p, "old error record")));
  });

interface PruneProgress {
  readonly remaining: readonly BackupRecord[];
  /** Records whose removal failed; live, never retried. */
  readonly failed: ReadonlySet<string>;
  readonly aged: number;
  readonly excess: number;
}

const removeAll = (
  records: readonly BackupRecord[],
  reason: string
): Effect.Effect<readonly (readonly [BackupRecord, boolean])[], never, FileSystem.FileSystem> =>
  Effect.forEach(records, (record) =>
    Effect.map(tryRemove(record.path, reason), (removed) => [record, removed] as const)
  );

/**
 * Carry out the retention plan. A failed removal leaves one more live
 * record than planned, so the plan is redrawn over what is left with the
 * failures pinned; each round pins at least one more record, so it ends.
 */
const pruneRecords = (
  progress: PruneProgress,
  policy: RetentionPolicy,
  cutoff: Option.Option<number>
): Effect.Effect<PruneProgress, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const plan = planRetention(progress.remaining, policy, cutoff, progress.failed);
    if (plan.aged.length + plan.excess.length === 0) {
      return progress;
    }
    yield* Effect.logDebug(
      `Retention plan: ${plan.aged.length} expired, ${plan.excess.length} over the floor`
    );

    const aged = yield* removeAll(plan.aged, "expired backup");
    const excess = yield* removeAll(plan.excess, "excess backup");
    const outcomes = [...aged, ...excess];
    const removed = new Set(outcomes.filter(([, ok]) => ok).map(([r]) => r.name));
    const failed = outcomes.filter(([, ok]) => !ok).map(([r]) => r.name);

    const next: PruneProgress = {
      remaining: progress.remaining.filter((r) => !removed.has(r.name)),
      failed: new Set([...progress.failed, ...failed]),
      aged: progress.aged + aged.filter(([, ok]) => ok).length,
      excess: progress.excess + excess.filter(([, ok]) => ok).length,
    };
    return failed.length === 0 ? next : yield* pruneRecords(next, policy, cutoff);
  });

const EMPTY_SCAN: BackupsRootScan = { valid: [], invalid: [], staging: [] };

export const pruneBackups = (
  options: PruneOptions
): Effect.Effect<PruneSummary, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const nowMs = options.now.getTime();
    const scan = yield* scanBackupsRoot(options.backupsDir).pipe(
      Effect.catchAll((e) =>
        Effect.as(Effect.logWarning(`Skipping record pruning: ${e.message}`), EMPTY_SCAN)
      )
    );

    const staleStaging = yield* olderThan(
      scan.staging,
      nowMs,
      STAGING_MAX_AGE_DAYS * SECONDS_PER_DAY
    );
    const staging = countRemoved(
      yield* Effect.forEach(staleStaging, (p) => tryRemove(p, "abandoned staging directory"))
    );

    const invalid = countRemoved(
      yield* Effect.forEach(scan.invalid, (p) => tryRemove(p, "invalid backup"))
    );

    const cutoff: Option.Option<number> =
      options.retention.maxAgeDays > 0
        ? Option.some(
            computeCutoff(
              Math.floor(nowMs / 1000),
              options.retention.maxAgeDays,
              options.preciseArithmetic
            )
          )
        : Option.none();
    const { aged, excess } = yield* pruneRecords(
      { remaining: scan.valid, failed: new Set(), aged: 0, excess: 0 },
      options.retention,
      cutoff
    );

    const errorRecords = yield* pruneErrorRecords(
      options.errorDir,
      options.errorLogRetentionDays,
      nowMs
    );

    return { staging, invalid, aged, excess, errorRecords };
  });
