// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error records for failed jobs: an environment snapshot, the job journal
 * and every log file left in staging.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { SystemError } from "../lib/errors";
import { formatBackupDate } from "../lib/format";
import { logFail } from "../lib/log";
import { MASKED_VALUE, isSensitiveKey } from "../lib/redact";
import { type AbsolutePath, type JobId, pathJoin } from "../lib/types";
import {
  copyFile,
  directoryExists,
  ensureDirectory,
  listDirectory,
  removeTree,
  writeText,
} from "../system/fs";
import type { Job } from "./job";
import { ERROR_RECORD_PREFIX } from "./record";

export const ENVIRONMENT_FILE = "environment.txt";
export const JOURNAL_FILE = "error.log";

/** One `KEY=value` line per variable, sorted by key, secrets masked. */
export const renderEnvironment = (
  env: Readonly<Record<string, string | undefined>>
): string =>
  Object.entries(env)
    .flatMap(([key, value]) => (value === undefined ? [] : [[key, value] as const]))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${key}=${isSensitiveKey(key) ? MASKED_VALUE : value}`)
    .join("\n")
    .concat("\n");

export const diagnosticDirFor = (errorDir: AbsolutePath, at: Date, id: JobId): AbsolutePath =>
  pathJoin(errorDir, `${ERROR_RECORD_PREFIX}${formatBackupDate(at)}_${id}`);

export interface FailureContext {
  readonly job: Job;
  readonly errorDir: AbsolutePath;
  readonly journal: readonly string[];
  readonly environment: Readonly<Record<string, string | undefined>>;
  readonly reason: string;
  readonly at: Date;
}

const writeErrorRecord = (
  context: FailureContext
): Effect.Effect<AbsolutePath, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const { job } = context;
    const dir = diagnosticDirFor(context.errorDir, context.at, job.id);
    yield* ensureDirectory(dir);

    yield* writeText(pathJoin(dir, ENVIRONMENT_FILE), renderEnvironment(context.environment));
    yield* writeText(
      pathJoin(dir, JOURNAL_FILE),
      [...context.journal, `Job ${job.id} failed: ${context.reason}`].join("\n").concat("\n")
    );

    const logs = (yield* listDirectory(job.stagingPath)).filter((n) => n.endsWith(".log"));
    yield* Effect.forEach(
      logs,
      (name) => copyFile(pathJoin(job.stagingPath, name), pathJoin(dir, name)),
      { discard: true }
    );

    return dir;
  });

/**
 * Capture diagnostics for a failed job, then discard its staging. A no-op
 * once staging is gone. Never fails.
 */
export const recordFailure = (
  context: FailureContext
): Effect.Effect<void, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* directoryExists(context.job.stagingPath))) {
      return;
    }

    yield* writeErrorRecord(context).pipe(
      Effect.tap((dir) => logFail(`Job ${context.job.id} failed; diagnostics saved to ${dir}`)),
      Effect.catchAll((e) => Effect.logError(`Could not save diagnostics: ${e.message}`))
    );

    yield* removeTree(context.job.stagingPath).pipe(
      Effect.catchAll((e) => Effect.logWarning(`Could not remove staging: ${e.message}`))
    );
  });
