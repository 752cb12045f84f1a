// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Job identity and the per-job staging workspace.
 */

import type { FileSystem } from "@effect/platform";
import { Clock, Effect, Match, pipe } from "effect";
import type { IdGenerator } from "../config/field-values";
import {
  BackupError,
  ErrorCode,
  type GeneralError,
  type SystemError,
  asBackupError,
} from "../lib/errors";
import { type AbsolutePath, type JobId, jobId, pathJoin } from "../lib/types";
import { ensureDirectory, isReadableDirectory, pathExists } from "../system/fs";
import { CommandExecutor } from "../system/services/executor";
import { STAGING_PREFIX, UPLOADS_DIR } from "./record";

export interface Job {
  readonly id: JobId;
  readonly startedAt: Date;
  readonly stagingPath: AbsolutePath;
}

export const stagingPathFor = (backupsDir: AbsolutePath, id: JobId): AbsolutePath =>
  pathJoin(backupsDir, `${STAGING_PREFIX}${id}`);

const emptyIdError = (source: string): BackupError =>
  new BackupError({
    code: ErrorCode.BACKUP_FAILED,
    message: `${source} produced no usable job id`,
  });

/** `job-<first uuid segment>`, lowercased. */
const uuidJobId: Effect.Effect<JobId, BackupError | SystemError | GeneralError, CommandExecutor> =
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const output = yield* executor.execOutput(["uuidgen"]);
    const segment = (output.trim().split("-")[0] ?? "").toLowerCase();
    return segment === "" ? yield* Effect.fail(emptyIdError("uuidgen")) : jobId(`job-${segment}`);
  });

/** `job-<8 hex chars>` of the md5 of a nanosecond clock reading. */
const hashJobId: Effect.Effect<JobId, BackupError | SystemError | GeneralError, CommandExecutor> =
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const nanos = yield* Clock.currentTimeNanos;
    const output = yield* executor.execOutput(["md5sum"], { stdin: String(nanos) });
    const digest = output.trim().slice(0, 8);
    return /^[0-9a-f]{8}$/.test(digest)
      ? jobId(`job-${digest}`)
      : yield* Effect.fail(emptyIdError("md5sum"));
  });

export const generateJobId = (
  generator: IdGenerator
): Effect.Effect<JobId, BackupError, CommandExecutor> =>
  pipe(
    Match.value(generator),
    Match.when("uuid", () => uuidJobId),
    Match.when("hash", () => hashJobId),
    Match.exhaustive,
    Effect.mapError(asBackupError(ErrorCode.BACKUP_FAILED, "Failed to generate job id"))
  );

/** Pre-flight: the uploads tree must be a readable directory before anything is created. */
export const validateSource = (
  uploadsDir: AbsolutePath
): Effect.Effect<void, BackupError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const readable = yield* isReadableDirectory(uploadsDir);
    if (!readable) {
      return yield* Effect.fail(
        new BackupError({
          code: ErrorCode.BACKUP_FAILED,
          message: `Uploads directory is missing, not a directory or unreadable: ${uploadsDir}`,
        })
      );
    }
  });

/** Create `<root>/temp_<id>/uploads/`. An existing staging directory is a collision. */
export const createWorkspace = (
  backupsDir: AbsolutePath,
  id: JobId,
  startedAt: Date
): Effect.Effect<Job, BackupError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const stagingPath = stagingPathFor(backupsDir, id);

    if (yield* pathExists(stagingPath)) {
      return yield* Effect.fail(
        new BackupError({
          code: ErrorCode.BACKUP_FAILED,
          message: `Staging directory already exists: ${stagingPath}`,
        })
      );
    }

    yield* ensureDirectory(pathJoin(stagingPath, UPLOADS_DIR)).pipe(
      Effect.mapError(asBackupError(ErrorCode.BACKUP_FAILED, "Failed to create job workspace"))
    );
    yield* Effect.logDebug(`Job ${id} staging at ${stagingPath}`);

    return { id, startedAt, stagingPath };
  });
