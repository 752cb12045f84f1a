// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Promotion of a staged job into a permanent record.
 *
 * The record is assembled inside staging and enters the root with one
 * rename; the pointer moves with a second. A pointer failure moves the
 * record back into staging, so a failed job never leaves a record behind.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { BackupError, ErrorCode, asBackupError } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import {
  ensureDirectory,
  isSymlink,
  movePath,
  pathExists,
  removeTree,
  replaceSymlink,
} from "../system/fs";
import type { Job } from "./job";
import {
  type BackupRecord,
  DumpArtifact,
  LATEST_POINTER,
  UPLOADS_DIR,
  artifactFileName,
  recordName,
} from "./record";

export interface FinalizeInput {
  readonly job: Job;
  readonly backupsDir: AbsolutePath;
  readonly artifact: DumpArtifact;
  readonly formattedDate: string;
  readonly timestamp: number;
}

export interface FinalizedRecord {
  readonly record: BackupRecord;
  /** The record's dump after the move. */
  readonly artifact: DumpArtifact;
}

const finalizeError = asBackupError(ErrorCode.FINALIZE_FAILED, "Finalize failed");

const relocated = (artifact: DumpArtifact, dir: AbsolutePath): DumpArtifact =>
  DumpArtifact.$match(artifact, {
    Compressed: () => DumpArtifact.Compressed({ path: pathJoin(dir, artifactFileName(artifact)) }),
    Raw: () => DumpArtifact.Raw({ path: pathJoin(dir, artifactFileName(artifact)) }),
  });

export const finalizeBackup = (
  input: FinalizeInput
): Effect.Effect<FinalizedRecord, BackupError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const { job, backupsDir, artifact } = input;
    const name = recordName(input.formattedDate, input.timestamp);
    const assembled = pathJoin(job.stagingPath, name);
    const target = pathJoin(backupsDir, name);

    if ((yield* pathExists(target)) || (yield* isSymlink(target))) {
      return yield* Effect.fail(
        new BackupError({
          code: ErrorCode.FINALIZE_FAILED,
          message: `Backup record already exists: ${target}`,
        })
      );
    }

    yield* ensureDirectory(assembled).pipe(Effect.mapError(finalizeError));
    yield* movePath(artifact.path, pathJoin(assembled, artifactFileName(artifact))).pipe(
      Effect.mapError(finalizeError)
    );
    yield* movePath(pathJoin(job.stagingPath, UPLOADS_DIR), pathJoin(assembled, UPLOADS_DIR)).pipe(
      Effect.mapError(finalizeError)
    );

    yield* movePath(assembled, target).pipe(Effect.mapError(finalizeError));
    yield* Effect.logDebug(`Promoted ${name} into ${backupsDir}`);

    yield* replaceSymlink(name, pathJoin(backupsDir, LATEST_POINTER)).pipe(
      Effect.mapError(finalizeError),
      Effect.tapError(() =>
        movePath(target, assembled).pipe(
          Effect.zipRight(Effect.logWarning(`Pointer update failed; ${name} moved back to staging`)),
          Effect.catchAll((e) =>
            Effect.logError(`Rollback of ${target} failed: ${e.message}`)
          )
        )
      )
    );

    yield* removeTree(job.stagingPath).pipe(
      Effect.catchAll((e) => Effect.logWarning(`Could not remove staging: ${e.message}`))
    );

    return {
      record: {
        name,
        path: target,
        formattedDate: input.formattedDate,
        timestamp: input.timestamp,
      },
      artifact: relocated(artifact, target),
    };
  });
