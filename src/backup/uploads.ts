// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Incremental uploads snapshot. With a previous record available, rsync
 * hardlinks unchanged files against it instead of copying them.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import { BackupError, ErrorCode, asBackupError } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { directoryExists, readText } from "../system/fs";
import { CommandExecutor } from "../system/services/executor";
import { UPLOADS_DIR, readLatestPointer } from "./record";

export const RSYNC_LOG = "rsync.log";
export const RSYNC_ERROR_LOG = "rsync_error.log";

export const rsyncArgs = (
  source: string,
  dest: string,
  linkDest: Option.Option<string>
): readonly string[] => [
  "rsync",
  "-a",
  "--delete",
  ...Option.match(linkDest, {
    onNone: (): readonly string[] => [],
    onSome: (base): readonly string[] => [`--link-dest=${base}`],
  }),
  `${source}/`,
  `${dest}/`,
];

/** The previous record's `uploads/`, when the latest pointer leads to one. */
export const resolveIncrementalBase = (
  backupsDir: AbsolutePath
): Effect.Effect<Option.Option<AbsolutePath>, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const latest = yield* readLatestPointer(backupsDir);
    if (Option.isNone(latest)) {
      return Option.none();
    }
    const uploads = pathJoin(latest.value, UPLOADS_DIR);
    return (yield* directoryExists(uploads)) ? Option.some(uploads) : Option.none();
  });

export interface UploadsSnapshot {
  readonly incremental: boolean;
}

export const syncUploads = (
  uploadsDir: AbsolutePath,
  stagingPath: AbsolutePath,
  backupsDir: AbsolutePath
): Effect.Effect<UploadsSnapshot, BackupError, CommandExecutor | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const base = yield* resolveIncrementalBase(backupsDir);

    yield* Option.match(base, {
      onNone: () => Effect.logInfo("No previous backup found, performing full copy"),
      onSome: (dir) => Effect.logInfo(`Incremental copy against ${dir}`),
    });

    const errorLog = pathJoin(stagingPath, RSYNC_ERROR_LOG);
    const exitCode = yield* executor
      .execToFile(
        rsyncArgs(uploadsDir, pathJoin(stagingPath, UPLOADS_DIR), base),
        { stdout: pathJoin(stagingPath, RSYNC_LOG), stderr: errorLog }
      )
      .pipe(Effect.mapError(asBackupError(ErrorCode.BACKUP_FAILED, "rsync could not be run")));

    if (exitCode !== 0) {
      const stderr = yield* readText(errorLog).pipe(Effect.orElseSucceed(() => ""));
      return yield* Effect.fail(
        new BackupError({
          code: ErrorCode.BACKUP_FAILED,
          message: `rsync exited with code ${exitCode}${stderr.trim() ? `: ${stderr.trim()}` : ""}`,
        })
      );
    }

    return { incremental: Option.isSome(base) };
  });
