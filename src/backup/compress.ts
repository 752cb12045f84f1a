// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { BackupError, ErrorCode, type GeneralError, type SystemError } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { fileSize, removeTree } from "../system/fs";
import { CommandExecutor } from "../system/services/executor";
import { COMPRESSED_DUMP_FILE, DumpArtifact } from "./record";

export const GZIP_ERROR_LOG = "gzip_error.log";

export const gzipArgs = (level: number, source: string): readonly string[] => [
  "gzip",
  "-c",
  `-${level}`,
  source,
];

const gzipInto = (
  dumpPath: AbsolutePath,
  archivePath: AbsolutePath,
  stagingPath: AbsolutePath,
  level: number
): Effect.Effect<
  void,
  BackupError | SystemError | GeneralError,
  CommandExecutor | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const exitCode = yield* executor.execToFile(gzipArgs(level, dumpPath), {
      stdout: archivePath,
      stderr: pathJoin(stagingPath, GZIP_ERROR_LOG),
    });
    if (exitCode !== 0) {
      return yield* Effect.fail(
        new BackupError({
          code: ErrorCode.BACKUP_FAILED,
          message: `gzip exited with code ${exitCode}`,
        })
      );
    }
    if ((yield* fileSize(archivePath)) === 0) {
      return yield* Effect.fail(
        new BackupError({
          code: ErrorCode.BACKUP_FAILED,
          message: "gzip produced an empty archive",
        })
      );
    }
    yield* removeTree(dumpPath);
  });

/**
 * Compress the dump in place. Never fails: when gzip is unavailable or
 * errors, the partial archive is dropped and the raw dump is kept.
 */
export const compressDump = (
  dumpPath: AbsolutePath,
  stagingPath: AbsolutePath,
  level: number,
  compressionAvailable: boolean
): Effect.Effect<DumpArtifact, never, CommandExecutor | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!compressionAvailable) {
      yield* Effect.logWarning("Compression unavailable, keeping the uncompressed dump");
      return DumpArtifact.Raw({ path: dumpPath });
    }

    const archivePath = pathJoin(stagingPath, COMPRESSED_DUMP_FILE);
    return yield* gzipInto(dumpPath, archivePath, stagingPath, level).pipe(
      Effect.as(DumpArtifact.Compressed({ path: archivePath })),
      Effect.catchAll((e) =>
        Effect.gen(function* () {
          yield* Effect.logWarning(
            `Compression failed, keeping the uncompressed dump: ${e.message}`
          );
          yield* removeTree(archivePath).pipe(
            Effect.catchAll((err) => Effect.logWarning(err.message))
          );
          return DumpArtifact.Raw({ path: dumpPath });
        })
      )
    );
  });
