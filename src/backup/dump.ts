// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import type { ComposeSettings, DatabaseCredentials } from "../config/backup";
import { BackupError, ErrorCode, asBackupError } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { composeExecArgs, pgPasswordEnv, pgUserArgs } from "../system/compose";
import { fileSize, readText } from "../system/fs";
import { CommandExecutor } from "../system/services/executor";
import { DUMP_FILE } from "./record";

export const DUMP_ERROR_LOG = "db_error.log";

export const pgDumpCommand = (
  compose: ComposeSettings,
  credentials: DatabaseCredentials
): readonly string[] =>
  composeExecArgs(
    compose,
    compose.databaseService,
    [
      "pg_dump",
      ...pgUserArgs(credentials),
      ...Option.match(credentials.database, { onNone: () => [], onSome: (db) => [db] }),
    ],
    Object.keys(pgPasswordEnv(credentials))
  );

const invalidDump = (detail: string): BackupError =>
  new BackupError({
    code: ErrorCode.DUMP_INVALID,
    message: `Database dump is empty or invalid: ${detail}`,
  });

/**
 * Stream `pg_dump` into `<staging>/db_backup.sql`. A failed exit and an
 * empty file are the same failure.
 */
export const produceDump = (
  stagingPath: AbsolutePath,
  projectDir: AbsolutePath,
  compose: ComposeSettings,
  credentials: DatabaseCredentials
): Effect.Effect<AbsolutePath, BackupError, CommandExecutor | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const dumpPath = pathJoin(stagingPath, DUMP_FILE);
    const errorLog = pathJoin(stagingPath, DUMP_ERROR_LOG);

    const exitCode = yield* executor
      .execToFile(
        pgDumpCommand(compose, credentials),
        { stdout: dumpPath, stderr: errorLog },
        { cwd: projectDir, env: pgPasswordEnv(credentials) }
      )
      .pipe(Effect.mapError(asBackupError(ErrorCode.DUMP_INVALID, "pg_dump could not be run")));

    const stderr = yield* pipe(
      readText(errorLog),
      Effect.map((s) => s.trim()),
      Effect.orElseSucceed(() => "")
    );

    if (exitCode !== 0) {
      return yield* Effect.fail(
        invalidDump(`pg_dump exited with code ${exitCode}${stderr ? `: ${stderr}` : ""}`)
      );
    }

    const size = yield* fileSize(dumpPath).pipe(
      Effect.mapError(asBackupError(ErrorCode.DUMP_INVALID, "Dump file missing"))
    );
    if (size === 0) {
      return yield* Effect.fail(invalidDump(`${dumpPath} is 0 bytes`));
    }

    yield* Effect.logDebug(`Dump written: ${dumpPath} (${size} bytes)`);
    return dumpPath;
  });
