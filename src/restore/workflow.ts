// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Restore a backup record: database through the container's psql, uploads
 * through rsync. The app service is stopped for the duration and brought
 * back up afterwards; on failure a restart is attempted before exiting.
 */

import { Prompt } from "@effect/cli";
import { FileSystem, type Terminal } from "@effect/platform";
import { Effect, Exit, Option, type Scope, pipe } from "effect";
import {
  type ComposeSettings,
  type DatabaseCredentials,
  loadBackupSettings,
  loadComposeSettings,
  loadDatabaseCredentials,
  missingCredentials,
} from "../config/backup";
import { rsyncArgs } from "../backup/uploads";
import { requireTools } from "../backup/capabilities";
import { type DumpArtifact, UPLOADS_DIR, detectDumpArtifact } from "../backup/record";
import {
  ConfigError,
  ErrorCode,
  GeneralError,
  RestoreError,
  asRestoreError,
} from "../lib/errors";
import { formatBytes } from "../lib/format";
import { createStepCounter, logSuccess } from "../lib/log";
import { type AbsolutePath, pathJoin, toAbsolutePath } from "../lib/types";
import { composeArgs, composeExecArgs } from "../system/compose";
import { directoryExists, ensureDirectory, fileSize, resolveRealPath } from "../system/fs";
import { CommandExecutor } from "../system/services/executor";

export interface RestoreSource {
  readonly dir: AbsolutePath;
  readonly artifact: DumpArtifact;
  readonly uploads: AbsolutePath;
}

interface RequiredCredentials {
  readonly database: string;
  readonly user: string;
  readonly password: string;
}

const notFound = (message: string): RestoreError =>
  new RestoreError({ code: ErrorCode.BACKUP_NOT_FOUND, message });

/** Resolve `path` (links followed) to a record with a dump and an uploads tree. */
export const locateBackup = (
  path: string,
  projectDir: AbsolutePath
): Effect.Effect<RestoreSource, RestoreError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const requested = toAbsolutePath(path, projectDir);
    if (!(yield* directoryExists(requested))) {
      return yield* Effect.fail(notFound(`Backup path is not a directory: ${requested}`));
    }
    const dir = yield* resolveRealPath(requested).pipe(
      Effect.mapError((e) => notFound(e.message))
    );
    if (dir !== requested) {
      yield* Effect.logInfo(`Resolved ${requested} to ${dir}`);
    }

    const artifact = yield* detectDumpArtifact(dir);
    if (Option.isNone(artifact)) {
      return yield* Effect.fail(notFound(`No database dump in ${dir}`));
    }
    const uploads = pathJoin(dir, UPLOADS_DIR);
    if (!(yield* directoryExists(uploads))) {
      return yield* Effect.fail(notFound(`Uploads directory not found: ${uploads}`));
    }

    return { dir, artifact: artifact.value, uploads };
  });

export const requireCredentials = (
  credentials: DatabaseCredentials
): Effect.Effect<RequiredCredentials, ConfigError> =>
  pipe(
    Option.all({
      database: credentials.database,
      user: credentials.user,
      password: credentials.password,
    }),
    Option.match({
      onNone: () =>
        Effect.fail(
          new ConfigError({
            code: ErrorCode.CONFIG_VALIDATION_ERROR,
            message: `Missing required environment variables: ${missingCredentials(credentials).join(", ")}`,
          })
        ),
      onSome: (required) => Effect.succeed(required),
    })
  );

/** `--yes` skips the prompt; Ctrl+C at the prompt counts as no. */
export const confirmRestore = (
  message: string,
  assumeYes: boolean
): Effect.Effect<boolean, never, Terminal.Terminal> =>
  assumeYes
    ? Effect.succeed(true)
    : Prompt.run(Prompt.confirm({ message, initial: false })).pipe(
        Effect.catchTag("QuitException", () => Effect.succeed(false))
      );

const checkContainerPsql = (
  compose: ComposeSettings,
  projectDir: AbsolutePath
): Effect.Effect<void, GeneralError, CommandExecutor> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const result = yield* executor
      .exec(
        composeExecArgs(compose, compose.databaseService, [
          "sh",
          "-c",
          "command -v psql >/dev/null 2>&1",
        ]),
        { cwd: projectDir }
      )
      .pipe(Effect.orElseSucceed(() => ({ exitCode: 1, stdout: "", stderr: "" })));
    if (result.exitCode !== 0) {
      return yield* Effect.fail(
        new GeneralError({
          code: ErrorCode.DEPENDENCY_MISSING,
          message: "psql not found inside the database container",
        })
      );
    }
  });

// ============================================================================
// Database
// ============================================================================

/** Plain SQL for psql: the raw dump as is, a compressed one gunzipped into `tmpDir`. */
const materializeSql = (
  artifact: DumpArtifact,
  tmpDir: string
): Effect.Effect<string, RestoreError, CommandExecutor | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (artifact._tag === "Raw") {
      return artifact.path;
    }
    const executor = yield* CommandExecutor;
    const sqlPath = pathJoin(tmpDir, "db_backup.sql");
    yield* Effect.logInfo(`Decompressing ${artifact.path}`);
    const exitCode = yield* executor
      .execToFile(["gunzip", "-c", artifact.path], {
        stdout: sqlPath,
        stderr: pathJoin(tmpDir, "gunzip_error.log"),
      })
      .pipe(Effect.mapError(asRestoreError("Failed to decompress database backup")));
    if (exitCode !== 0) {
      return yield* Effect.fail(
        new RestoreError({
          code: ErrorCode.RESTORE_FAILED,
          message: `Failed to decompress database backup: gunzip exited with code ${exitCode}`,
        })
      );
    }
    return sqlPath;
  });

const restoreDatabase = (
  source: RestoreSource,
  compose: ComposeSettings,
  credentials: RequiredCredentials,
  projectDir: AbsolutePath
): Effect.Effect<void, RestoreError, CommandExecutor | FileSystem.FileSystem | Scope.Scope> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const executor = yield* CommandExecutor;
    const tmpDir = yield* fs
      .makeTempDirectoryScoped({ prefix: "directus-ops-restore-" })
      .pipe(Effect.mapError(asRestoreError("Failed to create temporary directory")));

    const sqlPath = yield* materializeSql(source.artifact, tmpDir);
    const size = yield* fileSize(sqlPath).pipe(
      Effect.mapError(asRestoreError("Database backup unreadable"))
    );
    if (size === 0) {
      return yield* Effect.fail(
        new RestoreError({
          code: ErrorCode.RESTORE_FAILED,
          message: "Database backup is empty",
        })
      );
    }
    yield* Effect.logDebug(`SQL ready: ${sqlPath} (${formatBytes(size)})`);

    const env = { PGPASSWORD: credentials.password };
    const inContainer = (command: readonly string[]): readonly string[] =>
      composeExecArgs(compose, compose.databaseService, command, Object.keys(env));

    yield* Effect.logInfo(`Dropping database '${credentials.database}'`);
    const dropped = yield* executor
      .exec(inContainer(["dropdb", "-U", credentials.user, "--if-exists", credentials.database]), {
        cwd: projectDir,
        env,
      })
      .pipe(Effect.map((r) => r.exitCode === 0), Effect.orElseSucceed(() => false));
    if (!dropped) {
      yield* Effect.logWarning("Failed to drop database (it may not exist), continuing");
    }

    yield* Effect.logInfo(`Creating database '${credentials.database}'`);
    yield* executor
      .execSuccess(inContainer(["createdb", "-U", credentials.user, credentials.database]), {
        cwd: projectDir,
        env,
      })
      .pipe(Effect.mapError(asRestoreError(`Failed to create database '${credentials.database}'`)));

    yield* Effect.logInfo("Loading SQL through psql");
    yield* executor
      .execSuccess(inContainer(["psql", "-U", credentials.user, "-d", credentials.database]), {
        cwd: projectDir,
        env,
        stdinFile: sqlPath,
      })
      .pipe(Effect.mapError(asRestoreError("Database restore command (psql) failed")));
  });

// ============================================================================
// Workflow
// ============================================================================

export interface RestoreOptions {
  readonly projectDir: AbsolutePath;
  readonly backupPath: string;
  readonly assumeYes: boolean;
}

export interface RestoreResult {
  /** False when the user declined. */
  readonly restored: boolean;
  readonly source: AbsolutePath;
}

export const runRestore = (
  options: RestoreOptions
): Effect.Effect<
  RestoreResult,
  RestoreError | GeneralError | ConfigError,
  CommandExecutor | FileSystem.FileSystem | Terminal.Terminal
> =>
  Effect.gen(function* () {
    const { projectDir } = options;
    const settings = yield* loadBackupSettings(projectDir, Option.none());
    const compose = yield* loadComposeSettings;
    const credentials = yield* requireCredentials(yield* loadDatabaseCredentials);
    const executor = yield* CommandExecutor;
    const steps = yield* createStepCounter(5);

    yield* steps.next("Validating backup...");
    const source = yield* locateBackup(options.backupPath, projectDir);

    yield* steps.next("Checking required tools...");
    yield* requireTools(
      source.artifact._tag === "Compressed" ? ["docker", "rsync", "gunzip"] : ["docker", "rsync"]
    );
    yield* checkContainerPsql(compose, projectDir);

    const confirmed = yield* confirmRestore(
      `This will overwrite database '${credentials.database}' and ${settings.uploadsDir}. Continue?`,
      options.assumeYes
    );
    if (!confirmed) {
      yield* Effect.logWarning("Restore aborted by user");
      return { restored: false, source: source.dir };
    }

    const runCompose = (...args: string[]): Effect.Effect<number> =>
      executor.exec(composeArgs(compose, ...args), { cwd: projectDir }).pipe(
        Effect.map((r) => r.exitCode),
        Effect.orElseSucceed(() => 1)
      );

    const startApp = executor
      .execSuccess(composeArgs(compose, "up", "-d", compose.appService), { cwd: projectDir })
      .pipe(Effect.mapError(asRestoreError(`Failed to start ${compose.appService}`)));

    yield* Effect.scoped(
      Effect.gen(function* () {
        yield* steps.next(`Stopping ${compose.appService}...`);
        yield* Effect.acquireRelease(
          Effect.flatMap(runCompose("stop", compose.appService), (code) =>
            code === 0
              ? Effect.void
              : Effect.logWarning(`Failed to stop ${compose.appService}; it may not be running`)
          ),
          (_, exit) =>
            Exit.isFailure(exit)
              ? startApp.pipe(
                  Effect.catchAll((e) => Effect.logWarning(`Restart after failure: ${e.message}`))
                )
              : Effect.void
        );

        yield* steps.next("Restoring database...");
        yield* restoreDatabase(source, compose, credentials, projectDir);

        yield* steps.next("Restoring uploads...");
        yield* ensureDirectory(settings.uploadsDir).pipe(
          Effect.mapError(asRestoreError("Failed to prepare uploads directory"))
        );
        yield* executor
          .execSuccess(rsyncArgs(source.uploads, settings.uploadsDir, Option.none()))
          .pipe(Effect.mapError(asRestoreError("Uploads restore command (rsync) failed")));
      })
    );

    yield* Effect.logInfo(`Starting ${compose.appService}`);
    yield* startApp;

    yield* logSuccess(`Restored ${source.dir}`);
    return { restored: true, source: source.dir };
  });
