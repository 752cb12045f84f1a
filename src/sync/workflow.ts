// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Moving backups between environments.
 *
 * Pull makes (or fetches) a backup and keeps an environment-named copy and
 * a tar of it in the sync directory. Push restores the most recently pulled
 * backup locally or on the dev host. Production is never a push target.
 */

import { basename, dirname, posix } from "node:path";
import type { FileSystem, Terminal } from "@effect/platform";
import { Array as Arr, Effect, Option, type Scope, pipe } from "effect";
import { runBackup } from "../backup/workflow";
import { requireTools } from "../backup/capabilities";
import { RECORD_PREFIX } from "../backup/record";
import { loadBackupSettings } from "../config/backup";
import type { Environment } from "../config/field-values";
import { type SyncSettings, loadSyncSettings } from "../config/sync";
import {
  type BackupError,
  type ConfigError,
  ErrorCode,
  type GeneralError,
  type RestoreError,
  SyncError,
  asSyncError,
} from "../lib/errors";
import { createStepCounter, logSuccess } from "../lib/log";
import { type AbsolutePath, pathJoin, toAbsolutePath } from "../lib/types";
import { confirmRestore, runRestore } from "../restore/workflow";
import {
  copyTree,
  directoryExists,
  ensureDirectory,
  fileExists,
  isSymlink,
  listDirectory,
  movePath,
  pathExists,
  readText,
  removeTree,
  writeText,
} from "../system/fs";
import { CommandExecutor } from "../system/services/executor";

export const TAR_REFERENCE_FILE = "latest_backup.txt";
export const DIR_REFERENCE_FILE = "latest_backup_dir.txt";
export const PULL_ARCHIVE = "directus_backup.tar";
export const PUSH_ARCHIVE = "directus_backup_push.tar";

const REMOTE_TOOLS: readonly string[] = ["ssh", "rsync", "tar"];

type Env = Readonly<Record<string, string | undefined>>;

type SyncRequirements = CommandExecutor | FileSystem.FileSystem;

// ============================================================================
// Helpers
// ============================================================================

/** Single-quote for a POSIX shell on the remote side. */
export const shellQuote = (value: string): string => `'${value.replace(/'/g, `'\\''`)}'`;

export const sshArgs = (host: string, remoteCommand: string): readonly string[] => [
  "ssh",
  host,
  remoteCommand,
];

/** `backup_<date>_<ts>` becomes `backup_<env>_<date>_<ts>`. */
export const environmentRecordName = (environment: Environment, name: string): string =>
  `${RECORD_PREFIX}${environment}_${name.startsWith(RECORD_PREFIX) ? name.slice(RECORD_PREFIX.length) : name}`;

/** Newest `backup_*` directory by reverse name order; links are skipped. */
export const findLatestRecordDir = (
  dir: AbsolutePath
): Effect.Effect<Option.Option<AbsolutePath>, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* directoryExists(dir))) {
      return Option.none();
    }
    const names = yield* listDirectory(dir).pipe(Effect.orElseSucceed((): readonly string[] => []));
    const candidates = yield* Effect.filter(
      names.filter((n) => n.startsWith(RECORD_PREFIX)).map((n) => pathJoin(dir, n)),
      (p) => Effect.zipWith(isSymlink(p), directoryExists(p), (link, isDir) => !link && isDir)
    );
    return pipe(candidates, Arr.reverse, Arr.head);
  });

/** Reference files hold bare absolute paths, no trailing newline. */
export const writeReferences = (
  syncDir: AbsolutePath,
  archive: AbsolutePath,
  dir: AbsolutePath
): Effect.Effect<void, SyncError, FileSystem.FileSystem> =>
  Effect.all(
    [
      writeText(pathJoin(syncDir, TAR_REFERENCE_FILE), archive),
      writeText(pathJoin(syncDir, DIR_REFERENCE_FILE), dir),
    ],
    { discard: true }
  ).pipe(Effect.mapError(asSyncError("Failed to store backup references")));

/** Relative references resolve against the sync directory. */
const readReference = (
  file: AbsolutePath,
  syncDir: AbsolutePath
): Effect.Effect<Option.Option<AbsolutePath>, never, FileSystem.FileSystem> =>
  readText(file).pipe(
    Effect.map((s) => s.trim()),
    Effect.map((s) =>
      s === "" ? Option.none<AbsolutePath>() : Option.some(toAbsolutePath(s, syncDir))
    ),
    Effect.orElseSucceed(() => Option.none<AbsolutePath>())
  );

const requireHost = (
  settings: SyncSettings,
  environment: "prod" | "dev"
): Effect.Effect<string, SyncError> =>
  Option.match(settings.servers[environment], {
    onNone: () =>
      Effect.fail(
        new SyncError({
          code: ErrorCode.SYNC_FAILED,
          message: `${environment === "prod" ? "PROD_SERVER" : "DEV_SERVER"} is not set`,
        })
      ),
    onSome: (host) => Effect.succeed(host),
  });

const run = (
  command: readonly string[],
  context: string
): Effect.Effect<string, SyncError, CommandExecutor> =>
  Effect.flatMap(CommandExecutor, (executor) =>
    executor.execOutput(command).pipe(Effect.mapError(asSyncError(context)))
  );

const tarDirectory = (
  source: AbsolutePath,
  archive: AbsolutePath
): Effect.Effect<void, SyncError, CommandExecutor> =>
  Effect.asVoid(
    run(
      ["tar", "-cf", archive, "-C", dirname(source), basename(source)],
      `Failed to create tar archive ${archive}`
    )
  );

const removeLater = (
  path: AbsolutePath
): Effect.Effect<void, never, Scope.Scope | FileSystem.FileSystem> =>
  Effect.addFinalizer(() =>
    removeTree(path).pipe(Effect.catchAll((e) => Effect.logWarning(e.message)))
  );

// ============================================================================
// Pull
// ============================================================================

export interface SyncOptions {
  readonly projectDir: AbsolutePath;
  readonly environment?: Env;
}

export interface PullResult {
  readonly environment: Environment;
  readonly dir: AbsolutePath;
  readonly archive: AbsolutePath;
}

/** Remote backup, fetched into `tmpDir`; returns the extracted record directory. */
const fetchRemoteBackup = (
  host: string,
  settings: SyncSettings
): Effect.Effect<AbsolutePath, SyncError, SyncRequirements | Scope.Scope> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const { remote } = settings;

    const remoteTmp = yield* Effect.acquireRelease(
      run(sshArgs(host, "mktemp -d"), `Failed to create temporary directory on ${host}`).pipe(
        Effect.map((out) => out.trim()),
        Effect.filterOrFail(
          (dir) => dir !== "",
          () =>
            new SyncError({
              code: ErrorCode.SYNC_FAILED,
              message: `Failed to create temporary directory on ${host}`,
            })
        )
      ),
      (dir) =>
        executor
          .exec(sshArgs(host, `rm -rf ${shellQuote(dir)}`))
          .pipe(
            Effect.flatMap((r) =>
              r.exitCode === 0 ? Effect.void : Effect.logWarning(`Could not remove ${host}:${dir}`)
            ),
            Effect.catchAll((e) => Effect.logWarning(e.message))
          )
    );

    yield* Effect.logInfo(`Running backup on ${host}`);
    yield* run(
      sshArgs(host, `cd ${shellQuote(remote.projectPath)} && ${remote.backupCommand}`),
      `Failed to run backup on ${host}`
    );

    const remoteRecord = (yield* run(
      sshArgs(
        host,
        `find ${shellQuote(remote.backupsDir)} -maxdepth 1 -type d -name 'backup_*' | sort -r | head -n 1`
      ),
      `Failed to list backups on ${host}`
    )).trim();
    if (remoteRecord === "") {
      return yield* Effect.fail(
        new SyncError({
          code: ErrorCode.SYNC_FAILED,
          message: `No backup found in ${host}:${remote.backupsDir}`,
        })
      );
    }
    yield* Effect.logInfo(`Found remote backup: ${remoteRecord}`);

    const remoteTar = posix.join(remoteTmp, PULL_ARCHIVE);
    yield* run(
      sshArgs(
        host,
        `tar -cf ${shellQuote(remoteTar)} -C ${shellQuote(posix.dirname(remoteRecord))} ${shellQuote(posix.basename(remoteRecord))}`
      ),
      `Failed to create tar archive on ${host}`
    );

    const localTar = pathJoin(settings.tmpDir, PULL_ARCHIVE);
    yield* removeLater(localTar);
    yield* Effect.logInfo(`Downloading backup from ${host}`);
    yield* run(
      ["rsync", "-az", `${host}:${remoteTar}`, `${settings.tmpDir}/`],
      `Failed to download backup from ${host}`
    );
    yield* run(["tar", "-xf", localTar, "-C", settings.tmpDir], "Failed to extract backup locally");

    const extracted = pathJoin(settings.tmpDir, posix.basename(remoteRecord));
    if (!(yield* directoryExists(extracted))) {
      return yield* Effect.fail(
        new SyncError({
          code: ErrorCode.SYNC_FAILED,
          message: `Archive did not contain ${posix.basename(remoteRecord)}`,
        })
      );
    }
    return extracted;
  });

export const pullBackup = (
  environment: Environment,
  options: SyncOptions
): Effect.Effect<
  PullResult,
  SyncError | BackupError | GeneralError | ConfigError,
  SyncRequirements
> =>
  Effect.gen(function* () {
    const backup = yield* loadBackupSettings(options.projectDir, Option.none());
    const settings = yield* loadSyncSettings(options.projectDir, backup.backupsDir);
    const steps = yield* createStepCounter(3);

    yield* requireTools(environment === "local" ? ["tar"] : REMOTE_TOOLS);
    yield* Effect.all([ensureDirectory(settings.syncDir), ensureDirectory(settings.tmpDir)], {
      discard: true,
    }).pipe(Effect.mapError(asSyncError("Failed to prepare sync directories")));

    yield* steps.next(`Pulling backup from ${environment}...`);
    const dir = yield* Effect.scoped(
      Effect.gen(function* () {
        if (environment === "local") {
          const result = yield* runBackup({
            projectDir: options.projectDir,
            backupsDir: Option.none(),
            ...(options.environment !== undefined ? { environment: options.environment } : {}),
          });
          const target = pathJoin(settings.syncDir, environmentRecordName("local", result.record.name));
          yield* failIfPresent(target);
          yield* copyTree(result.record.path, target).pipe(
            Effect.mapError(asSyncError("Failed to copy backup into the sync directory"))
          );
          return target;
        }

        const host = yield* requireHost(settings, environment);
        const extracted = yield* fetchRemoteBackup(host, settings);
        const target = pathJoin(
          settings.syncDir,
          environmentRecordName(environment, basename(extracted))
        );
        yield* failIfPresent(target);
        yield* movePath(extracted, target).pipe(
          Effect.mapError(asSyncError("Failed to move backup into the sync directory"))
        );
        return target;
      })
    );

    yield* steps.next("Archiving backup...");
    const archive = pathJoin(settings.syncDir, `${basename(dir)}.tar`);
    yield* tarDirectory(dir, archive);

    yield* steps.next("Storing references...");
    yield* writeReferences(settings.syncDir, archive, dir);

    yield* logSuccess(`Backup pulled from ${environment}: ${dir}`);
    yield* Effect.logInfo(`Archive: ${archive}`);
    return { environment, dir, archive };
  });

const failIfPresent = (
  target: AbsolutePath
): Effect.Effect<void, SyncError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (yield* pathExists(target)) {
      return yield* Effect.fail(
        new SyncError({ code: ErrorCode.SYNC_FAILED, message: `Already exists: ${target}` })
      );
    }
  });

// ============================================================================
// Push
// ============================================================================

/**
 * Backup to push, by preference: the directory reference, the tar
 * reference (extracted when its directory is gone), the newest
 * `backup_*` in the sync directory.
 */
export const resolvePushSource = (
  syncDir: AbsolutePath
): Effect.Effect<AbsolutePath, SyncError, SyncRequirements> =>
  Effect.gen(function* () {
    const dirRef = yield* readReference(pathJoin(syncDir, DIR_REFERENCE_FILE), syncDir);
    if (Option.isSome(dirRef)) {
      if (yield* directoryExists(dirRef.value)) {
        yield* Effect.logInfo(`Using backup directory from ${DIR_REFERENCE_FILE}: ${dirRef.value}`);
        return dirRef.value;
      }
      yield* Effect.logWarning(`Backup directory in ${DIR_REFERENCE_FILE} not found: ${dirRef.value}`);
    }

    const tarRef = yield* readReference(pathJoin(syncDir, TAR_REFERENCE_FILE), syncDir);
    if (Option.isSome(tarRef)) {
      if (yield* fileExists(tarRef.value)) {
        const dir = pathJoin(syncDir, basename(tarRef.value, ".tar"));
        if (!(yield* directoryExists(dir))) {
          yield* Effect.logInfo(`Extracting ${tarRef.value}`);
          yield* run(
            ["tar", "-xf", tarRef.value, "-C", syncDir],
            "Failed to extract backup from tar file"
          );
        }
        return dir;
      }
      yield* Effect.logWarning(`Backup tar in ${TAR_REFERENCE_FILE} not found: ${tarRef.value}`);
    }

    const latest = yield* findLatestRecordDir(syncDir);
    if (Option.isSome(latest)) {
      return latest.value;
    }
    return yield* Effect.fail(
      new SyncError({
        code: ErrorCode.SYNC_FAILED,
        message: "No backup found. Run 'sync pull prod', 'sync pull dev' or 'sync pull local' first",
      })
    );
  });

export interface PushResult {
  readonly environment: Environment;
  readonly source: AbsolutePath;
  readonly restored: boolean;
}

const pushToRemote = (
  host: string,
  source: AbsolutePath,
  settings: SyncSettings
): Effect.Effect<void, SyncError, SyncRequirements | Scope.Scope> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const { remote } = settings;

    const localTar = pathJoin(settings.syncDir, PUSH_ARCHIVE);
    yield* removeLater(localTar);
    yield* tarDirectory(source, localTar);

    const remoteTar = posix.join(remote.tmpDir, PUSH_ARCHIVE);
    const remoteDir = posix.join(remote.tmpDir, basename(source));
    yield* Effect.addFinalizer(() =>
      executor
        .exec(sshArgs(host, `rm -rf ${shellQuote(remoteTar)} ${shellQuote(remoteDir)}`))
        .pipe(Effect.catchAll((e) => Effect.logWarning(e.message)))
    );

    yield* Effect.logInfo(`Uploading backup to ${host}`);
    yield* run(
      ["rsync", "-az", localTar, `${host}:${remote.tmpDir}/`],
      `Failed to upload backup to ${host}`
    );
    yield* run(
      sshArgs(host, `tar -xf ${shellQuote(remoteTar)} -C ${shellQuote(remote.tmpDir)}`),
      `Failed to extract backup on ${host}`
    );

    yield* Effect.logInfo(`Running restore on ${host}`);
    yield* run(
      sshArgs(
        host,
        `cd ${shellQuote(remote.projectPath)} && ${remote.restoreCommand} ${shellQuote(remoteDir)}`
      ),
      `Failed to run restore on ${host}`
    );
  });

export const pushBackup = (
  environment: Environment,
  options: SyncOptions & { readonly assumeYes: boolean }
): Effect.Effect<
  PushResult,
  SyncError | RestoreError | GeneralError | ConfigError,
  SyncRequirements | Terminal.Terminal
> =>
  Effect.gen(function* () {
    if (environment === "prod") {
      return yield* Effect.fail(
        new SyncError({
          code: ErrorCode.SYNC_FORBIDDEN,
          message: "Pushing to the production environment is not allowed",
        })
      );
    }

    const backup = yield* loadBackupSettings(options.projectDir, Option.none());
    const settings = yield* loadSyncSettings(options.projectDir, backup.backupsDir);
    yield* ensureDirectory(settings.syncDir).pipe(
      Effect.mapError(asSyncError("Failed to prepare sync directory"))
    );

    const source = yield* resolvePushSource(settings.syncDir);
    yield* Effect.logInfo(`Found local backup: ${source}`);

    if (environment === "local") {
      const result = yield* runRestore({
        projectDir: options.projectDir,
        backupPath: source,
        assumeYes: options.assumeYes,
      });
      return { environment, source, restored: result.restored };
    }

    const host = yield* requireHost(settings, environment);
    yield* requireTools(REMOTE_TOOLS);
    const confirmed = yield* confirmRestore(
      `This will overwrite the database and uploads on ${host}. Continue?`,
      options.assumeYes
    );
    if (!confirmed) {
      yield* Effect.logWarning("Push aborted by user");
      return { environment, source, restored: false };
    }

    yield* Effect.scoped(pushToRemote(host, source, settings));
    yield* logSuccess(`Backup pushed and restored on ${environment}`);
    return { environment, source, restored: true };
  });
