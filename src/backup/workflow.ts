// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The backup job: tools, workspace, dump, uploads, compression,
 * finalization, pruning. The workspace stage owns staging; its release
 * writes the error record whenever the job does not succeed.
 */

import type { FileSystem } from "@effect/platform";
import { Clock, Effect, Option } from "effect";
import {
  type BackupSettings,
  type ComposeSettings,
  type DatabaseCredentials,
  loadBackupSettings,
  loadComposeSettings,
  loadDatabaseCredentials,
  missingCredentials,
} from "../config/backup";
import type { BackupError, ConfigError, GeneralError } from "../lib/errors";
import { formatBackupDate, formatBytes, unixSeconds } from "../lib/format";
import { type JobJournal, makeJobJournal } from "../lib/journal";
import { logSuccess } from "../lib/log";
import type { AbsolutePath, JobId } from "../lib/types";
import { fileSize } from "../system/fs";
import type { CommandExecutor } from "../system/services/executor";
import { type Capabilities, checkBackupTools } from "./capabilities";
import { compressDump } from "./compress";
import { recordFailure } from "./diagnostics";
import { produceDump } from "./dump";
import { type FinalizedRecord, finalizeBackup } from "./finalize";
import { type Job, createWorkspace, generateJobId, validateSource } from "./job";
import { Outcome, Stage, pipeline } from "./pipeline";
import type { BackupRecord, DumpArtifact } from "./record";
import { type PruneSummary, pruneBackups } from "./retention";
import { type UploadsSnapshot, syncUploads } from "./uploads";

type Env = Readonly<Record<string, string | undefined>>;

export interface BackupInput {
  readonly projectDir: AbsolutePath;
  readonly settings: BackupSettings;
  readonly compose: ComposeSettings;
  readonly credentials: DatabaseCredentials;
  readonly startedAt: Date;
  readonly journal: JobJournal;
  /** Snapshot source for error records. */
  readonly environment: Env;
}

interface WithCapabilities {
  readonly capabilities: Capabilities;
}
interface WithJob {
  readonly job: Job;
}
interface WithDump {
  readonly dumpPath: AbsolutePath;
}
interface WithUploads {
  readonly uploads: UploadsSnapshot;
}
interface WithArtifact {
  readonly artifact: DumpArtifact;
}
interface WithRecord {
  readonly finalized: FinalizedRecord;
}
interface WithPrune {
  readonly prune: PruneSummary;
}

// ============================================================================
// Stages
// ============================================================================

const checkToolsStage: Stage<BackupInput, WithCapabilities, GeneralError, CommandExecutor> =
  Stage.pure("Checking required tools...", (input: BackupInput) =>
    Effect.gen(function* () {
      const capabilities = yield* checkBackupTools;
      const missing = missingCredentials(input.credentials);
      if (missing.length > 0) {
        yield* Effect.logWarning(`Database variables not set: ${missing.join(", ")}`);
      }
      return { capabilities };
    })
  );

const workspaceStage: Stage<
  BackupInput & WithCapabilities,
  WithJob,
  BackupError,
  CommandExecutor | FileSystem.FileSystem
> = Stage.resource(
  "Creating job workspace...",
  (state: BackupInput & WithCapabilities) =>
    Effect.gen(function* () {
      yield* validateSource(state.settings.uploadsDir);
      const id = yield* generateJobId(state.capabilities.idGenerator);
      const job = yield* createWorkspace(state.settings.backupsDir, id, state.startedAt);
      return { job };
    }),
  (state, outcome) =>
    Outcome.match(outcome, {
      onSuccess: () => Effect.void,
      onFailure: (reason) =>
        Effect.gen(function* () {
          const journal = yield* state.journal.lines;
          const at = new Date(yield* Clock.currentTimeMillis);
          yield* recordFailure({
            job: state.job,
            errorDir: state.settings.errorDir,
            journal,
            environment: state.environment,
            reason,
            at,
          });
        }),
    })
);

const dumpStage: Stage<
  BackupInput & WithJob,
  WithDump,
  BackupError,
  CommandExecutor | FileSystem.FileSystem
> = Stage.pure("Dumping database...", (state: BackupInput & WithJob) =>
  Effect.map(
    produceDump(state.job.stagingPath, state.projectDir, state.compose, state.credentials),
    (dumpPath) => ({ dumpPath })
  )
);

const uploadsStage: Stage<
  BackupInput & WithJob,
  WithUploads,
  BackupError,
  CommandExecutor | FileSystem.FileSystem
> = Stage.pure("Copying uploads...", (state: BackupInput & WithJob) =>
  Effect.map(
    syncUploads(state.settings.uploadsDir, state.job.stagingPath, state.settings.backupsDir),
    (uploads) => ({ uploads })
  )
);

const compressStage: Stage<
  BackupInput & WithCapabilities & WithJob & WithDump,
  WithArtifact,
  never,
  CommandExecutor | FileSystem.FileSystem
> = Stage.pure(
  "Compressing database dump...",
  (state: BackupInput & WithCapabilities & WithJob & WithDump) =>
    Effect.map(
      compressDump(
        state.dumpPath,
        state.job.stagingPath,
        state.settings.gzipLevel,
        state.capabilities.compressionAvailable
      ),
      (artifact) => ({ artifact })
    )
);

const finalizeStage: Stage<
  BackupInput & WithJob & WithArtifact,
  WithRecord,
  BackupError,
  FileSystem.FileSystem
> = Stage.pure("Finalizing backup...", (state: BackupInput & WithJob & WithArtifact) =>
  Effect.map(
    finalizeBackup({
      job: state.job,
      backupsDir: state.settings.backupsDir,
      artifact: state.artifact,
      formattedDate: Option.getOrElse(state.settings.formattedDate, () =>
        formatBackupDate(state.startedAt)
      ),
      timestamp: Option.getOrElse(state.settings.timestamp, () => unixSeconds(state.startedAt)),
    }),
    (finalized) => ({ finalized })
  )
);

const pruneStage: Stage<BackupInput & WithCapabilities, WithPrune, never, FileSystem.FileSystem> =
  Stage.pure("Pruning old backups...", (state: BackupInput & WithCapabilities) =>
    Effect.gen(function* () {
      const now = new Date(yield* Clock.currentTimeMillis);
      const prune = yield* pruneBackups({
        backupsDir: state.settings.backupsDir,
        errorDir: state.settings.errorDir,
        retention: state.settings.retention,
        errorLogRetentionDays: state.settings.errorLogRetentionDays,
        preciseArithmetic: state.capabilities.preciseArithmeticAvailable,
        now,
      });
      return { prune };
    })
  );

export const backupPipeline = pipeline<BackupInput>()
  .andThen(checkToolsStage)
  .andThen(workspaceStage)
  .andThen(dumpStage)
  .andThen(uploadsStage)
  .andThen(compressStage)
  .andThen(finalizeStage)
  .andThen(pruneStage);

// ============================================================================
// Entry
// ============================================================================

export interface BackupOptions {
  readonly projectDir: AbsolutePath;
  /** Positional override of the backups root. */
  readonly backupsDir: Option.Option<string>;
  readonly environment?: Env;
}

export interface BackupResult {
  readonly jobId: JobId;
  readonly record: BackupRecord;
  readonly artifact: DumpArtifact;
  readonly incremental: boolean;
  readonly prune: PruneSummary;
}

export const runBackup = (
  options: BackupOptions
): Effect.Effect<
  BackupResult,
  BackupError | GeneralError | ConfigError,
  CommandExecutor | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const settings = yield* loadBackupSettings(options.projectDir, options.backupsDir);
    const compose = yield* loadComposeSettings;
    const credentials = yield* loadDatabaseCredentials;
    const journal = yield* makeJobJournal;
    const startedAt = new Date(yield* Clock.currentTimeMillis);

    yield* Effect.logInfo(`Backing up into ${settings.backupsDir}`);

    const final = yield* backupPipeline
      .execute({
        projectDir: options.projectDir,
        settings,
        compose,
        credentials,
        startedAt,
        journal,
        environment: options.environment ?? process.env,
      })
      .pipe(Effect.provide(journal.layer));

    const { record, artifact } = final.finalized;
    const size = yield* fileSize(artifact.path).pipe(Effect.orElseSucceed(() => 0));
    yield* logSuccess(`Backup completed: ${record.path} (dump ${formatBytes(size)})`);

    return {
      jobId: final.job.id,
      record,
      artifact,
      incremental: final.uploads.incremental,
      prune: final.prune,
    };
  });
