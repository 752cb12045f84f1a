// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `backup [backups-dir]`: run one backup job and report the record.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Match, type Option, pipe } from "effect";
import { type BackupResult, runBackup } from "../../backup/workflow";
import type { LogFormat } from "../../config/field-values";
import type { BackupError, ConfigError, GeneralError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import type { AbsolutePath } from "../../lib/types";
import type { CommandExecutor } from "../../system/services/executor";

export interface BackupCommandOptions {
  readonly projectDir: AbsolutePath;
  readonly backupsDir: Option.Option<string>;
  readonly environment: Readonly<Record<string, string | undefined>>;
  readonly format: LogFormat;
}

const pruneTotal = (result: BackupResult): number =>
  result.prune.aged + result.prune.excess + result.prune.invalid + result.prune.staging;

export const executeBackup = (
  options: BackupCommandOptions
): Effect.Effect<
  void,
  BackupError | GeneralError | ConfigError,
  CommandExecutor | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const result = yield* runBackup({
      projectDir: options.projectDir,
      backupsDir: options.backupsDir,
      environment: options.environment,
    });

    yield* pipe(
      Match.value(options.format),
      Match.when("json", () =>
        writeOutput(
          JSON.stringify({
            jobId: result.jobId,
            path: result.record.path,
            timestamp: result.record.timestamp,
            compressed: result.artifact._tag === "Compressed",
            incremental: result.incremental,
            pruned: result.prune,
          })
        )
      ),
      Match.when("pretty", () =>
        Effect.all(
          [
            Effect.logInfo(`Job: ${result.jobId}`),
            Effect.logInfo(
              result.incremental ? "Uploads: incremental (hardlinked)" : "Uploads: full copy"
            ),
            Effect.logInfo(`Pruned: ${pruneTotal(result)} backup(s)`),
          ],
          { discard: true }
        )
      ),
      Match.exhaustive
    );
  });
