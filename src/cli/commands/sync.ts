// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `sync pull <env>` and `sync push <env>`.
 */

import type { FileSystem, Terminal } from "@effect/platform";
import { Effect } from "effect";
import type { Environment, LogFormat } from "../../config/field-values";
import type {
  BackupError,
  ConfigError,
  GeneralError,
  RestoreError,
  SyncError,
} from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import type { AbsolutePath } from "../../lib/types";
import { pullBackup, pushBackup } from "../../sync/workflow";
import type { CommandExecutor } from "../../system/services/executor";

export interface SyncCommandOptions {
  readonly projectDir: AbsolutePath;
  readonly environment: Environment;
  readonly variables: Readonly<Record<string, string | undefined>>;
  readonly format: LogFormat;
}

export const executeSyncPull = (
  options: SyncCommandOptions
): Effect.Effect<
  void,
  SyncError | BackupError | GeneralError | ConfigError,
  CommandExecutor | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const result = yield* pullBackup(options.environment, {
      projectDir: options.projectDir,
      environment: options.variables,
    });
    if (options.format === "json") {
      yield* writeOutput(JSON.stringify(result));
    }
  });

export const executeSyncPush = (
  options: SyncCommandOptions & { readonly assumeYes: boolean }
): Effect.Effect<
  void,
  SyncError | RestoreError | GeneralError | ConfigError,
  CommandExecutor | FileSystem.FileSystem | Terminal.Terminal
> =>
  Effect.gen(function* () {
    const result = yield* pushBackup(options.environment, {
      projectDir: options.projectDir,
      environment: options.variables,
      assumeYes: options.assumeYes,
    });
    if (options.format === "json") {
      yield* writeOutput(JSON.stringify(result));
    }
  });
