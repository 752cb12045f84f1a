// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { FileSystem, Terminal } from "@effect/platform";
import { Effect } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { ConfigError, GeneralError, RestoreError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import type { AbsolutePath } from "../../lib/types";
import { runRestore } from "../../restore/workflow";
import type { CommandExecutor } from "../../system/services/executor";

export interface RestoreCommandOptions {
  readonly projectDir: AbsolutePath;
  readonly backupPath: string;
  readonly assumeYes: boolean;
  readonly format: LogFormat;
}

export const executeRestore = (
  options: RestoreCommandOptions
): Effect.Effect<
  void,
  RestoreError | GeneralError | ConfigError,
  CommandExecutor | FileSystem.FileSystem | Terminal.Terminal
> =>
  Effect.gen(function* () {
    const result = yield* runRestore({
      projectDir: options.projectDir,
      backupPath: options.backupPath,
      assumeYes: options.assumeYes,
    });
    if (options.format === "json") {
      yield* writeOutput(JSON.stringify({ source: result.source, restored: result.restored }));
    }
  });
