// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Shared CLI option definitions, spread into every command so flags read
 * the same everywhere.
 */

import { Args as A, Options as O } from "@effect/cli";
import type { Args } from "@effect/cli/Args";
import type { Options } from "@effect/cli/Options";
import { Match, Option, pipe } from "effect";
import {
  ENVIRONMENT_VALUES,
  type Environment,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "../config/field-values";

// Positional arguments

export const backupsDirArg: Args<Option.Option<string>> = A.text({ name: "backups-dir" }).pipe(
  A.withDescription("Backups root (overrides BACKUPS_DIR)"),
  A.optional
);

export const backupPathArg: Args<string> = A.text({ name: "backup-path" }).pipe(
  A.withDescription("Backup record directory (backup_latest works)")
);

export const environmentArg: Args<Environment> = A.choice(
  ENVIRONMENT_VALUES.map((env): [string, Environment] => [env, env]),
  { name: "environment" }
).pipe(A.withDescription("prod, dev or local"));

// Global options

export const globalOptions: {
  readonly projectDir: Options<Option.Option<string>>;
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly format: Options<Option.Option<LogFormat>>;
  readonly json: Options<boolean>;
} = {
  projectDir: O.directory("project-dir").pipe(
    O.withAlias("C"),
    O.withDescription("Project directory holding .env and the compose file"),
    O.optional
  ),
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
};

// Per-command options

export const assumeYes: Options<boolean> = O.boolean("yes").pipe(
  O.withAlias("y"),
  O.withDescription("Do not ask for confirmation")
);

export interface GlobalOptions {
  readonly projectDir: Option.Option<string>;
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
}

/** --json wins over --format. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );
