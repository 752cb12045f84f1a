// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes project resolution,
 * `.env` loading, logger setup and error display so each command only
 * describes its own work.
 */

import { Command } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import type { FileSystem, Terminal } from "@effect/platform";
import { type ConfigProvider, Effect, Match, Option, pipe } from "effect";
import { loadProjectEnvironment } from "../config/dotenv";
import {
  DebugModeConfig,
  LogFormatOptionConfig,
  LogLevelOptionConfig,
  ProjectDirConfig,
  readConfig,
  resolveLogLevel,
} from "../config/env";
import { LOG_FORMAT_DEFAULT, type LogFormat, type LogLevel } from "../config/field-values";
import { AppLoggerLive, detectColor } from "../lib/effect-logger";
import { type AppError, type ConfigError, isAppError } from "../lib/errors";
import { type AbsolutePath, currentDirectory, toAbsolutePath } from "../lib/types";
import { APP_NAME, APP_VERSION } from "../lib/version";
import { type CommandExecutor, CommandExecutorLive } from "../system/services/executor";
import { executeBackup } from "./commands/backup";
import { executeRestore } from "./commands/restore";
import { executeSyncPull, executeSyncPush } from "./commands/sync";
import {
  type GlobalOptions,
  assumeYes,
  backupPathArg,
  backupsDirArg,
  effectiveFormat,
  environmentArg,
  globalOptions,
} from "./options";

/** Resolved per-invocation context. CLI flags > `.env` > process environment. */
interface CommandContext {
  readonly projectDir: AbsolutePath;
  readonly provider: ConfigProvider.ConfigProvider;
  readonly variables: Readonly<Record<string, string | undefined>>;
  readonly format: LogFormat;
  readonly logLevel: LogLevel;
}

type CommandRequirements = CommandExecutor | FileSystem.FileSystem | Terminal.Terminal;

// Context resolution

/** --project-dir, then DIRECTUS_OPS_PROJECT_DIR, then the working directory. */
const resolveProjectDir = (globals: GlobalOptions): Effect.Effect<AbsolutePath, ConfigError> =>
  Effect.gen(function* () {
    const cwd = currentDirectory();
    const fromEnv = yield* readConfig(ProjectDirConfig);
    return pipe(
      globals.projectDir,
      Option.orElse(() => fromEnv),
      Option.match({
        onNone: (): AbsolutePath => cwd,
        onSome: (dir): AbsolutePath => toAbsolutePath(dir, cwd),
      })
    );
  });

const resolveContext = (
  globals: GlobalOptions
): Effect.Effect<CommandContext, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const projectDir = yield* resolveProjectDir(globals);
    const { provider, variables } = yield* loadProjectEnvironment(projectDir);

    const { envLevel, envFormat, debug } = yield* Effect.withConfigProvider(
      Effect.all({
        envLevel: readConfig(LogLevelOptionConfig),
        envFormat: readConfig(LogFormatOptionConfig),
        debug: readConfig(DebugModeConfig),
      }),
      provider
    );

    const logLevel = resolveLogLevel({
      verbose: globals.verbose,
      debug,
      cliLevel: globals.logLevel,
      envLevel,
    });
    const format = pipe(
      effectiveFormat(globals),
      Option.orElse(() => envFormat),
      Option.getOrElse((): LogFormat => LOG_FORMAT_DEFAULT)
    );

    return { projectDir, provider, variables, format, logLevel };
  });

// Error display

/** Sync because it runs on the way out. */
const displayError = (err: unknown, format: LogFormat): void => {
  if (!isAppError(err)) {
    return;
  }
  pipe(
    Match.value(format),
    Match.when("json", () =>
      process.stdout.write(`${JSON.stringify({ error: err.message, code: err.code })}\n`)
    ),
    Match.when("pretty", () => {
      const prefix = detectColor() ? "\x1b[31m✗\x1b[0m" : "✗";
      process.stderr.write(`${prefix} ${err.message}\n`);
    }),
    Match.exhaustive
  );
};

// Command runner

const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, AppError, CommandRequirements>
): Effect.Effect<void, AppError, FileSystem.FileSystem | Terminal.Terminal> =>
  pipe(
    resolveContext(globals),
    Effect.tapError((err) =>
      Effect.sync(() =>
        displayError(err, Option.getOrElse(effectiveFormat(globals), () => LOG_FORMAT_DEFAULT))
      )
    ),
    Effect.flatMap((ctx) =>
      pipe(
        handler(ctx),
        Effect.withLogSpan(`command-${commandName}`),
        Effect.tapError((err) => Effect.sync(() => displayError(err, ctx.format))),
        Effect.withConfigProvider(ctx.provider),
        Effect.provide(CommandExecutorLive),
        Effect.provide(AppLoggerLive({ level: ctx.logLevel, format: ctx.format }))
      )
    )
  );

// Subcommand definitions

const backupCmd = Command.make(
  "backup",
  { ...globalOptions, backupsDir: backupsDirArg },
  (args) =>
    runCommand(args, "backup", (ctx) =>
      executeBackup({
        projectDir: ctx.projectDir,
        backupsDir: args.backupsDir,
        environment: ctx.variables,
        format: ctx.format,
      })
    )
).pipe(Command.withDescription("Back up the database and uploads"));

const restoreCmd = Command.make(
  "restore",
  { ...globalOptions, backupPath: backupPathArg, yes: assumeYes },
  (args) =>
    runCommand(args, "restore", (ctx) =>
      executeRestore({
        projectDir: ctx.projectDir,
        backupPath: args.backupPath,
        assumeYes: args.yes,
        format: ctx.format,
      })
    )
).pipe(Command.withDescription("Restore the database and uploads from a backup"));

const syncPullCmd = Command.make(
  "pull",
  { ...globalOptions, environment: environmentArg },
  (args) =>
    runCommand(args, "sync-pull", (ctx) =>
      executeSyncPull({
        projectDir: ctx.projectDir,
        environment: args.environment,
        variables: ctx.variables,
        format: ctx.format,
      })
    )
).pipe(Command.withDescription("Fetch a fresh backup from an environment"));

const syncPushCmd = Command.make(
  "push",
  { ...globalOptions, environment: environmentArg, yes: assumeYes },
  (args) =>
    runCommand(args, "sync-push", (ctx) =>
      executeSyncPush({
        projectDir: ctx.projectDir,
        environment: args.environment,
        variables: ctx.variables,
        format: ctx.format,
        assumeYes: args.yes,
      })
    )
).pipe(Command.withDescription("Restore the last pulled backup into an environment"));

const syncCmd = Command.make("sync").pipe(
  Command.withDescription("Move backups between environments"),
  Command.withSubcommands([syncPullCmd, syncPushCmd])
);

// Root command

const root = Command.make(APP_NAME).pipe(
  Command.withDescription("Backup, restore and sync for a Directus deployment"),
  Command.withSubcommands([backupCmd, restoreCmd, syncCmd])
);

export const cli: (args: readonly string[]) => Effect.Effect<void, unknown, CliApp.Environment> =
  Command.run(root, {
    name: APP_NAME,
    version: APP_VERSION,
  });
