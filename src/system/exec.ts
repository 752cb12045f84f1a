// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Command execution through the @effect/platform Command API. Arguments are
 * always structured arrays; nothing is passed through a local shell except
 * the fixed `command -v` lookup.
 *
 * stdin is closed unless input is given, so tools like `ssh` or
 * `docker compose exec` never wait on the terminal.
 */

import { Command, FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Stream, pipe } from "effect";
import {
  ErrorCode,
  GeneralError,
  SystemError,
  extractCauseProps,
  extractMessage,
} from "../lib/errors";
import { displayCommand } from "../lib/redact";

export interface ExecOptions {
  readonly env?: Readonly<Record<string, string>>;
  readonly cwd?: string;
  /** Text fed to stdin. */
  readonly stdin?: string;
  /** File streamed to stdin; takes precedence over `stdin`. */
  readonly stdinFile?: string;
}

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/** Where `execToFile` writes each output stream. */
export interface OutputFiles {
  readonly stdout: string;
  readonly stderr: string;
}

/** Internalizes NodeContext.layer so callers don't carry platform requirements. */
const withExecutor = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Effect.Effect<A, E> => effect.pipe(Effect.provide(NodeContext.layer));

const execError = (command: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_FAILED,
    message: `Failed to execute: ${command}: ${extractMessage(e)}`,
    ...extractCauseProps(e),
  });

interface ValidatedCommand {
  readonly cmd: string;
  readonly args: readonly string[];
}

const validateCommand = (
  command: readonly string[]
): Effect.Effect<ValidatedCommand, GeneralError> =>
  pipe(
    Effect.succeed(command),
    Effect.filterOrFail(
      (c): c is readonly [string, ...string[]] => c.length > 0 && c[0] !== undefined && c[0] !== "",
      () =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: "Command array cannot be empty",
        })
    ),
    Effect.map(([cmd, ...args]): ValidatedCommand => ({ cmd, args }))
  );

const configure = (
  base: Command.Command,
  options: ExecOptions,
  fs: FileSystem.FileSystem
): Command.Command =>
  pipe(
    base,
    (c) => (options.env !== undefined ? Command.env(c, options.env) : c),
    (c) => (options.cwd !== undefined ? Command.workingDirectory(c, options.cwd) : c),
    (c) =>
      options.stdinFile !== undefined
        ? Command.stdin(c, fs.stream(options.stdinFile))
        : Command.feed(c, options.stdin ?? "")
  );

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

export const exec = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const { cmd, args } = yield* validateCommand(command);
    const commandStr = displayCommand(command);

    return yield* withExecutor(
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const proc = yield* Command.start(configure(Command.make(cmd, ...args), options, fs));

        const [exitCode, stdout, stderr] = yield* Effect.all(
          [proc.exitCode, streamToString(proc.stdout), streamToString(proc.stderr)],
          { concurrency: 3 }
        );

        return { exitCode, stdout, stderr };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(commandStr, e)));
  });

/**
 * Run a command with stdout and stderr streamed into files, for outputs too
 * large to hold in memory (database dumps, compressed archives).
 * Returns the exit code; a non-zero exit is not a failure here.
 */
export const execToFile = (
  command: readonly string[],
  output: OutputFiles,
  options: ExecOptions = {}
): Effect.Effect<number, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const { cmd, args } = yield* validateCommand(command);
    const commandStr = displayCommand(command);

    return yield* withExecutor(
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const proc = yield* Command.start(configure(Command.make(cmd, ...args), options, fs));

        const [exitCode] = yield* Effect.all(
          [
            proc.exitCode,
            Stream.run(proc.stdout, fs.sink(output.stdout)),
            Stream.run(proc.stderr, fs.sink(output.stderr)),
          ],
          { concurrency: 3 }
        );

        return exitCode;
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(commandStr, e)));
  });

/** Turn a non-zero exit into a SystemError carrying trimmed stderr. */
export const requireSuccess = <E>(
  command: readonly string[],
  effect: Effect.Effect<ExecResult, E>
): Effect.Effect<ExecResult, E | SystemError> =>
  pipe(
    effect,
    Effect.filterOrFail(
      (result): result is ExecResult => result.exitCode === 0,
      (result) => {
        const stderr = result.stderr.trim();
        return new SystemError({
          code: ErrorCode.EXEC_FAILED,
          message: `Command failed with exit code ${result.exitCode}: ${displayCommand(command)}${stderr ? `\n${stderr}` : ""}`,
        });
      }
    )
  );

/** Fails if exit code is non-zero. Use exec() when exit code matters but isn't fatal. */
export const execSuccess = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  requireSuccess(command, exec(command, options));

export const execOutput = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<string, SystemError | GeneralError> =>
  Effect.map(execSuccess(command, options), (r) => r.stdout);

/** PATH lookup through the POSIX `command -v` builtin. */
export const commandExists = (name: string): Effect.Effect<boolean> =>
  pipe(
    exec(["sh", "-c", 'command -v "$1" >/dev/null 2>&1', "sh", name]),
    Effect.map((r) => r.exitCode === 0),
    Effect.orElseSucceed(() => false)
  );
