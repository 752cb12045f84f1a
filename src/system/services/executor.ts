// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CommandExecutor service. Workflows reach external tools only through this
 * tag, so tests can swap in an in-process implementation.
 */

import { Context, Effect, Layer } from "effect";
import { commandExists, exec, execOutput, execSuccess, execToFile, requireSuccess } from "../exec";

export interface CommandExecutorService {
  readonly exec: typeof exec;
  readonly execSuccess: typeof execSuccess;
  readonly execOutput: typeof execOutput;
  readonly execToFile: typeof execToFile;
  readonly commandExists: typeof commandExists;
}

/** The operations every implementation must supply; the rest derive from them. */
export type ExecutorPrimitives = Pick<
  CommandExecutorService,
  "exec" | "execToFile" | "commandExists"
>;

export interface CommandExecutor {
  readonly _tag: "CommandExecutor";
}

export const CommandExecutor: Context.Tag<CommandExecutor, CommandExecutorService> =
  Context.GenericTag<CommandExecutor, CommandExecutorService>("directus-ops/CommandExecutor");

export const makeCommandExecutor = (primitives: ExecutorPrimitives): CommandExecutorService => {
  const derivedSuccess: typeof execSuccess = (command, options) =>
    requireSuccess(command, primitives.exec(command, options));
  return {
    ...primitives,
    execSuccess: derivedSuccess,
    execOutput: (command, options) =>
      Effect.map(derivedSuccess(command, options), (r) => r.stdout),
  };
};

export const CommandExecutorLive: Layer.Layer<CommandExecutor> = Layer.succeed(CommandExecutor, {
  exec,
  execSuccess,
  execOutput,
  execToFile,
  commandExists,
});
