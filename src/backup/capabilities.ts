// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Tool negotiation. Runs once before any mutation; later stages read the
 * resulting Capabilities instead of probing PATH again.
 */

import { Array as Arr, Effect, Either, pipe } from "effect";
import type { IdGenerator } from "../config/field-values";
import { ErrorCode, GeneralError } from "../lib/errors";
import { CommandExecutor } from "../system/services/executor";

export const CRITICAL_TOOLS = ["docker", "rsync"] as const;
export const OPTIONAL_TOOLS = ["gzip", "bc", "uuidgen", "md5sum"] as const;

export const BACKUP_TOOLS: readonly string[] = [...CRITICAL_TOOLS, ...OPTIONAL_TOOLS];

export interface Capabilities {
  readonly compressionAvailable: boolean;
  /** Without it, fractional retention days are truncated. */
  readonly preciseArithmeticAvailable: boolean;
  readonly idGenerator: IdGenerator;
}

/**
 * Right: the negotiated capabilities. Left: what is missing and cannot be
 * worked around.
 */
export const deriveCapabilities = (
  present: ReadonlySet<string>
): Either.Either<Capabilities, readonly string[]> => {
  const missingCritical = CRITICAL_TOOLS.filter((tool) => !present.has(tool));
  const noIdGenerator = !(present.has("uuidgen") || present.has("md5sum"));
  const missing = noIdGenerator ? [...missingCritical, "uuidgen or md5sum"] : missingCritical;

  const capabilities: Capabilities = {
    compressionAvailable: present.has("gzip"),
    preciseArithmeticAvailable: present.has("bc"),
    idGenerator: present.has("uuidgen") ? "uuid" : "hash",
  };

  return Arr.isNonEmptyReadonlyArray(missing) ? Either.left(missing) : Either.right(capabilities);
};

/** Warnings for each fallback the capabilities imply. */
export const degradations = (capabilities: Capabilities): readonly string[] =>
  [
    capabilities.compressionAvailable
      ? []
      : ["gzip not found: the database dump will be stored uncompressed"],
    capabilities.preciseArithmeticAvailable
      ? []
      : ["bc not found: fractional retention days will be truncated"],
    capabilities.idGenerator === "uuid"
      ? []
      : ["uuidgen not found: job ids will be derived from an md5 of the current time"],
  ].flat();

const findTools = (
  tools: readonly string[]
): Effect.Effect<ReadonlySet<string>, never, CommandExecutor> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const found = yield* Effect.forEach(tools, (tool) =>
      Effect.map(executor.commandExists(tool), (exists) => (exists ? [tool] : []))
    );
    yield* Effect.logDebug(`Available tools: ${found.flat().join(", ") || "none"}`);
    return new Set(found.flat());
  });

const missingError = (missing: readonly string[]): GeneralError =>
  new GeneralError({
    code: ErrorCode.DEPENDENCY_MISSING,
    message: `Missing required commands: ${missing.join(", ")}`,
  });

export const checkBackupTools: Effect.Effect<Capabilities, GeneralError, CommandExecutor> =
  Effect.gen(function* () {
    const present = yield* findTools(BACKUP_TOOLS);
    const capabilities = yield* pipe(
      deriveCapabilities(present),
      Either.mapLeft(missingError)
    );
    yield* Effect.forEach(degradations(capabilities), (warning) => Effect.logWarning(warning), {
      discard: true,
    });
    return capabilities;
  });

/** Fail unless every named tool is on PATH. */
export const requireTools = (
  tools: readonly string[]
): Effect.Effect<void, GeneralError, CommandExecutor> =>
  Effect.gen(function* () {
    const present = yield* findTools(tools);
    const missing = tools.filter((tool) => !present.has(tool));
    if (Arr.isNonEmptyReadonlyArray(missing)) {
      return yield* Effect.fail(missingError(missing));
    }
  });
