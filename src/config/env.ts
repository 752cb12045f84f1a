// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for the tool's own settings.
 *
 * All exports are pure Config values; they are read only at the CLI
 * boundary, under whatever ConfigProvider the command installed.
 */

import {
  Config,
  ConfigError as ConfigFailure,
  ConfigProvider,
  Effect,
  Either,
  Option,
  pipe,
} from "effect";
import { ConfigError, ErrorCode } from "../lib/errors";
import {
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "./field-values";

/** Prefix shared by the tool's own variables (`DIRECTUS_OPS_LOG_LEVEL`, ...). */
export const ENV_NAMESPACE = "DIRECTUS_OPS";

/** Path delimiter for providers built from flat `KEY=value` maps. */
export const ENV_PATH_DELIM = "_";

export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL").pipe(Config.option),
  ENV_NAMESPACE
);

export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT").pipe(Config.option),
  ENV_NAMESPACE
);

/** When true, forces debug logging. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  ENV_NAMESPACE
);

// Blank values

/**
 * `name` as a string, where an empty or whitespace-only value counts as
 * unset, the way `${NAME:-default}` reads it.
 */
export const presentString = (name: string): Config.Config<Option.Option<string>> =>
  Config.string(name).pipe(
    Config.option,
    Config.map(Option.filter((s: string) => s.trim() !== ""))
  );

/** `presentString` with a default for the unset case. */
export const stringOr = (name: string, fallback: string): Config.Config<string> =>
  presentString(name).pipe(Config.map(Option.getOrElse(() => fallback)));

export type NumberKind = "number" | "integer";

const parseNumber = (text: string, kind: NumberKind): Option.Option<number> => {
  const n = Number(text.trim());
  return Number.isFinite(n) && (kind === "number" || Number.isInteger(n))
    ? Option.some(n)
    : Option.none();
};

/** A numeric `name`; blank counts as unset, anything else must parse. */
export const presentNumber = (
  name: string,
  kind: NumberKind = "number"
): Config.Config<Option.Option<number>> =>
  Config.mapOrFail(
    presentString(name),
    (value): Either.Either<Option.Option<number>, ConfigFailure.ConfigError> =>
      Option.match(value, {
        onNone: () => Either.right(Option.none()),
        onSome: (text) =>
          Option.match(parseNumber(text, kind), {
            onNone: () =>
              Either.left(
                ConfigFailure.InvalidData([name], `Expected ${kind} value but received ${text}`)
              ),
            onSome: (n) => Either.right(Option.some(n)),
          }),
      })
  );

/** `presentNumber` with a default for the unset case. */
export const numberOr = (name: string, kind: NumberKind, fallback: number): Config.Config<number> =>
  presentNumber(name, kind).pipe(Config.map(Option.getOrElse(() => fallback)));

export const ProjectDirConfig: Config.Config<Option.Option<string>> = Config.nested(
  presentString("PROJECT_DIR"),
  ENV_NAMESPACE
);

/** Yield a Config, re-tagging Effect's config failure as the tool's ConfigError. */
export const readConfig = <A>(config: Config.Config<A>): Effect.Effect<A, ConfigError> =>
  Effect.mapError(
    config,
    (e) =>
      new ConfigError({
        code: ErrorCode.CONFIG_VALIDATION_ERROR,
        message: `Invalid configuration: ${String(e)}`,
      })
  );

export interface LoggingInputs {
  readonly verbose: boolean;
  readonly debug: boolean;
  readonly cliLevel: Option.Option<LogLevel>;
  readonly envLevel: Option.Option<LogLevel>;
}

/** Priority: --verbose or DEBUG > --log-level > env > default. */
export const resolveLogLevel = (inputs: LoggingInputs): LogLevel =>
  inputs.verbose || inputs.debug
    ? "debug"
    : pipe(
        inputs.cliLevel,
        Option.orElse(() => inputs.envLevel),
        Option.getOrElse((): LogLevel => LOG_LEVEL_DEFAULT)
      );

/**
 * Provider over a plain map, for tests.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ BACKUP_RETENTION_DAYS: "3" });
 * Effect.withConfigProvider(loadBackupSettings(root, Option.none()), provider);
 * ```
 */
export const createTestConfigProvider = (
  values: Readonly<Record<string, string>> = {}
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(new Map(Object.entries(values)), { pathDelim: ENV_PATH_DELIM });
