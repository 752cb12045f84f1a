// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Project `.env` support. Values in the file shadow the process
 * environment, the same precedence a sourced env file would have.
 */

import { FileSystem } from "@effect/platform";
import { parse } from "dotenv";
import { ConfigProvider, Effect } from "effect";
import { ConfigError, ErrorCode, extractCauseProps } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { ENV_PATH_DELIM } from "./env";

export const DOTENV_FILE = ".env";

export const parseDotenv = (content: string): ReadonlyMap<string, string> =>
  new Map(Object.entries(parse(content)));

export const providerFromDotenv = (
  values: ReadonlyMap<string, string>
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(new Map(values), { pathDelim: ENV_PATH_DELIM }).pipe(
    ConfigProvider.orElse(() => ConfigProvider.fromEnv())
  );

/** What a command runs under: the config provider and the merged variables. */
export interface ProjectEnvironment {
  readonly provider: ConfigProvider.ConfigProvider;
  /** Process environment overlaid with `.env`; snapshot source for error records. */
  readonly variables: Readonly<Record<string, string | undefined>>;
}

const readDotenv = (
  envFile: AbsolutePath
): Effect.Effect<ReadonlyMap<string, string>, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const present = yield* fs.exists(envFile).pipe(Effect.orElseSucceed(() => false));
    if (!present) {
      yield* Effect.logDebug(`No ${envFile}; using process environment`);
      return new Map<string, string>();
    }

    const content = yield* fs.readFileString(envFile).pipe(
      Effect.mapError(
        (e) =>
          new ConfigError({
            code: ErrorCode.CONFIG_PARSE_ERROR,
            message: `Failed to read ${envFile}: ${e.message}`,
            ...extractCauseProps(e),
          })
      )
    );
    yield* Effect.logDebug(`Loaded ${envFile}`);
    return parseDotenv(content);
  });

export const loadProjectEnvironment = (
  projectDir: AbsolutePath,
  processEnv: Readonly<Record<string, string | undefined>> = process.env
): Effect.Effect<ProjectEnvironment, ConfigError, FileSystem.FileSystem> =>
  Effect.map(readDotenv(pathJoin(projectDir, DOTENV_FILE)), (values) => ({
    provider: values.size === 0 ? ConfigProvider.fromEnv() : providerFromDotenv(values),
    variables: { ...processEnv, ...Object.fromEntries(values) },
  }));
