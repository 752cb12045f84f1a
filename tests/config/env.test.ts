// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Config, Effect, Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  DebugModeConfig,
  type LoggingInputs,
  LogLevelOptionConfig,
  ProjectDirConfig,
  createTestConfigProvider,
  readConfig,
  resolveLogLevel,
} from "../../src/config/env";
import type { LogLevel } from "../../src/config/field-values";
import { failureOf } from "../helpers/layers";

const read = <A>(config: Config.Config<A>, values: Readonly<Record<string, string>>) =>
  Effect.runPromiseExit(
    Effect.withConfigProvider(readConfig(config), createTestConfigProvider(values))
  );

describe("resolveLogLevel", () => {
  const base: LoggingInputs = {
    verbose: false,
    debug: false,
    cliLevel: Option.none(),
    envLevel: Option.none(),
  };

  test("defaults to info", () => {
    expect(resolveLogLevel(base)).toBe("info");
  });

  test("the environment level applies without a flag", () => {
    expect(resolveLogLevel({ ...base, envLevel: Option.some<LogLevel>("warn") })).toBe("warn");
  });

  test("--log-level wins over the environment", () => {
    expect(
      resolveLogLevel({
        ...base,
        cliLevel: Option.some<LogLevel>("error"),
        envLevel: Option.some<LogLevel>("warn"),
      })
    ).toBe("error");
  });

  test("--verbose and DEBUG force debug", () => {
    expect(
      resolveLogLevel({ ...base, verbose: true, cliLevel: Option.some<LogLevel>("error") })
    ).toBe("debug");
    expect(resolveLogLevel({ ...base, debug: true })).toBe("debug");
  });
});

describe("namespaced settings", () => {
  test("read under the DIRECTUS_OPS prefix", async () => {
    const exit = await read(Config.all([LogLevelOptionConfig, DebugModeConfig, ProjectDirConfig]), {
      DIRECTUS_OPS_LOG_LEVEL: "warn",
      DIRECTUS_OPS_DEBUG: "true",
      DIRECTUS_OPS_PROJECT_DIR: "/srv/app",
    });

    expect(exit._tag).toBe("Success");
    if (exit._tag === "Success") {
      expect(exit.value).toEqual([Option.some("warn"), true, Option.some("/srv/app")]);
    }
  });

  test("unset values are none", async () => {
    const exit = await read(LogLevelOptionConfig, {});
    expect(exit._tag === "Success" && Option.isNone(exit.value)).toBe(true);
  });

  test("an unknown level is a config error", async () => {
    const exit = await read(LogLevelOptionConfig, { DIRECTUS_OPS_LOG_LEVEL: "loud" });
    const error = failureOf(exit);

    expect(Option.map(error, (e) => e._tag)).toEqual(Option.some("ConfigError"));
    expect(Option.map(error, (e) => e.code)).toEqual(Option.some(12));
  });
});
