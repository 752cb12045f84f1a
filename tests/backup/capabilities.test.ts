// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Either, Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  checkBackupTools,
  degradations,
  deriveCapabilities,
  requireTools,
} from "../../src/backup/capabilities";
import { fakeTools } from "../helpers/executor";
import { failureOf, runTest, runTestExit } from "../helpers/layers";

const ALL = ["docker", "rsync", "gzip", "bc", "uuidgen", "md5sum"];
const without = (...names: string[]): ReadonlySet<string> =>
  new Set(ALL.filter((tool) => !names.includes(tool)));

describe("deriveCapabilities", () => {
  test("everything present", () => {
    expect(deriveCapabilities(without())).toEqual(
      Either.right({
        compressionAvailable: true,
        preciseArithmeticAvailable: true,
        idGenerator: "uuid",
      })
    );
  });

  test("optional tools degrade instead of failing", () => {
    expect(deriveCapabilities(without("gzip", "bc", "uuidgen"))).toEqual(
      Either.right({
        compressionAvailable: false,
        preciseArithmeticAvailable: false,
        idGenerator: "hash",
      })
    );
  });

  test("critical tools and a missing id generator are reported together", () => {
    expect(deriveCapabilities(without("rsync", "uuidgen", "md5sum"))).toEqual(
      Either.left(["rsync", "uuidgen or md5sum"])
    );
  });
});

describe("degradations", () => {
  test("none at full capability", () => {
    expect(
      degradations({ compressionAvailable: true, preciseArithmeticAvailable: true, idGenerator: "uuid" })
    ).toEqual([]);
  });

  test("one warning per fallback", () => {
    expect(
      degradations({ compressionAvailable: false, preciseArithmeticAvailable: true, idGenerator: "hash" })
    ).toEqual([
      "gzip not found: the database dump will be stored uncompressed",
      "uuidgen not found: job ids will be derived from an md5 of the current time",
    ]);
  });
});

describe("checkBackupTools", () => {
  test("looks tools up through the executor", async () => {
    const tools = fakeTools({ missing: ["bc"] });
    const capabilities = await runTest(checkBackupTools.pipe(Effect.provide(tools.layer)));
    expect(capabilities.preciseArithmeticAvailable).toBe(false);
    expect(capabilities.compressionAvailable).toBe(true);
  });
});

describe("requireTools", () => {
  test("names every missing tool", async () => {
    const tools = fakeTools({ missing: ["ssh", "tar"] });
    const exit = await runTestExit(
      requireTools(["ssh", "rsync", "tar"]).pipe(Effect.provide(tools.layer))
    );
    expect(Option.map(failureOf(exit), (e) => e.message)).toEqual(
      Option.some("Missing required commands: ssh, tar")
    );
  });
});
