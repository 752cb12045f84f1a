// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdirSync, symlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  detectDumpArtifact,
  parseRecordName,
  readLatestPointer,
  recordName,
  scanBackupsRoot,
} from "../../src/backup/record";
import { pathJoin } from "../../src/lib/types";
import { runTest } from "../helpers/layers";
import { type TestProject, makeProject } from "../helpers/project";

describe("parseRecordName", () => {
  test("splits date and timestamp", () => {
    expect(parseRecordName("backup_2026-03-01_02-03-04_1772330584")).toEqual(
      Option.some({ formattedDate: "2026-03-01_02-03-04", timestamp: 1_772_330_584 })
    );
  });

  test("rejects names outside the pattern", () => {
    expect(Option.isNone(parseRecordName("backup_latest"))).toBe(true);
    expect(Option.isNone(parseRecordName("backup_2026-03-01_1772330584"))).toBe(true);
    expect(Option.isNone(parseRecordName("temp_job-a0000001"))).toBe(true);
  });

  test("inverts recordName", () => {
    const name = recordName("2026-03-01_02-03-04", 42);
    expect(name).toBe("backup_2026-03-01_02-03-04_42");
    expect(parseRecordName(name)).toEqual(
      Option.some({ formattedDate: "2026-03-01_02-03-04", timestamp: 42 })
    );
  });
});

describe("scanBackupsRoot", () => {
  let project: TestProject;

  beforeEach(() => {
    project = makeProject();
  });

  afterEach(() => {
    project.cleanup();
  });

  test("an absent root scans empty", async () => {
    const scan = await runTest(scanBackupsRoot(project.backupsDir));
    expect(scan).toEqual({ valid: [], invalid: [], staging: [] });
  });

  test("classifies entries and sorts records by timestamp", async () => {
    const root = project.backupsDir;
    const newer = recordName("2026-01-01_00-00-00", 200);
    const older = recordName("2026-06-01_00-00-00", 100);
    mkdirSync(join(root, newer), { recursive: true });
    mkdirSync(join(root, older));
    mkdirSync(join(root, "backup_garbage"));
    mkdirSync(join(root, "temp_job-a0000001"));
    mkdirSync(join(root, "error_logs"));
    writeFileSync(join(root, recordName("2026-01-02_00-00-00", 300)), "a file, not a record");
    symlinkSync(newer, join(root, "backup_latest"));
    symlinkSync(older, join(root, recordName("2026-01-03_00-00-00", 400)));

    const scan = await runTest(scanBackupsRoot(root));

    expect(scan.valid.map((r) => r.name)).toEqual([older, newer]);
    expect(scan.valid.map((r) => r.path)).toEqual([pathJoin(root, older), pathJoin(root, newer)]);
    expect(scan.invalid).toEqual([pathJoin(root, "backup_garbage")]);
    expect(scan.staging).toEqual([pathJoin(root, "temp_job-a0000001")]);
  });

  test("readLatestPointer follows the link to its directory", async () => {
    const root = project.backupsDir;
    const name = recordName("2026-01-01_00-00-00", 1);
    mkdirSync(join(root, name), { recursive: true });
    symlinkSync(name, join(root, "backup_latest"));

    const latest = await runTest(readLatestPointer(root));
    expect(Option.map(latest, (p) => p.endsWith(name))).toEqual(Option.some(true));
  });

  test("a dangling pointer reads as none", async () => {
    mkdirSync(project.backupsDir);
    symlinkSync("backup_gone", join(project.backupsDir, "backup_latest"));

    expect(Option.isNone(await runTest(readLatestPointer(project.backupsDir)))).toBe(true);
  });
});

describe("detectDumpArtifact", () => {
  let project: TestProject;

  beforeEach(() => {
    project = makeProject();
    mkdirSync(project.backupsDir);
  });

  afterEach(() => {
    project.cleanup();
  });

  test("prefers the compressed dump", async () => {
    writeFileSync(join(project.backupsDir, "db_backup.sql"), "raw");
    writeFileSync(join(project.backupsDir, "db_backup.sql.gz"), "gz");

    const artifact = await runTest(detectDumpArtifact(project.backupsDir));
    expect(Option.map(artifact, (a) => a._tag)).toEqual(Option.some("Compressed"));
  });

  test("falls back to the raw dump", async () => {
    writeFileSync(join(project.backupsDir, "db_backup.sql"), "raw");

    const artifact = await runTest(detectDumpArtifact(project.backupsDir));
    expect(Option.map(artifact, (a) => [a._tag, a.path])).toEqual(
      Option.some(["Raw", pathJoin(project.backupsDir, "db_backup.sql")])
    );
  });

  test("none without a dump", async () => {
    expect(Option.isNone(await runTest(detectDumpArtifact(project.backupsDir)))).toBe(true);
  });
});
