// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  readlinkSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";
import { Effect, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { runBackup } from "../../src/backup/workflow";
import { loadProjectEnvironment } from "../../src/config/dotenv";
import { DEFAULT_DUMP, RSYNC_FAILURE, fakeTools } from "../helpers/executor";
import { failureOf, runTest } from "../helpers/layers";
import {
  type TestProject,
  makeProject,
  runWithTools,
  runWithToolsExit,
  stampedAt,
} from "../helpers/project";

const entries = (dir: string, prefix: string): readonly string[] =>
  existsSync(dir) ? readdirSync(dir).filter((name) => name.startsWith(prefix)) : [];

describe("runBackup", () => {
  let project: TestProject;

  beforeEach(() => {
    project = makeProject();
  });

  afterEach(() => {
    project.cleanup();
  });

  const backup = (environment: Readonly<Record<string, string>> = {}) =>
    runBackup({ projectDir: project.root, backupsDir: Option.none(), environment });

  test("produces a compressed record and points backup_latest at it", async () => {
    const stamp = stampedAt(60);
    const result = await runWithTools(backup(), fakeTools(), project.config(stamp));

    expect(result.jobId).toBe("job-a0000001");
    expect(result.record.name).toBe(
      `backup_${stamp["BACKUP_FORMATTED_DATE"]}_${stamp["BACKUP_TIMESTAMP"]}`
    );
    expect(result.artifact._tag).toBe("Compressed");
    expect(result.incremental).toBe(false);

    const dump = gunzipSync(readFileSync(join(result.record.path, "db_backup.sql.gz")));
    expect(dump.toString("utf-8")).toBe(DEFAULT_DUMP);
    expect(existsSync(join(result.record.path, "db_backup.sql"))).toBe(false);
    expect(readFileSync(join(result.record.path, "uploads", "logo.png"), "utf-8")).toBe(
      "not really a png"
    );
    expect(
      readFileSync(join(result.record.path, "uploads", "originals", "report.pdf"), "utf-8")
    ).toBe("quarterly numbers");

    expect(readlinkSync(join(project.backupsDir, "backup_latest"))).toBe(result.record.name);
    expect(entries(project.backupsDir, "temp_")).toEqual([]);
  });

  test("a second run hardlinks unchanged uploads against the first", async () => {
    const tools = fakeTools();
    const first = await runWithTools(backup(), tools, project.config(stampedAt(60)));
    const second = await runWithTools(backup(), tools, project.config(stampedAt(30)));

    expect(second.jobId).toBe("job-a0000002");
    expect(second.incremental).toBe(true);
    expect(statSync(join(second.record.path, "uploads", "logo.png")).ino).toBe(
      statSync(join(first.record.path, "uploads", "logo.png")).ino
    );
    expect(readlinkSync(join(project.backupsDir, "backup_latest"))).toBe(second.record.name);
    expect(entries(project.backupsDir, "backup_2")).toHaveLength(2);
  });

  test("an empty dump fails the job and leaves an error record instead", async () => {
    const exit = await runWithToolsExit(
      backup({ DB_USER: "directus", DB_PASSWORD: "test-secret" }),
      fakeTools({ dump: "" }),
      project.config(stampedAt(60))
    );

    const error = Option.getOrThrow(failureOf(exit));
    expect(error._tag).toBe("BackupError");
    expect(error.code).toBe(53);

    expect(entries(project.backupsDir, "backup_")).toEqual([]);
    expect(entries(project.backupsDir, "temp_")).toEqual([]);

    const errorDir = join(project.backupsDir, "error_logs");
    const records = readdirSync(errorDir);
    expect(records).toHaveLength(1);
    const [record = ""] = records;
    expect(record).toMatch(/^error_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}_job-a0000001$/);

    expect(readFileSync(join(errorDir, record, "environment.txt"), "utf-8")).toBe(
      "DB_PASSWORD=********\nDB_USER=directus\n"
    );
    const journal = readFileSync(join(errorDir, record, "error.log"), "utf-8").trimEnd().split("\n");
    const dumpPath = join(project.backupsDir, "temp_job-a0000001", "db_backup.sql");
    expect(journal[journal.length - 1]).toBe(
      `Job job-a0000001 failed: Database dump is empty or invalid: ${dumpPath} is 0 bytes`
    );
    expect(existsSync(join(errorDir, record, "db_error.log"))).toBe(true);
  });

  test("a run after a failed one succeeds", async () => {
    await runWithToolsExit(backup(), fakeTools({ dump: "" }), project.config(stampedAt(60)));
    const result = await runWithTools(backup(), fakeTools(), project.config(stampedAt(30)));

    expect(existsSync(result.record.path)).toBe(true);
    expect(entries(project.backupsDir, "backup_2")).toEqual([result.record.name]);
  });

  test("a failing pg_dump is reported with its exit code", async () => {
    const exit = await runWithToolsExit(
      backup(),
      fakeTools({ dumpExitCode: 1 }),
      project.config(stampedAt(60))
    );

    const error = Option.getOrThrow(failureOf(exit));
    expect(error.code).toBe(53);
    expect(error.message).toBe(
      "Database dump is empty or invalid: pg_dump exited with code 1: pg_dump: error: connection to server failed"
    );
  });

  test("keeps the raw dump when gzip is missing", async () => {
    const result = await runWithTools(
      backup(),
      fakeTools({ missing: ["gzip"] }),
      project.config(stampedAt(60))
    );

    expect(result.artifact._tag).toBe("Raw");
    expect(readFileSync(join(result.record.path, "db_backup.sql"), "utf-8")).toBe(DEFAULT_DUMP);
    expect(existsSync(join(result.record.path, "db_backup.sql.gz"))).toBe(false);
  });

  test("keeps the raw dump when gzip fails", async () => {
    const result = await runWithTools(
      backup(),
      fakeTools({ gzipExitCode: 1 }),
      project.config(stampedAt(60))
    );

    expect(result.artifact._tag).toBe("Raw");
    expect(readdirSync(result.record.path).sort()).toEqual(["db_backup.sql", "uploads"]);
  });

  test("derives the job id from md5sum without uuidgen", async () => {
    const result = await runWithTools(
      backup(),
      fakeTools({ missing: ["uuidgen"] }),
      project.config(stampedAt(60))
    );

    expect(result.jobId).toMatch(/^job-[0-9a-f]{8}$/);
  });

  test("a failing rsync fails the job and keeps its error log", async () => {
    const exit = await runWithToolsExit(
      backup(),
      fakeTools({ rsyncExitCode: 11 }),
      project.config(stampedAt(60))
    );

    const error = Option.getOrThrow(failureOf(exit));
    expect(error._tag).toBe("BackupError");
    expect(error.code).toBe(50);
    expect(error.message).toBe(`rsync exited with code 11: ${RSYNC_FAILURE}`);

    expect(entries(project.backupsDir, "backup_")).toEqual([]);
    expect(entries(project.backupsDir, "temp_")).toEqual([]);
    const errorDir = join(project.backupsDir, "error_logs");
    const [record = ""] = readdirSync(errorDir);
    expect(readFileSync(join(errorDir, record, "rsync_error.log"), "utf-8")).toBe(RSYNC_FAILURE);
  });

  test("an existing record with the same name fails finalization", async () => {
    const tools = fakeTools();
    const stamp = stampedAt(60);
    const first = await runWithTools(backup(), tools, project.config(stamp));
    const exit = await runWithToolsExit(backup(), tools, project.config(stamp));

    const error = Option.getOrThrow(failureOf(exit));
    expect(error.code).toBe(54);
    expect(error.message).toBe(`Backup record already exists: ${first.record.path}`);
    expect(readlinkSync(join(project.backupsDir, "backup_latest"))).toBe(first.record.name);
    expect(entries(project.backupsDir, "temp_")).toEqual([]);
    const [record = ""] = readdirSync(join(project.backupsDir, "error_logs"));
    expect(record.endsWith("_job-a0000002")).toBe(true);
  });

  test("a failed pointer update leaves no record and the old pointer in place", async () => {
    const pointer = join(project.backupsDir, "backup_latest");
    mkdirSync(pointer, { recursive: true });
    writeFileSync(join(pointer, "keep.txt"), "previous pointer");

    const exit = await runWithToolsExit(backup(), fakeTools(), project.config(stampedAt(60)));

    const error = Option.getOrThrow(failureOf(exit));
    expect(error._tag).toBe("BackupError");
    expect(error.code).toBe(54);

    expect(entries(project.backupsDir, "backup_2")).toEqual([]);
    expect(entries(project.backupsDir, "temp_")).toEqual([]);
    expect(readFileSync(join(pointer, "keep.txt"), "utf-8")).toBe("previous pointer");
    const errorDir = join(project.backupsDir, "error_logs");
    expect(readdirSync(errorDir)).toHaveLength(1);
  });

  test("a missing uploads tree fails before anything is created", async () => {
    const exit = await runWithToolsExit(
      backup(),
      fakeTools(),
      project.config({ ...stampedAt(60), BACKUP_UPLOADS_DIR: join(project.root, "absent") })
    );

    const error = Option.getOrThrow(failureOf(exit));
    expect(error._tag).toBe("BackupError");
    expect(error.code).toBe(50);
    expect(existsSync(project.backupsDir)).toBe(false);
  });

  test("a missing critical tool fails with a dependency error", async () => {
    const exit = await runWithToolsExit(
      backup(),
      fakeTools({ missing: ["docker"] }),
      project.config(stampedAt(60))
    );

    const error = Option.getOrThrow(failureOf(exit));
    expect(error._tag).toBe("GeneralError");
    expect(error.code).toBe(4);
    expect(error.message).toBe("Missing required commands: docker");
  });

  test("the positional backups root wins over BACKUPS_DIR", async () => {
    const result = await runWithTools(
      runBackup({ projectDir: project.root, backupsDir: Option.some("elsewhere"), environment: {} }),
      fakeTools(),
      project.config(stampedAt(60))
    );

    expect(result.record.path.startsWith(join(project.root, "elsewhere"))).toBe(true);
    expect(existsSync(project.backupsDir)).toBe(false);
  });

  test("a blank BACKUPS_DIR in .env keeps the default root", async () => {
    mkdirSync(join(project.root, "backup_scripts"));
    const settings = { BACKUPS_DIR: "", BACKUP_UPLOADS_DIR: project.uploadsDir, ...stampedAt(60) };
    writeFileSync(
      join(project.root, ".env"),
      Object.entries(settings)
        .map(([key, value]) => `${key}=${value}\n`)
        .join("")
    );

    const { provider } = await runTest(loadProjectEnvironment(project.root, {}));
    const result = await runTest(
      backup().pipe(Effect.provide(fakeTools().layer), Effect.withConfigProvider(provider))
    );

    const defaultRoot = join(project.root, "directus", "data", "backups");
    expect(result.record.path).toBe(join(defaultRoot, result.record.name));
    expect(existsSync(join(project.root, "backup_scripts"))).toBe(true);
    expect(existsSync(join(project.root, "backup_latest"))).toBe(false);
  });
});
