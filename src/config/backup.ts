// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Settings for the backup and restore workflows: the backups root and its
 * retention policy, the uploads tree, the compose services and database
 * credentials. Relative paths resolve against the project directory.
 */

import { Config, Effect, Option, pipe } from "effect";
import type { ConfigError } from "../lib/errors";
import { BACKUP_DATE_PATTERN } from "../lib/format";
import { type AbsolutePath, pathJoin, toAbsolutePath } from "../lib/types";
import {
  ENV_NAMESPACE,
  numberOr,
  presentNumber,
  presentString,
  readConfig,
  stringOr,
} from "./env";
import { GZIP_LEVEL_DEFAULT, GZIP_LEVEL_MAX, GZIP_LEVEL_MIN } from "./field-values";

export const DEFAULT_BACKUPS_DIR = "./directus/data/backups";
export const DEFAULT_UPLOADS_DIR = "./directus/data/uploads";
export const ERROR_DIR_NAME = "error_logs";

export interface RetentionPolicy {
  /** 0 disables age-based pruning. Fractional days are allowed. */
  readonly maxAgeDays: number;
  /** 0 disables the count floor. */
  readonly minCount: number;
}

export interface BackupSettings {
  readonly backupsDir: AbsolutePath;
  readonly uploadsDir: AbsolutePath;
  readonly errorDir: AbsolutePath;
  readonly retention: RetentionPolicy;
  readonly errorLogRetentionDays: number;
  readonly gzipLevel: number;
  readonly formattedDate: Option.Option<string>;
  readonly timestamp: Option.Option<number>;
}

export interface ComposeSettings {
  readonly file: string;
  readonly databaseService: string;
  readonly appService: string;
}

export interface DatabaseCredentials {
  readonly database: Option.Option<string>;
  readonly user: Option.Option<string>;
  readonly password: Option.Option<string>;
}

const nonNegative = (config: Config.Config<number>, name: string): Config.Config<number> =>
  config.pipe(
    Config.validate({
      message: `${name} must be zero or positive`,
      validation: (n: number) => n >= 0,
    })
  );

// Blank values fall back to the defaults throughout: an empty BACKUPS_DIR
// must never resolve to the project directory itself.
const RawBackupConfig = Config.all({
  backupsDir: stringOr("BACKUPS_DIR", DEFAULT_BACKUPS_DIR),
  uploadsDir: stringOr("BACKUP_UPLOADS_DIR", DEFAULT_UPLOADS_DIR),
  errorDir: presentString("BACKUP_ERROR_DIR"),
  maxAgeDays: nonNegative(numberOr("BACKUP_RETENTION_DAYS", "number", 7), "BACKUP_RETENTION_DAYS"),
  minCount: nonNegative(numberOr("BACKUP_RETENTION_COUNT", "integer", 0), "BACKUP_RETENTION_COUNT"),
  errorLogRetentionDays: nonNegative(
    numberOr("BACKUP_ERROR_LOGS_RETENTION_DAYS", "number", 30),
    "BACKUP_ERROR_LOGS_RETENTION_DAYS"
  ),
  gzipLevel: numberOr("BACKUP_GZIP_LEVEL", "integer", GZIP_LEVEL_DEFAULT).pipe(
    Config.validate({
      message: `BACKUP_GZIP_LEVEL must be between ${GZIP_LEVEL_MIN} and ${GZIP_LEVEL_MAX}`,
      validation: (n: number) => n >= GZIP_LEVEL_MIN && n <= GZIP_LEVEL_MAX,
    })
  ),
  // A date that breaks the record name pattern would be pruned as invalid on the next run.
  formattedDate: presentString("BACKUP_FORMATTED_DATE").pipe(
    Config.validate({
      message: "BACKUP_FORMATTED_DATE must look like YYYY-mm-dd_HH-MM-SS",
      validation: (date: Option.Option<string>) =>
        Option.isNone(date) || BACKUP_DATE_PATTERN.test(date.value),
    })
  ),
  timestamp: presentNumber("BACKUP_TIMESTAMP", "integer").pipe(
    Config.validate({
      message: "BACKUP_TIMESTAMP must be zero or positive",
      validation: (ts: Option.Option<number>) => Option.isNone(ts) || ts.value >= 0,
    })
  ),
});

export const ComposeConfigSpec: Config.Config<ComposeSettings> = Config.nested(
  Config.all({
    file: stringOr("COMPOSE_FILE", "docker-compose.base.yml"),
    databaseService: stringOr("DATABASE_SERVICE", "database"),
    appService: stringOr("APP_SERVICE", "directus"),
  }),
  ENV_NAMESPACE
);

export const DatabaseConfigSpec: Config.Config<DatabaseCredentials> = Config.all({
  database: presentString("DB_DATABASE"),
  user: presentString("DB_USER"),
  password: presentString("DB_PASSWORD"),
});

/**
 * @param backupsDirOverride positional CLI argument, wins over `BACKUPS_DIR`
 */
export const loadBackupSettings = (
  projectDir: AbsolutePath,
  backupsDirOverride: Option.Option<string>
): Effect.Effect<BackupSettings, ConfigError> =>
  Effect.map(readConfig(RawBackupConfig), (raw): BackupSettings => {
    const backupsDir = toAbsolutePath(
      pipe(
        backupsDirOverride,
        Option.filter((dir) => dir.trim() !== ""),
        Option.getOrElse(() => raw.backupsDir)
      ),
      projectDir
    );
    return {
      backupsDir,
      uploadsDir: toAbsolutePath(raw.uploadsDir, projectDir),
      errorDir: pipe(
        raw.errorDir,
        Option.match({
          onNone: (): AbsolutePath => pathJoin(backupsDir, ERROR_DIR_NAME),
          onSome: (dir): AbsolutePath => toAbsolutePath(dir, projectDir),
        })
      ),
      retention: { maxAgeDays: raw.maxAgeDays, minCount: raw.minCount },
      errorLogRetentionDays: raw.errorLogRetentionDays,
      gzipLevel: raw.gzipLevel,
      formattedDate: raw.formattedDate,
      timestamp: raw.timestamp,
    };
  });

export const loadComposeSettings: Effect.Effect<ComposeSettings, ConfigError> =
  readConfig(ComposeConfigSpec);

export const loadDatabaseCredentials: Effect.Effect<DatabaseCredentials, ConfigError> =
  readConfig(DatabaseConfigSpec);

/** Names of credentials that are unset, in declaration order. */
export const missingCredentials = (credentials: DatabaseCredentials): readonly string[] =>
  [
    ["DB_DATABASE", credentials.database] as const,
    ["DB_USER", credentials.user] as const,
    ["DB_PASSWORD", credentials.password] as const,
  ]
    .filter(([, value]) => Option.isNone(value))
    .map(([name]) => name);
