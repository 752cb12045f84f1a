// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Config, Effect, Option, pipe } from "effect";
import type { ConfigError } from "../lib/errors";
import { type AbsolutePath, pathJoin, toAbsolutePath } from "../lib/types";
import { presentString, readConfig, stringOr } from "./env";

export const DEFAULT_REMOTE_PROJECT_PATH = "/srv/backend-directus";

export interface RemoteSettings {
  readonly projectPath: string;
  readonly backupsDir: string;
  readonly tmpDir: string;
  readonly backupCommand: string;
  readonly restoreCommand: string;
}

export interface SyncSettings {
  /** SSH aliases or hosts. Required only for the environment in use. */
  readonly servers: {
    readonly prod: Option.Option<string>;
    readonly dev: Option.Option<string>;
  };
  readonly remote: RemoteSettings;
  readonly syncDir: AbsolutePath;
  readonly tmpDir: AbsolutePath;
}

const RawSyncConfig = Config.all({
  prodServer: presentString("PROD_SERVER"),
  devServer: presentString("DEV_SERVER"),
  remoteProjectPath: stringOr("REMOTE_PROJECT_PATH", DEFAULT_REMOTE_PROJECT_PATH),
  remoteBackupsDir: presentString("REMOTE_BACKUPS_DIR"),
  remoteTmpDir: stringOr("REMOTE_TMP_DIR", "/tmp"),
  remoteBackupCommand: stringOr("REMOTE_BACKUP_COMMAND", "directus-ops backup"),
  remoteRestoreCommand: stringOr("REMOTE_RESTORE_COMMAND", "directus-ops restore --yes"),
  localSyncDir: presentString("LOCAL_SYNC_DIR"),
  localTmpDir: presentString("LOCAL_TMP_DIR"),
});

export const loadSyncSettings = (
  projectDir: AbsolutePath,
  backupsDir: AbsolutePath
): Effect.Effect<SyncSettings, ConfigError> =>
  Effect.map(readConfig(RawSyncConfig), (raw): SyncSettings => {
    const syncDir = pipe(
      raw.localSyncDir,
      Option.match({
        onNone: (): AbsolutePath => pathJoin(backupsDir, "sync"),
        onSome: (dir): AbsolutePath => toAbsolutePath(dir, projectDir),
      })
    );
    return {
      servers: { prod: raw.prodServer, dev: raw.devServer },
      remote: {
        projectPath: raw.remoteProjectPath,
        backupsDir: Option.getOrElse(
          raw.remoteBackupsDir,
          () => `${raw.remoteProjectPath}/directus/data/backups`
        ),
        tmpDir: raw.remoteTmpDir,
        backupCommand: raw.remoteBackupCommand,
        restoreCommand: raw.remoteRestoreCommand,
      },
      syncDir,
      tmpDir: pipe(
        raw.localTmpDir,
        Option.match({
          onNone: (): AbsolutePath => pathJoin(syncDir, "tmp"),
          onSome: (dir): AbsolutePath => toAbsolutePath(dir, projectDir),
        })
      ),
    };
  });
