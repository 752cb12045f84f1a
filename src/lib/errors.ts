// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Tagged error types. Every failure carries a numeric code from a category
 * table so the CLI can report it in both pretty and JSON output.
 */

import { Data, Match, pipe } from "effect";

export const ErrorCode = {
  // General (0-9)
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,
  DEPENDENCY_MISSING: 4,

  // Config (10-19)
  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,

  // System (20-29)
  DIRECTORY_CREATE_FAILED: 22,
  EXEC_FAILED: 26,
  FILE_READ_FAILED: 27,
  FILE_WRITE_FAILED: 28,

  // Backup/Restore (50-59)
  BACKUP_FAILED: 50,
  RESTORE_FAILED: 51,
  BACKUP_NOT_FOUND: 52,
  DUMP_INVALID: 53,
  FINALIZE_FAILED: 54,

  // Sync (60-69)
  SYNC_FAILED: 60,
  SYNC_FORBIDDEN: 61,
} as const;

type Codes = typeof ErrorCode;

type CodeOf<K extends keyof Codes> = Codes[K];

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: CodeOf<"GENERAL_ERROR" | "INVALID_ARGS" | "DEPENDENCY_MISSING">;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: CodeOf<"CONFIG_NOT_FOUND" | "CONFIG_PARSE_ERROR" | "CONFIG_VALIDATION_ERROR">;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: CodeOf<
    "DIRECTORY_CREATE_FAILED" | "EXEC_FAILED" | "FILE_READ_FAILED" | "FILE_WRITE_FAILED"
  >;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class BackupError extends Data.TaggedError("BackupError")<{
  readonly code: CodeOf<"BACKUP_FAILED" | "DUMP_INVALID" | "FINALIZE_FAILED">;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class RestoreError extends Data.TaggedError("RestoreError")<{
  readonly code: CodeOf<"RESTORE_FAILED" | "BACKUP_NOT_FOUND">;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class SyncError extends Data.TaggedError("SyncError")<{
  readonly code: CodeOf<"SYNC_FAILED" | "SYNC_FORBIDDEN">;
  readonly message: string;
  readonly cause?: Error;
}> {}

export type AppError =
  | GeneralError
  | ConfigError
  | SystemError
  | BackupError
  | RestoreError
  | SyncError;

const APP_ERROR_TAGS: ReadonlySet<string> = new Set([
  "GeneralError",
  "ConfigError",
  "SystemError",
  "BackupError",
  "RestoreError",
  "SyncError",
]);

export const isAppError = (err: unknown): err is AppError =>
  typeof err === "object" &&
  err !== null &&
  "_tag" in err &&
  typeof err._tag === "string" &&
  APP_ERROR_TAGS.has(err._tag);

/**
 * Spread into an error constructor to chain the original failure.
 *
 * @example
 * new SystemError({
 *   code: ErrorCode.FILE_WRITE_FAILED,
 *   message: `Failed to write ${path}`,
 *   ...extractCauseProps(e),
 * })
 */
export const extractCauseProps = (e: unknown): { readonly cause?: Error } =>
  pipe(
    Match.value(e),
    Match.when(Match.instanceOf(Error), (err) => ({ cause: err })),
    Match.orElse(() => ({}))
  );

export const extractMessage = (e: unknown): string =>
  pipe(
    Match.value(e),
    Match.when(Match.instanceOf(Error), (err) => err.message),
    Match.when(Match.string, (s) => s),
    Match.orElse(() => String(e))
  );

/** Re-tag a lower-level failure as a backup stage failure, keeping its message. */
export const asBackupError =
  (code: BackupError["code"], context: string) =>
  (e: unknown): BackupError =>
    new BackupError({
      code,
      message: `${context}: ${extractMessage(e)}`,
      ...extractCauseProps(e),
    });

export const asRestoreError =
  (context: string) =>
  (e: unknown): RestoreError =>
    new RestoreError({
      code: ErrorCode.RESTORE_FAILED,
      message: `${context}: ${extractMessage(e)}`,
      ...extractCauseProps(e),
    });

export const asSyncError =
  (context: string) =>
  (e: unknown): SyncError =>
    new SyncError({
      code: ErrorCode.SYNC_FAILED,
      message: `${context}: ${extractMessage(e)}`,
      ...extractCauseProps(e),
    });
