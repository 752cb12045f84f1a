// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Backup record naming and discovery on disk.
 *
 * A record is `backup_<YYYY-mm-dd_HH-MM-SS>_<unix seconds>`; the numeric
 * stamp orders records. `backup_latest` is a relative symlink to the newest.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Data, Effect, Option, Order, pipe } from "effect";
import type { SystemError } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import {
  directoryExists,
  fileExists,
  isSymlink,
  listDirectory,
  readSymlink,
  resolveRealPath,
} from "../system/fs";

export const RECORD_PREFIX = "backup_";
export const LATEST_POINTER = "backup_latest";
export const STAGING_PREFIX = "temp_";
export const ERROR_RECORD_PREFIX = "error_";
export const UPLOADS_DIR = "uploads";
export const DUMP_FILE = "db_backup.sql";
export const COMPRESSED_DUMP_FILE = "db_backup.sql.gz";

const RECORD_NAME_PATTERN = /^backup_(\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2})_(\d+)$/;

export interface RecordName {
  readonly formattedDate: string;
  readonly timestamp: number;
}

export interface BackupRecord extends RecordName {
  readonly name: string;
  readonly path: AbsolutePath;
}

export const recordName = (formattedDate: string, timestamp: number): string =>
  `${RECORD_PREFIX}${formattedDate}_${timestamp}`;

export const parseRecordName = (name: string): Option.Option<RecordName> =>
  pipe(
    Option.fromNullable(RECORD_NAME_PATTERN.exec(name)),
    Option.flatMap(([, formattedDate, stamp]) =>
      formattedDate !== undefined && stamp !== undefined
        ? Option.some({ formattedDate, timestamp: Number(stamp) })
        : Option.none()
    )
  );

/** Oldest first; equal stamps fall back to the name. */
export const RecordOrder: Order.Order<BackupRecord> = Order.combine(
  Order.mapInput(Order.number, (r: BackupRecord) => r.timestamp),
  Order.mapInput(Order.string, (r: BackupRecord) => r.name)
);

// ============================================================================
// Dump artifacts
// ============================================================================

export type DumpArtifact = Data.TaggedEnum<{
  Compressed: { readonly path: AbsolutePath };
  Raw: { readonly path: AbsolutePath };
}>;

export const DumpArtifact = Data.taggedEnum<DumpArtifact>();

export const artifactFileName = (artifact: DumpArtifact): string =>
  DumpArtifact.$match(artifact, {
    Compressed: () => COMPRESSED_DUMP_FILE,
    Raw: () => DUMP_FILE,
  });

/** Compressed dump preferred; a raw one is accepted. */
export const detectDumpArtifact = (
  dir: AbsolutePath
): Effect.Effect<Option.Option<DumpArtifact>, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const compressed = pathJoin(dir, COMPRESSED_DUMP_FILE);
    if (yield* fileExists(compressed)) {
      return Option.some(DumpArtifact.Compressed({ path: compressed }));
    }
    const raw = pathJoin(dir, DUMP_FILE);
    if (yield* fileExists(raw)) {
      return Option.some(DumpArtifact.Raw({ path: raw }));
    }
    return Option.none();
  });

// ============================================================================
// Scanning the backups root
// ============================================================================

export interface BackupsRootScan {
  /** Sorted oldest first. */
  readonly valid: readonly BackupRecord[];
  /** `backup_*` directories whose name breaks the record pattern. */
  readonly invalid: readonly AbsolutePath[];
  readonly staging: readonly AbsolutePath[];
}

type ScannedEntry = Data.TaggedEnum<{
  Valid: { readonly record: BackupRecord };
  Invalid: { readonly path: AbsolutePath };
  Staging: { readonly path: AbsolutePath };
  Ignored: {};
}>;

const ScannedEntry = Data.taggedEnum<ScannedEntry>();

const classifyEntry = (
  root: AbsolutePath,
  name: string
): Effect.Effect<ScannedEntry, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const entryPath = pathJoin(root, name);
    const relevant = name.startsWith(RECORD_PREFIX) || name.startsWith(STAGING_PREFIX);
    // Links are never records, whatever they are called.
    if (!relevant || name === LATEST_POINTER || (yield* isSymlink(entryPath))) {
      return ScannedEntry.Ignored();
    }
    if (!(yield* directoryExists(entryPath))) {
      return ScannedEntry.Ignored();
    }
    if (name.startsWith(STAGING_PREFIX)) {
      return ScannedEntry.Staging({ path: entryPath });
    }
    return Option.match(parseRecordName(name), {
      onNone: () => ScannedEntry.Invalid({ path: entryPath }),
      onSome: (parsed) => ScannedEntry.Valid({ record: { ...parsed, name, path: entryPath } }),
    });
  });

export const scanBackupsRoot = (
  root: AbsolutePath
): Effect.Effect<BackupsRootScan, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* directoryExists(root))) {
      return { valid: [], invalid: [], staging: [] };
    }
    const names = yield* listDirectory(root);
    const entries = yield* Effect.forEach(names, (name) => classifyEntry(root, name));

    return {
      valid: pipe(
        entries,
        Arr.filterMap((e) => (e._tag === "Valid" ? Option.some(e.record) : Option.none())),
        Arr.sort(RecordOrder)
      ),
      invalid: Arr.filterMap(entries, (e) =>
        e._tag === "Invalid" ? Option.some(e.path) : Option.none()
      ),
      staging: Arr.filterMap(entries, (e) =>
        e._tag === "Staging" ? Option.some(e.path) : Option.none()
      ),
    };
  });

/** The pointer's target when it is a link to an existing directory. */
export const readLatestPointer = (
  root: AbsolutePath
): Effect.Effect<Option.Option<AbsolutePath>, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const pointer = pathJoin(root, LATEST_POINTER);
    const link = yield* readSymlink(pointer);
    if (Option.isNone(link) || !(yield* directoryExists(pointer))) {
      return Option.none();
    }
    return yield* pipe(
      resolveRealPath(pointer),
      Effect.map(Option.some),
      Effect.orElseSucceed(() => Option.none<AbsolutePath>())
    );
  });
