// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem operations over the @effect/platform FileSystem service.
 * Predicates never fail; mutations fail with SystemError.
 */

import { basename, dirname } from "node:path";
import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Effect, Option, pipe } from "effect";
import { ErrorCode, SystemError, extractCauseProps } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";

type FsEffect<A> = Effect.Effect<A, SystemError, FileSystem.FileSystem>;

const fsError =
  (code: SystemError["code"], message: string) =>
  (e: PlatformError): SystemError =>
    new SystemError({
      code,
      message: `${message}: ${e.message}`,
      ...extractCauseProps(e),
    });

const withFs = <A>(
  f: (fs: FileSystem.FileSystem) => Effect.Effect<A, PlatformError>,
  onError: (e: PlatformError) => SystemError
): FsEffect<A> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) => Effect.mapError(f(fs), onError));

// ============================================================================
// Predicates
// ============================================================================

export const pathExists = (p: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    fs.exists(p).pipe(Effect.orElseSucceed(() => false))
  );

/** Follows symlinks: a link to a directory counts as a directory. */
export const directoryExists = (p: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    pipe(
      fs.stat(p),
      Effect.map((info) => info.type === "Directory"),
      Effect.orElseSucceed(() => false)
    )
  );

export const fileExists = (p: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    pipe(
      fs.stat(p),
      Effect.map((info) => info.type === "File"),
      Effect.orElseSucceed(() => false)
    )
  );

/** True only for the link itself, dangling or not. */
export const isSymlink = (p: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    pipe(
      fs.readLink(p),
      Effect.as(true),
      Effect.orElseSucceed(() => false)
    )
  );

export const isReadableDirectory = (
  p: string
): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const isDir = yield* directoryExists(p);
    if (!isDir) {
      return false;
    }
    return yield* pipe(
      fs.access(p, { readable: true }),
      Effect.zipRight(fs.readDirectory(p)),
      Effect.as(true),
      Effect.orElseSucceed(() => false)
    );
  });

// ============================================================================
// Queries
// ============================================================================

/** Entry names, sorted. */
export const listDirectory = (p: string): FsEffect<readonly string[]> =>
  withFs(
    (fs) => Effect.map(fs.readDirectory(p), (names) => [...names].sort()),
    fsError(ErrorCode.FILE_READ_FAILED, `Failed to list directory ${p}`)
  );

export const fileSize = (p: string): FsEffect<number> =>
  withFs(
    (fs) => Effect.map(fs.stat(p), (info) => Number(info.size)),
    fsError(ErrorCode.FILE_READ_FAILED, `Failed to stat ${p}`)
  );

export const modifiedTime = (p: string): FsEffect<Option.Option<Date>> =>
  withFs(
    (fs) => Effect.map(fs.stat(p), (info) => info.mtime),
    fsError(ErrorCode.FILE_READ_FAILED, `Failed to stat ${p}`)
  );

export const readSymlink = (
  p: string
): Effect.Effect<Option.Option<string>, never, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    pipe(
      fs.readLink(p),
      Effect.map(Option.some),
      Effect.orElseSucceed(() => Option.none<string>())
    )
  );

export const resolveRealPath = (p: string): FsEffect<AbsolutePath> =>
  withFs(
    // realPath always answers with an absolute path
    (fs) => Effect.map(fs.realPath(p), (real) => real as AbsolutePath),
    fsError(ErrorCode.FILE_READ_FAILED, `Failed to resolve ${p}`)
  );

export const readText = (p: string): FsEffect<string> =>
  withFs(
    (fs) => fs.readFileString(p),
    fsError(ErrorCode.FILE_READ_FAILED, `Failed to read ${p}`)
  );

// ============================================================================
// Mutations
// ============================================================================

export const ensureDirectory = (p: string): FsEffect<void> =>
  withFs(
    (fs) => fs.makeDirectory(p, { recursive: true }),
    fsError(ErrorCode.DIRECTORY_CREATE_FAILED, `Failed to create directory ${p}`)
  );

/** Removes a file, a link (never its target) or a whole tree. Missing paths are fine. */
export const removeTree = (p: string): FsEffect<void> =>
  Effect.gen(function* () {
    const present = (yield* pathExists(p)) || (yield* isSymlink(p));
    if (!present) {
      return;
    }
    yield* withFs(
      (fs) => fs.remove(p, { recursive: true }),
      fsError(ErrorCode.FILE_WRITE_FAILED, `Failed to remove ${p}`)
    );
  });

/** Single rename(2): atomic within one filesystem. */
export const movePath = (from: string, to: string): FsEffect<void> =>
  withFs(
    (fs) => fs.rename(from, to),
    fsError(ErrorCode.FILE_WRITE_FAILED, `Failed to move ${from} to ${to}`)
  );

export const copyTree = (from: string, to: string): FsEffect<void> =>
  withFs(
    (fs) => fs.copy(from, to),
    fsError(ErrorCode.FILE_WRITE_FAILED, `Failed to copy ${from} to ${to}`)
  );

export const copyFile = (from: string, to: string): FsEffect<void> =>
  withFs(
    (fs) => fs.copyFile(from, to),
    fsError(ErrorCode.FILE_WRITE_FAILED, `Failed to copy ${from} to ${to}`)
  );

export const writeText = (p: string, content: string): FsEffect<void> =>
  withFs(
    (fs) => fs.writeFileString(p, content),
    fsError(ErrorCode.FILE_WRITE_FAILED, `Failed to write ${p}`)
  );

/**
 * Point `linkPath` at `target` by renaming a fresh link over it, so readers
 * see either the old target or the new one.
 */
export const replaceSymlink = (target: string, linkPath: AbsolutePath): FsEffect<void> =>
  Effect.gen(function* () {
    const tempLink = pathJoin(dirname(linkPath), `.${basename(linkPath)}.new`);
    yield* removeTree(tempLink);
    yield* withFs(
      (fs) => fs.symlink(target, tempLink),
      fsError(ErrorCode.FILE_WRITE_FAILED, `Failed to create link ${tempLink}`)
    );
    yield* movePath(tempLink, linkPath).pipe(
      Effect.tapError(() => Effect.ignore(removeTree(tempLink)))
    );
  });
