// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types prevent accidental mixing of same-underlying-type values.
 */

import { isAbsolute, join, normalize, resolve } from "node:path";
import type { Brand } from "effect";

export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;
export type JobId = string & Brand.Brand<"JobId">;

type AbsolutePathLiteral = `/${string}`;

/**
 * Compile-time validated `AbsolutePath` from a string literal.
 * For dynamic input use `toAbsolutePath` or `pathJoin`.
 */
export const path = <const S extends AbsolutePathLiteral>(literal: S): AbsolutePath =>
  literal as string as AbsolutePath;

/** Relative input resolves against `base`; absolute input is only normalized. */
export const toAbsolutePath = (p: string, base: AbsolutePath): AbsolutePath =>
  (isAbsolute(p) ? normalize(p) : resolve(base, p)) as AbsolutePath;

/** `process.cwd()` is always absolute. */
export const currentDirectory = (): AbsolutePath => process.cwd() as AbsolutePath;

/** Join path segments, preserving `AbsolutePath` brand when the base is branded. */
export function pathJoin(base: AbsolutePath, ...segments: string[]): AbsolutePath;
export function pathJoin(base: string, ...segments: string[]): string;
export function pathJoin(base: string, ...segments: string[]): string {
  return segments.length === 0 ? base : join(base, ...segments);
}

/** Only for values produced by the job id generators. */
export const jobId = (value: string): JobId => value as JobId;
