// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Array as Arr, Option, pipe } from "effect";

interface ThresholdEntry {
  readonly threshold: number;
  readonly format: (value: number) => string;
}

const BYTE_THRESHOLDS: readonly ThresholdEntry[] = [
  { threshold: 1024 ** 3, format: (b): string => `${(b / 1024 ** 3).toFixed(2)} GB` },
  { threshold: 1024 ** 2, format: (b): string => `${(b / 1024 ** 2).toFixed(2)} MB` },
  { threshold: 1024, format: (b): string => `${(b / 1024).toFixed(2)} KB` },
];

export const formatBytes = (bytes: number): string =>
  pipe(
    BYTE_THRESHOLDS,
    Arr.findFirst((t) => bytes >= t.threshold),
    Option.match({
      onNone: (): string => `${bytes} B`,
      onSome: (t): string => t.format(bytes),
    })
  );

const pad2 = (n: number): string => String(n).padStart(2, "0");

const calendarDate = (d: Date): string =>
  `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;

/** Local time as `YYYY-mm-dd_HH-MM-SS`, the human part of record and diagnostic names. */
export const formatBackupDate = (d: Date): string =>
  `${calendarDate(d)}_${pad2(d.getHours())}-${pad2(d.getMinutes())}-${pad2(d.getSeconds())}`;

export const BACKUP_DATE_PATTERN: RegExp = /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}$/;

/** Local time as `YYYY-mm-dd HH:MM:SS` for journal lines. */
export const formatLogTimestamp = (d: Date): string =>
  `${calendarDate(d)} ${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;

export const unixSeconds = (d: Date): number => Math.floor(d.getTime() / 1000);
