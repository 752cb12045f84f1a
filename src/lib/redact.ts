// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.


/** Masking of secrets in anything the tool writes out: env snapshots, command lines. */

export const MASKED_VALUE = "********";

const SENSITIVE_MARKERS: readonly string[] = ["PASSWORD", "SECRET", "TOKEN", "KEY"];

export const isSensitiveKey = (key: string): boolean =>
  SENSITIVE_MARKERS.some((marker) => key.toUpperCase().includes(marker));

const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)=/;

/** `KEY=value` with the value masked when the key is sensitive; anything else as is. */
export const redactArg = (arg: string): string => {
  const key = ASSIGNMENT.exec(arg)?.[1];
  return key !== undefined && isSensitiveKey(key) ? `${key}=${MASKED_VALUE}` : arg;
};

/** A command line for messages and logs. */
export const displayCommand = (command: readonly string[]): string =>
  command.map(redactArg).join(" ");
