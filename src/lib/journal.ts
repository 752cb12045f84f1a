// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * In-memory job journal. Installed next to the console logger for the
 * duration of a backup job; the lines end up in a failed job's `error.log`.
 */

import { Effect, type Layer, Logger } from "effect";
import { renderMessage } from "./effect-logger";
import { formatLogTimestamp } from "./format";

export interface JobJournal {
  readonly layer: Layer.Layer<never>;
  readonly lines: Effect.Effect<readonly string[]>;
}

export const formatJournalLine = (date: Date, level: string, message: string): string =>
  `[${formatLogTimestamp(date)}] ${level} ${message}`;

export const makeJobJournal: Effect.Effect<JobJournal> = Effect.sync(() => {
  const entries: string[] = [];

  const logger = Logger.make<unknown, void>(({ logLevel, message, date }) => {
    entries.push(formatJournalLine(date, logLevel.label, renderMessage(message)));
  });

  return {
    layer: Logger.add(logger),
    lines: Effect.sync(() => [...entries]),
  };
});
