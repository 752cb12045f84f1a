// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Argument builders for `docker compose`. Commands run with the project
 * directory as working directory so relative compose paths resolve.
 */

import { Option } from "effect";
import type { ComposeSettings, DatabaseCredentials } from "../config/backup";

export const composeArgs = (settings: ComposeSettings, ...args: string[]): readonly string[] => [
  "docker",
  "compose",
  "-f",
  settings.file,
  ...args,
];

/**
 * `docker compose exec -T`, forwarding each variable in `forward` by name
 * (`-e NAME`). Compose takes the value from its own environment, so callers
 * pass values through `ExecOptions.env` and secrets never reach argv.
 * `-T` keeps compose from allocating a TTY, which would corrupt streamed dumps.
 */
export const composeExecArgs = (
  settings: ComposeSettings,
  service: string,
  command: readonly string[],
  forward: readonly string[] = []
): readonly string[] =>
  composeArgs(
    settings,
    "exec",
    "-T",
    ...forward.flatMap((name) => ["-e", name]),
    service,
    ...command
  );

/** `PGPASSWORD` for container commands, only when a password is configured. */
export const pgPasswordEnv = (credentials: DatabaseCredentials): Record<string, string> =>
  Option.match(credentials.password, {
    onNone: (): Record<string, string> => ({}),
    onSome: (password): Record<string, string> => ({ PGPASSWORD: password }),
  });

/** `-U <user>` when a user is configured. */
export const pgUserArgs = (credentials: DatabaseCredentials): readonly string[] =>
  Option.match(credentials.user, {
    onNone: (): readonly string[] => [],
    onSome: (user): readonly string[] => ["-U", user],
  });
