#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The imperative shell: the only place the Effect runtime is started.
 * Errors are displayed by the command runner, so the runtime only maps
 * the exit to a status code (0 on success, 1 otherwise, interrupts included).
 */

import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Exit } from "effect";
import { cli } from "./cli/index";

const program = cli(process.argv).pipe(Effect.provide(NodeContext.layer));

NodeRuntime.runMain(program, {
  disableErrorReporting: true,
  disablePrettyLogger: true,
  teardown: (exit, onExit) => onExit(Exit.isSuccess(exit) ? 0 : 1),
});
