// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Test helpers for providing Effect platform layers in tests.
 * NodeContext.layer provides FileSystem, Path, Terminal and the platform
 * CommandExecutor; console logging is silenced so test output stays clean.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Layer, Logger, Option } from "effect";

export const TestLayer: Layer.Layer<NodeContext.NodeContext> = Layer.merge(
  NodeContext.layer,
  Logger.replace(Logger.defaultLogger, Logger.none)
);

/**
 * Run an effect in tests with platform services provided.
 */
export const runTest = <A, E>(effect: Effect.Effect<A, E, NodeContext.NodeContext>): Promise<A> =>
  Effect.runPromise(effect.pipe(Effect.provide(TestLayer)));

/**
 * Run an effect in tests and return the Exit value.
 */
export const runTestExit = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<Exit.Exit<A, E>> => Effect.runPromiseExit(effect.pipe(Effect.provide(TestLayer)));

/**
 * The expected failure of an exit, if it failed with one.
 */
export const failureOf = <A, E>(exit: Exit.Exit<A, E>): Option.Option<E> =>
  Exit.isFailure(exit) ? Cause.failureOption(exit.cause) : Option.none();
