// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Staged pipeline with scoped cleanup. Stages run sequentially, each adding
 * its output to an accumulating state object; the first failure
 * short-circuits the rest. Resource stages register a release that runs
 * when the pipeline scope closes and learns whether the run succeeded.
 */

import { Array as Arr, Cause, Data, Effect, Exit, Option, type Scope, pipe } from "effect";
import { extractMessage } from "../lib/errors";
import { logStep } from "../lib/log";

// ============================================================================
// Outcome
// ============================================================================

/**
 * How the pipeline ended, as seen by a release. Failure carries a one-line
 * reason for diagnostics.
 */
export type Outcome = Data.TaggedEnum<{
  Success: {};
  Failure: { readonly reason: string };
}>;

const { Success, Failure, $match } = Data.taggedEnum<Outcome>();

const describeCause = <E>(cause: Cause.Cause<E>): string =>
  Cause.isInterruptedOnly(cause) ? "interrupted" : extractMessage(Cause.squash(cause));

interface OutcomeOps {
  readonly success: Outcome;
  readonly failure: (reason: string) => Outcome;
  readonly fromExit: <A, E>(exit: Exit.Exit<A, E>) => Outcome;
  readonly match: <A>(
    outcome: Outcome,
    cases: { readonly onSuccess: () => A; readonly onFailure: (reason: string) => A }
  ) => A;
}

export const Outcome: OutcomeOps = {
  success: Success(),
  failure: (reason: string): Outcome => Failure({ reason }),

  fromExit: <A, E>(exit: Exit.Exit<A, E>): Outcome =>
    Exit.match(exit, {
      onSuccess: (): Outcome => Outcome.success,
      onFailure: (cause): Outcome => Outcome.failure(describeCause(cause)),
    }),

  match: <A>(
    outcome: Outcome,
    cases: { readonly onSuccess: () => A; readonly onFailure: (reason: string) => A }
  ): A =>
    $match(outcome, {
      Success: (): A => cases.onSuccess(),
      Failure: ({ reason }): A => cases.onFailure(reason),
    }),
};

// ============================================================================
// Stages
// ============================================================================

/** Must not fail. */
type Release<State, R> = (state: State, outcome: Outcome) => Effect.Effect<void, never, R>;

/**
 * @template StateIn what the stage reads
 * @template Output what it adds to the state
 */
export interface Stage<StateIn, Output, E, R> {
  readonly message: string;
  readonly acquire: (state: StateIn) => Effect.Effect<Output, E, R>;
  readonly release: Option.Option<Release<StateIn & Output, R>>;
}

export const Stage = {
  pure: <StateIn, Output, E, R>(
    message: string,
    acquire: (state: StateIn) => Effect.Effect<Output, E, R>
  ): Stage<StateIn, Output, E, R> => ({
    message,
    acquire,
    release: Option.none(),
  }),

  resource: <StateIn, Output, E, R>(
    message: string,
    acquire: (state: StateIn) => Effect.Effect<Output, E, R>,
    release: Release<StateIn & Output, R>
  ): Stage<StateIn, Output, E, R> => ({
    message,
    acquire,
    release: Option.some(release),
  }),
} as const;

// ============================================================================
// Builder
// ============================================================================

/**
 * @template S initial state
 * @template Acc accumulated stage outputs
 */
export interface PipelineBuilder<S, Acc, E, R> {
  /** Named `andThen` so the builder is never mistaken for a thenable. */
  readonly andThen: <Output, E2, R2>(
    stage: Stage<S & Acc, Output, E2, R2>
  ) => PipelineBuilder<S, Acc & Output, E | E2, R | R2>;

  /** Run every stage inside one scope and return the final state. */
  readonly execute: (initialState: S) => Effect.Effect<S & Acc, E, R>;

  readonly stageCount: number;
}

/**
 * Stages stored with erased types. The builder checks each stage's input
 * against the accumulated state at `andThen`; at runtime states are merged
 * by spreading, so the widening is sound.
 */
interface StoredStage {
  readonly message: string;
  readonly acquire: (state: object) => Effect.Effect<object, unknown, unknown>;
  readonly release: Option.Option<
    (state: object, outcome: Outcome) => Effect.Effect<void, never, unknown>
  >;
}

const runStage = (
  stage: StoredStage,
  stateIn: object,
  index: number,
  total: number
): Effect.Effect<object, unknown, unknown> =>
  Effect.gen(function* () {
    yield* logStep(index, total, stage.message);

    const snapshot: object = { ...stateIn };
    const output: object = yield* pipe(
      stage.release,
      Option.match({
        onNone: (): Effect.Effect<object, unknown, unknown> => stage.acquire(stateIn),
        onSome: (release): Effect.Effect<object, unknown, unknown> =>
          Effect.acquireRelease(stage.acquire(stateIn), (out: object, exit) =>
            release({ ...snapshot, ...out }, Outcome.fromExit(exit))
          ),
      })
    );

    return { ...stateIn, ...output };
  });

const runStages = (
  stages: readonly StoredStage[],
  initialState: object
): Effect.Effect<object, unknown, unknown> =>
  pipe(
    stages,
    Arr.reduce(
      Effect.succeed(initialState) as Effect.Effect<object, unknown, unknown>,
      (acc, stage, i) =>
        Effect.flatMap(acc, (state) => runStage(stage, state, i + 1, stages.length))
    )
  );

const createBuilder = <S, Acc, E, R>(
  stages: readonly StoredStage[]
): PipelineBuilder<S, Acc, E, R> => ({
  stageCount: stages.length,

  andThen: <Output, E2, R2>(
    stage: Stage<S & Acc, Output, E2, R2>
  ): PipelineBuilder<S, Acc & Output, E | E2, R | R2> =>
    createBuilder<S, Acc & Output, E | E2, R | R2>(
      Arr.append(stages, {
        message: stage.message,
        acquire: stage.acquire as unknown as StoredStage["acquire"],
        release: stage.release as unknown as StoredStage["release"],
      } satisfies StoredStage)
    ),

  execute: (initialState: S): Effect.Effect<S & Acc, E, R> =>
    Effect.scoped(
      runStages(stages, initialState as object) as Effect.Effect<
        object,
        unknown,
        Scope.Scope
      >
    ) as unknown as Effect.Effect<S & Acc, E, R>,
});

/**
 * @example
 * ```typescript
 * const result = pipeline<BackupInput>()
 *   .andThen(checkTools)
 *   .andThen(createJob)
 *   .execute(input);
 * ```
 */
export const pipeline = <S>(): PipelineBuilder<S, S, never, never> =>
  createBuilder<S, S, never, never>(Arr.empty());
