import { Cause, Effect } from "effect";
import { RuleEvaluationError } from "./errors.js";
import type { StateRegistry } from "./registry.js";
import type { MachineEvent, MachineState, RuleResult, TransitionRule } from "./types.js";

// ============================================================================
// Evaluation Result
// ============================================================================

export interface Matched<S extends MachineState> {
  readonly _tag: "Matched";
  readonly state: S;
  readonly rule: TransitionRule<S>;
}

export interface NoMatch {
  readonly _tag: "NoMatch";
}

/**
 * Tagged rather than nullable, so "no rule matched" can never be confused
 * with a rule producing a state.
 */
export type Evaluation<S extends MachineState> = Matched<S> | NoMatch;

const noMatch: NoMatch = { _tag: "NoMatch" };

export const isMatched = <S extends MachineState>(
  evaluation: Evaluation<S>
): evaluation is Matched<S> => evaluation._tag === "Matched";

// ============================================================================
// Rule Execution
// ============================================================================

const isDeferredResult = <S extends MachineState>(
  result: RuleResult<S>
): result is Effect.Effect<S | null, unknown> => Effect.isEffect(result);

/**
 * Run one rule body. Synchronous throws, failures and defects all surface
 * as RuleEvaluationError.
 */
const runRule = <S extends MachineState>(
  rule: TransitionRule<S>,
  state: S,
  event: MachineEvent
): Effect.Effect<S | null, RuleEvaluationError> =>
  Effect.suspend((): Effect.Effect<S | null, unknown> => {
    const result = rule.run(event, state);
    return isDeferredResult(result) ? result : Effect.succeed(result);
  }).pipe(
    Effect.catchAllCause((cause) =>
      Effect.fail(
        new RuleEvaluationError({
          message:
            `Rule for "${rule.event}" declared on "${rule.owner}" ` +
            `failed in state "${state._tag}"`,
          stateType: state._tag,
          ruleOwner: rule.owner,
          event: event._tag,
          cause: Cause.squash(cause),
        })
      )
    )
  );

// ============================================================================
// Evaluator
// ============================================================================

/**
 * Find the next state for `event`.
 *
 * Candidates come from `rulesFor`: the concrete state's own rules, then each
 * ancestor's. They are tried one at a time, awaiting deferred bodies before
 * moving on; the first non-null value wins and the rest are never invoked.
 *
 * A result equal to `current` is still reported as Matched. Undeclared
 * result types are not checked here.
 */
export const evaluate = <S extends MachineState, E extends MachineEvent>(
  registry: StateRegistry<S, E>,
  current: S,
  event: E
): Effect.Effect<Evaluation<S>, RuleEvaluationError> =>
  Effect.gen(function* () {
    for (const rule of registry.rulesFor(current._tag)) {
      if (!rule.matches(event)) continue;

      const next = yield* runRule(rule, current, event);
      if (next !== null) {
        yield* Effect.logDebug(
          `"${event._tag}" matched rule on "${rule.owner}" → "${next._tag}"`
        );
        const matched: Evaluation<S> = { _tag: "Matched", state: next, rule };
        return matched;
      }
    }
    yield* Effect.logDebug(`No rule produced a state for "${event._tag}" in "${current._tag}"`);
    return noMatch;
  });
