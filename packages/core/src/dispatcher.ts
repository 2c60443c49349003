import { Cause, Effect, Option } from "effect";
import { HookError } from "./errors.js";
import type { StateRegistry } from "./registry.js";
import { sameState } from "./types.js";
import type { HookKind, HookResult, MachineEvent, MachineState } from "./types.js";

// ============================================================================
// Hook Plan
// ============================================================================

/**
 * One scheduled hook call, arguments already bound.
 */
export interface HookInvocation {
  readonly kind: HookKind;
  readonly stateType: string;
  readonly invoke: () => HookResult;
}

/**
 * Compute, without running anything, which hooks a transition fires and in
 * what order:
 *
 * 1. exits, for levels of the old ancestry the new one does not share, leaf first
 * 2. enters, for levels of the new ancestry the old one does not share, root first
 * 3. changes, on the concrete type when it is kept and only the payload differs
 *
 * With no previous state (initial entry) every level of `next` is entered.
 * States equal by `sameState` produce an empty plan.
 */
export const planHooks = <S extends MachineState, E extends MachineEvent>(
  registry: StateRegistry<S, E>,
  previous: Option.Option<S>,
  next: S
): ReadonlyArray<HookInvocation> => {
  const nextAncestry = registry.ancestryOf(next._tag);

  const enters = (levels: ReadonlyArray<string>): HookInvocation[] =>
    [...levels].reverse().flatMap((stateType) =>
      registry.hooksFor(stateType, "enter").map((hook) => ({
        kind: "enter" as const,
        stateType,
        invoke: () => hook(next),
      }))
    );

  if (Option.isNone(previous)) {
    return enters(nextAncestry);
  }

  const old = previous.value;
  if (sameState(old, next)) {
    return [];
  }

  const oldAncestry = registry.ancestryOf(old._tag);

  const exits: HookInvocation[] = oldAncestry
    .filter((stateType) => !nextAncestry.includes(stateType))
    .flatMap((stateType) =>
      registry.hooksFor(stateType, "exit").map((hook) => ({
        kind: "exit" as const,
        stateType,
        invoke: () => hook(old),
      }))
    );

  const changes: HookInvocation[] =
    old._tag === next._tag
      ? registry.hooksFor(next._tag, "change").map((hook) => ({
          kind: "change" as const,
          stateType: next._tag,
          invoke: () => hook(old, next),
        }))
      : [];

  const entered = nextAncestry.filter((stateType) => !oldAncestry.includes(stateType));

  return [...exits, ...enters(entered), ...changes];
};

// ============================================================================
// Firing
// ============================================================================

/**
 * Forks an effect and forgets it.
 */
export type HookScheduler = (effect: Effect.Effect<void>) => void;

const isDeferredHook = (result: HookResult): result is Effect.Effect<unknown, unknown> =>
  Effect.isEffect(result);

/**
 * Wrap one invocation so it can never fail: throws, failures and defects are
 * turned into a HookError and handed to `report`.
 */
export const toHookEffect = (
  invocation: HookInvocation,
  report: (error: HookError) => Effect.Effect<void>
): Effect.Effect<void> =>
  Effect.suspend((): Effect.Effect<unknown, unknown> => {
    const result = invocation.invoke();
    return isDeferredHook(result) ? result : Effect.void;
  }).pipe(
    Effect.asVoid,
    Effect.catchAllCause((cause) =>
      Cause.isInterruptedOnly(cause)
        ? Effect.void
        : report(
            new HookError({
              message: `${invocation.kind} hook of "${invocation.stateType}" failed`,
              kind: invocation.kind,
              stateType: invocation.stateType,
              cause: Cause.squash(cause),
            })
          )
    )
  );

/**
 * Plan the hooks for `previous → next` and schedule each one independently.
 * Returns as soon as everything is scheduled; nothing is awaited.
 *
 * `next` is None when evaluation produced no state: nothing fires.
 */
export const diffAndFire = <S extends MachineState, E extends MachineEvent>(
  registry: StateRegistry<S, E>,
  previous: Option.Option<S>,
  next: Option.Option<S>,
  schedule: HookScheduler,
  report: (error: HookError) => Effect.Effect<void>
): ReadonlyArray<HookInvocation> => {
  if (Option.isNone(next)) return [];

  const plan = planHooks(registry, previous, next.value);
  for (const invocation of plan) {
    schedule(toHookEffect(invocation, report));
  }
  return plan;
};
