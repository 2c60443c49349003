import { Equal, Utils } from "effect";
import type { Effect } from "effect";

// ============================================================================
// Core Types
// ============================================================================

/**
 * A state value. `_tag` is the state type identity; the remaining fields are
 * the payload. Plain objects work; `Data.TaggedClass` or `Data.tagged` give
 * the same value equality with a constructor.
 */
export interface MachineState<TTag extends string = string> {
  readonly _tag: TTag;
}

/**
 * Represents a state machine event with a _tag discriminator.
 * Compatible with Effect's Data.TaggedClass pattern.
 */
export interface MachineEvent<TTag extends string = string> {
  readonly _tag: TTag;
}

export type StateTag<S extends MachineState> = S["_tag"];
export type StateByTag<S extends MachineState, T extends S["_tag"]> = Extract<S, { _tag: T }>;
export type EventByTag<E extends MachineEvent, T extends E["_tag"]> = Extract<E, { _tag: T }>;

/**
 * Identity of a node in the declared tree. Concrete state tags autocomplete,
 * but purely structural parents (never instantiated) are plain strings.
 */
export type StateType<S extends MachineState> = S["_tag"] | (string & {});

/**
 * Any event class, abstract or not. Rules registered with a class match
 * every instance of it, subclasses included.
 */
export type EventClass<Ev> = abstract new (...args: never) => Ev;

// ============================================================================
// Transition Rules
// ============================================================================

/**
 * What a rule body returns:
 * - a state value      → transition candidate, stops the search
 * - null               → no match, try the next rule
 * - an Effect of those → same, after the effect completes
 */
export type RuleResult<S extends MachineState> = S | null | Effect.Effect<S | null, unknown>;

/**
 * Rule body. `state` is the machine's current concrete state, which may be
 * a descendant of the state type the rule was declared on.
 *
 * @example
 * ```ts
 * $.declare("Idle", (idle) =>
 *   idle.on("Start", () => new Running({ ticks: 0 }))
 * );
 * ```
 */
export type RuleBody<S extends MachineState, Ev extends MachineEvent> = (
  event: Ev,
  state: S
) => RuleResult<S>;

/**
 * A registered rule, owned by exactly one state type.
 */
export interface TransitionRule<S extends MachineState> {
  /** State type the rule was declared on */
  readonly owner: string;
  /** Event tag or class name, for diagnostics */
  readonly event: string;
  /** Registration position within the owner */
  readonly order: number;
  readonly matches: (event: MachineEvent) => boolean;
  readonly run: (event: MachineEvent, state: S) => RuleResult<S>;
}

// ============================================================================
// Lifecycle Hooks
// ============================================================================

/**
 * Hooks may return an Effect. It is forked and never awaited.
 */
export type HookResult = void | Effect.Effect<unknown, unknown>;

export type EnterHook<S extends MachineState> = (state: S) => HookResult;
export type ExitHook<S extends MachineState> = (state: S) => HookResult;
export type ChangeHook<S extends MachineState> = (previous: S, next: S) => HookResult;

export type HookKind = "enter" | "exit" | "change";

export interface HookByKind<S extends MachineState> {
  readonly enter: EnterHook<S>;
  readonly exit: ExitHook<S>;
  readonly change: ChangeHook<S>;
}

export type StateHooks<S extends MachineState> = {
  readonly [K in HookKind]: Array<HookByKind<S>[K]>;
};

// ============================================================================
// Declared Tree
// ============================================================================

export interface StateNode<S extends MachineState> {
  readonly stateType: string;
  /** Parent state type (null for root-level states) */
  readonly parent: string | null;
  readonly depth: number;
  readonly children: string[];
  readonly rules: TransitionRule<S>[];
  readonly hooks: StateHooks<S>;
}

// ============================================================================
// Outcomes
// ============================================================================

/**
 * The state changed and was published.
 */
export interface Transitioned<S extends MachineState> {
  readonly _tag: "Transitioned";
  readonly previous: S;
  readonly state: S;
}

/**
 * No rule matched, or the matching rule produced a state equal to the
 * current one (see `sameState`). Nothing was committed, fired or published.
 */
export interface Unchanged<S extends MachineState> {
  readonly _tag: "Unchanged";
  readonly state: S;
}

export type SubmitResult<S extends MachineState> = Transitioned<S> | Unchanged<S>;

export const transitioned = <S extends MachineState>(previous: S, state: S): SubmitResult<S> => ({
  _tag: "Transitioned",
  previous,
  state,
});

export const unchanged = <S extends MachineState>(state: S): SubmitResult<S> => ({
  _tag: "Unchanged",
  state,
});

export const isTransitioned = <S extends MachineState>(
  result: SubmitResult<S>
): result is Transitioned<S> => result._tag === "Transitioned";

/**
 * Two states are the same when their type matches and their payloads are
 * equal by value. `Data` values use their own equality; plain objects,
 * arrays and anything nested in a `Data` payload compare field by field.
 */
export const sameState = <S extends MachineState>(a: S, b: S): boolean =>
  Utils.structuralRegion(() => Equal.equals(a, b));
