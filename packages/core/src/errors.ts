import { Data } from "effect";
import type { HookKind } from "./types.js";

// ============================================================================
// Declaration Errors (thrown while the tree is built)
// ============================================================================

/**
 * A state type was declared twice.
 */
export class DuplicateStateError extends Data.TaggedError("DuplicateStateError")<{
  readonly message: string;
  readonly stateType: string;
}> {}

/**
 * A child was declared under a parent that does not exist yet.
 */
export class UnknownParentError extends Data.TaggedError("UnknownParentError")<{
  readonly message: string;
  readonly stateType: string;
  readonly parentType: string;
}> {}

/**
 * The registry was modified after its machine definition was built.
 */
export class RegistrySealedError extends Data.TaggedError("RegistrySealedError")<{
  readonly message: string;
  readonly stateType: string;
}> {}

// ============================================================================
// Runtime Errors (Effect error channel)
// ============================================================================

/**
 * Initial or resolved state has a type the registry does not know.
 */
export class InvalidStateError extends Data.TaggedError("InvalidStateError")<{
  readonly message: string;
  readonly stateType: string;
}> {}

/**
 * A rule body threw, failed or died.
 */
export class RuleEvaluationError extends Data.TaggedError("RuleEvaluationError")<{
  readonly message: string;
  /** Concrete state the machine was in */
  readonly stateType: string;
  /** State type that declared the failing rule */
  readonly ruleOwner: string;
  readonly event: string;
  readonly cause?: unknown;
}> {}

/**
 * A lifecycle hook threw, failed or died. Reported, never propagated.
 */
export class HookError extends Data.TaggedError("HookError")<{
  readonly message: string;
  readonly kind: HookKind;
  readonly stateType: string;
  readonly cause?: unknown;
}> {}

/**
 * An event was submitted to a stopped machine, or was still queued when the
 * machine stopped.
 */
export class MachineStoppedError extends Data.TaggedError("MachineStoppedError")<{
  readonly message: string;
  readonly machineId: string;
}> {}

/**
 * Errors a single submitted event can end with.
 */
export type SubmitError = RuleEvaluationError | InvalidStateError | MachineStoppedError;

/**
 * Everything delivered to `onError` listeners.
 */
export type MachineError = SubmitError | HookError;
