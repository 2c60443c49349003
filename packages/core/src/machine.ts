import { Deferred, Effect, Fiber, Option, Queue, Runtime, Stream } from "effect";
import type { LogLevel, Scope } from "effect";
import { diffAndFire } from "./dispatcher.js";
import { InvalidStateError, MachineStoppedError } from "./errors.js";
import type { MachineError, SubmitError } from "./errors.js";
import { evaluate, isMatched } from "./evaluator.js";
import { resolveLogLevel, withMachineLogging } from "./logging.js";
import { StateRegistry } from "./registry.js";
import { sameState, transitioned, unchanged } from "./types.js";
import type { MachineEvent, MachineState, SubmitResult } from "./types.js";

// ============================================================================
// Machine Definition
// ============================================================================

export interface MachineDefinition<S extends MachineState, E extends MachineEvent> {
  readonly _tag: "MachineDefinition";
  readonly id: string;
  /** Sealed: every actor of this definition reads the same tree */
  readonly registry: StateRegistry<S, E>;
}

/**
 * Declare the state tree of a machine.
 *
 * `configure` runs once, synchronously; the registry is sealed right after,
 * so declaration errors (duplicate state, unknown parent) are thrown from here.
 *
 * @example
 * ```ts
 * class Idle extends Data.TaggedClass("Idle")<{}> {}
 * class Playing extends Data.TaggedClass("Playing")<{ readonly position: number }> {}
 * class Paused extends Data.TaggedClass("Paused")<{ readonly position: number }> {}
 * type PlayerState = Idle | Playing | Paused;
 *
 * const player = defineMachine<PlayerState, PlayerEvent>({ id: "player" }, ($) => {
 *   $.declare("Idle", (idle) => idle.on("Play", () => new Playing({ position: 0 })));
 *   $.declare("Started", (started) => {
 *     started.on("Stop", () => new Idle());
 *     started.declare("Playing", (playing) =>
 *       playing.on("Pause", (_, state) =>
 *         state._tag === "Playing" ? new Paused({ position: state.position }) : null
 *       )
 *     );
 *     started.declare("Paused");
 *   });
 * });
 * ```
 */
export function defineMachine<S extends MachineState, E extends MachineEvent>(
  options: { readonly id: string },
  configure: (registry: StateRegistry<S, E>) => void
): MachineDefinition<S, E> {
  const registry = new StateRegistry<S, E>();
  configure(registry);
  registry.seal();

  return {
    _tag: "MachineDefinition",
    id: options.id,
    registry,
  };
}

// ============================================================================
// Interpreter Types
// ============================================================================

export interface InterpretOptions<S extends MachineState, E extends MachineEvent> {
  /** Events fed into the queue in arrival order until the actor stops */
  readonly source?: Stream.Stream<E>;
  /** Called once per committed transition, in commit order */
  readonly publish?: (state: S) => void;
  /** Diagnostic sink for hook failures and failed fire-and-forget events */
  readonly onError?: (error: MachineError) => void;
  /** Overrides STATETREE_LOG_LEVEL for this actor */
  readonly logLevel?: LogLevel.LogLevel;
}

export interface MachineActor<S extends MachineState, E extends MachineEvent> {
  readonly id: string;
  /** Enqueue an event and return immediately. Failures go to `onError`. */
  readonly send: (event: E) => void;
  /** Enqueue an event and wait for its outcome. */
  readonly submit: (event: E) => Effect.Effect<SubmitResult<S>, SubmitError>;
  readonly getSnapshot: () => S;
  readonly currentState: () => S;
  readonly subscribe: (observer: (state: S) => void) => () => void;
  readonly onError: (handler: (error: MachineError) => void) => () => void;
  /** True when the current state is `stateType` or nested inside it */
  readonly matches: (stateType: string) => boolean;
  /**
   * Wait for the machine to reach a state matching the predicate. Fails with
   * MachineStoppedError when the actor is, or becomes, stopped first.
   *
   * @example
   * ```ts
   * const done = yield* actor.waitFor((state) => state._tag === "Done")
   * ```
   */
  readonly waitFor: (predicate: (state: S) => boolean) => Effect.Effect<S, MachineStoppedError>;
  /** Stop the actor and clean up resources */
  readonly stop: () => void;
  readonly isStopped: () => boolean;
}

interface Envelope<S extends MachineState, E extends MachineEvent> {
  readonly event: E;
  /** Present for `submit`, absent for `send` */
  readonly reply: Option.Option<Deferred.Deferred<SubmitResult<S>, SubmitError>>;
}

// ============================================================================
// Interpreter
// ============================================================================

/**
 * Start an actor in `initialState`.
 *
 * Fails with InvalidStateError when the initial state type is not declared.
 * Otherwise the initial state is committed, every level of its ancestry gets
 * its `onEnter` hooks (root first) and the actor starts taking events. The
 * actor stops when the surrounding scope closes.
 */
export const interpret = <S extends MachineState, E extends MachineEvent>(
  definition: MachineDefinition<S, E>,
  initialState: S,
  options?: InterpretOptions<S, E>
): Effect.Effect<MachineActor<S, E>, InvalidStateError, Scope.Scope> =>
  Effect.flatMap(resolveLogLevel(options?.logLevel), (level) =>
    createActor(definition, initialState, options).pipe(withMachineLogging(definition.id, level))
  );

function createActor<S extends MachineState, E extends MachineEvent>(
  definition: MachineDefinition<S, E>,
  initialState: S,
  options?: InterpretOptions<S, E>
): Effect.Effect<MachineActor<S, E>, InvalidStateError, Scope.Scope> {
  return Effect.gen(function* () {
    const { id, registry } = definition;

    if (!registry.has(initialState._tag)) {
      return yield* Effect.fail(
        new InvalidStateError({
          message: `Initial state "${initialState._tag}" is not declared in machine "${id}"`,
          stateType: initialState._tag,
        })
      );
    }

    const runFork = Runtime.runFork(yield* Effect.runtime<never>());

    let current = initialState;
    let stopped = false;

    const observers = new Set<(state: S) => void>();
    const errorHandlers = new Set<(error: MachineError) => void>();
    // Every submit still waiting for its outcome, queued or in flight
    const replies = new Set<Deferred.Deferred<SubmitResult<S>, SubmitError>>();
    // Pending waitFor calls, failed on stop
    const stopListeners = new Set<() => void>();
    if (options?.publish) observers.add(options.publish);
    if (options?.onError) errorHandlers.add(options.onError);

    const stoppedError = () =>
      new MachineStoppedError({ message: `Machine "${id}" is stopped`, machineId: id });

    // ==========================================================================
    // Sinks
    // ==========================================================================

    const report = (error: MachineError): Effect.Effect<void> =>
      Effect.logError(error.message).pipe(
        Effect.annotateLogs("error", error._tag),
        Effect.zipRight(
          Effect.forEach(
            [...errorHandlers],
            (handler) =>
              Effect.try(() => handler(error)).pipe(
                Effect.catchAll((cause) => Effect.logWarning("onError handler threw", cause))
              ),
            { discard: true }
          )
        )
      );

    const notifyObservers = (state: S): Effect.Effect<void> =>
      Effect.forEach(
        [...observers],
        (observer) =>
          Effect.try(() => observer(state)).pipe(
            Effect.catchAll((cause) => Effect.logWarning("Observer threw", cause))
          ),
        { discard: true }
      );

    const schedule = (effect: Effect.Effect<void>) => {
      runFork(effect);
    };

    // ==========================================================================
    // Event Processing
    // ==========================================================================

    const processEvent = (event: E) =>
      Effect.gen(function* () {
        const previous = current;
        const evaluation = yield* evaluate(registry, previous, event);

        if (!isMatched(evaluation) || sameState(previous, evaluation.state)) {
          return unchanged(previous);
        }

        const next = evaluation.state;
        if (!registry.has(next._tag)) {
          const owner = evaluation.rule.owner;
          return yield* Effect.fail(
            new InvalidStateError({
              message:
                `Rule for "${event._tag}" on "${owner}" ` +
                `produced undeclared state "${next._tag}"`,
              stateType: next._tag,
            })
          );
        }

        current = next;
        yield* Effect.logDebug(`"${previous._tag}" → "${next._tag}"`);

        diffAndFire(registry, Option.some(previous), Option.some(next), schedule, report);
        yield* notifyObservers(next);

        return transitioned(previous, next);
      }).pipe(
        Effect.annotateLogs({ state: current._tag, event: event._tag }),
        Effect.withLogSpan("statetree.event")
      );

    const handle = (envelope: Envelope<S, E>): Effect.Effect<void> =>
      Option.match(envelope.reply, {
        onNone: () => processEvent(envelope.event).pipe(Effect.asVoid, Effect.catchAll(report)),
        // Interrupted replies are failed by shutdown
        onSome: (reply) =>
          processEvent(envelope.event).pipe(
            Effect.exit,
            Effect.flatMap((exit) => Deferred.done(reply, exit)),
            Effect.asVoid
          ),
      });

    // ==========================================================================
    // Initialization
    // ==========================================================================

    diffAndFire(registry, Option.none(), Option.some(initialState), schedule, report);
    yield* Effect.logDebug(`Started in "${initialState._tag}"`);

    // One worker: an event is fully resolved before the next is taken
    const queue = yield* Queue.unbounded<Envelope<S, E>>();
    const worker = yield* Effect.forkDaemon(
      Effect.forever(Effect.flatMap(Queue.take(queue), handle))
    );

    let sourceFiber: Option.Option<Fiber.RuntimeFiber<void>> = Option.none();
    if (options?.source) {
      const fiber = yield* Effect.forkDaemon(
        Stream.runForEach(options.source, (event) =>
          Queue.offer(queue, { event, reply: Option.none() })
        )
      );
      sourceFiber = Option.some(fiber);
    }

    // ==========================================================================
    // Shutdown
    // ==========================================================================

    const shutdown: Effect.Effect<void> = Effect.gen(function* () {
      if (Option.isSome(sourceFiber)) {
        yield* Fiber.interrupt(sourceFiber.value);
      }
      yield* Fiber.interrupt(worker);
      yield* Queue.shutdown(queue);

      // Includes an envelope the worker took just before it was interrupted
      const unanswered = [...replies];
      replies.clear();
      for (const reply of unanswered) {
        yield* Deferred.fail(reply, stoppedError());
      }
      yield* Effect.logDebug(`Stopped in "${current._tag}"`);
    });

    const markStopped = (): boolean => {
      if (stopped) return false;
      stopped = true;
      observers.clear();
      for (const listener of [...stopListeners]) {
        listener();
      }
      stopListeners.clear();
      return true;
    };

    yield* Effect.addFinalizer(() =>
      Effect.suspend(() => (markStopped() ? shutdown : Effect.void))
    );

    // ==========================================================================
    // Actor API
    // ==========================================================================

    const actor: MachineActor<S, E> = {
      id,

      send: (event) => {
        if (stopped) return;
        queue.unsafeOffer({ event, reply: Option.none() });
      },

      submit: (event) =>
        Effect.suspend((): Effect.Effect<SubmitResult<S>, SubmitError> => {
          if (stopped) return Effect.fail(stoppedError());
          return Deferred.make<SubmitResult<S>, SubmitError>().pipe(
            Effect.tap((reply) =>
              Effect.suspend((): Effect.Effect<void> => {
                replies.add(reply);
                // unsafeOffer is false once the queue is shut down
                const accepted =
                  !stopped && queue.unsafeOffer({ event, reply: Option.some(reply) });
                return accepted ? Effect.void : Effect.asVoid(Deferred.fail(reply, stoppedError()));
              })
            ),
            Effect.flatMap((reply) =>
              Deferred.await(reply).pipe(
                Effect.ensuring(
                  Effect.sync(() => {
                    replies.delete(reply);
                  })
                )
              )
            )
          );
        }),

      getSnapshot: () => current,

      currentState: () => current,

      subscribe: (observer) => {
        observers.add(observer);
        return () => observers.delete(observer);
      },

      onError: (handler) => {
        errorHandlers.add(handler);
        return () => errorHandlers.delete(handler);
      },

      matches: (stateType) => registry.isDescendantOf(current._tag, stateType),

      waitFor: (predicate) =>
        Effect.suspend((): Effect.Effect<S, MachineStoppedError> => {
          if (stopped) {
            return Effect.fail(stoppedError());
          }
          if (predicate(current)) {
            return Effect.succeed(current);
          }

          return Effect.async<S, MachineStoppedError>((resume) => {
            const release = () => {
              observers.delete(observer);
              stopListeners.delete(onStop);
            };
            const observer = (state: S) => {
              if (predicate(state)) {
                release();
                resume(Effect.succeed(state));
              }
            };
            const onStop = () => {
              release();
              resume(Effect.fail(stoppedError()));
            };
            observers.add(observer);
            stopListeners.add(onStop);

            return Effect.sync(release);
          });
        }),

      stop: () => {
        if (markStopped()) {
          runFork(shutdown);
        }
      },

      isStopped: () => stopped,
    };

    return actor;
  });
}

export { defineMachine as define };
