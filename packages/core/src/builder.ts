import type { ConfigureState, StateRegistry } from "./registry.js";
import type {
  ChangeHook,
  EnterHook,
  EventByTag,
  EventClass,
  ExitHook,
  MachineEvent,
  MachineState,
  RuleBody,
  StateNode,
  StateType,
} from "./types.js";

type EventGuard<Ev extends MachineEvent> = (candidate: MachineEvent) => candidate is Ev;

const matchTag =
  <Ev extends MachineEvent>(tag: string): EventGuard<Ev> =>
  (candidate): candidate is Ev =>
    candidate._tag === tag;

const matchClass =
  <Ev extends MachineEvent>(eventClass: EventClass<Ev>): EventGuard<Ev> =>
  (candidate): candidate is Ev =>
    candidate instanceof eventClass;

// ============================================================================
// State Builder
// ============================================================================

/**
 * Configures one declared state. Handed to the `configure` callback of
 * `declare`; every method returns the builder so calls can be chained.
 *
 * @example
 * ```ts
 * $.declare("Started", (started) =>
 *   started
 *     .on("Stop", () => new Idle())
 *     .onEnter(() => Effect.log("started"))
 *     .declare("Playing", (playing) =>
 *       playing.on(Tick, (_, state) =>
 *         state._tag === "Playing" ? new Playing({ position: state.position + 1 }) : null
 *       )
 *     )
 * );
 * ```
 */
export class StateBuilder<S extends MachineState, E extends MachineEvent> {
  constructor(
    private readonly registry: StateRegistry<S, E>,
    private readonly node: StateNode<S>
  ) {}

  get stateType(): string {
    return this.node.stateType;
  }

  /**
   * Register a transition rule.
   *
   * With a tag, the rule matches events whose `_tag` equals it. With a class,
   * it matches any instance of that class, subclasses included.
   */
  on<K extends E["_tag"]>(event: K, body: RuleBody<S, EventByTag<E, K>>): this;
  on<Ev extends MachineEvent>(event: EventClass<Ev>, body: RuleBody<S, Ev>): this;
  on<Ev extends MachineEvent>(event: string | EventClass<Ev>, body: RuleBody<S, Ev>): this {
    this.registry.assertOpen(this.node.stateType);

    const matches = typeof event === "string" ? matchTag<Ev>(event) : matchClass(event);

    this.node.rules.push({
      owner: this.node.stateType,
      event: typeof event === "string" ? event : event.name,
      order: this.node.rules.length,
      matches,
      run: (candidate, state) => (matches(candidate) ? body(candidate, state) : null),
    });
    return this;
  }

  onEnter(hook: EnterHook<S>): this {
    this.registry.assertOpen(this.node.stateType);
    this.node.hooks.enter.push(hook);
    return this;
  }

  /**
   * Fires when the machine stays in this exact state type but the payload changes.
   */
  onChange(hook: ChangeHook<S>): this {
    this.registry.assertOpen(this.node.stateType);
    this.node.hooks.change.push(hook);
    return this;
  }

  onExit(hook: ExitHook<S>): this {
    this.registry.assertOpen(this.node.stateType);
    this.node.hooks.exit.push(hook);
    return this;
  }

  /**
   * Declare a child state nested under this one.
   */
  declare(stateType: StateType<S>, configure?: ConfigureState<S, E>): this {
    this.registry.declare(stateType, this.node.stateType, configure);
    return this;
  }
}
