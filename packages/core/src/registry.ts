import { StateBuilder } from "./builder.js";
import { DuplicateStateError, RegistrySealedError, UnknownParentError } from "./errors.js";
import type {
  HookByKind,
  HookKind,
  MachineEvent,
  MachineState,
  StateNode,
  StateType,
  TransitionRule,
} from "./types.js";

/**
 * Callback receiving the builder of a freshly declared state.
 */
export type ConfigureState<S extends MachineState, E extends MachineEvent> = (
  builder: StateBuilder<S, E>
) => void;

// ============================================================================
// State Registry
// ============================================================================

/**
 * The declared tree of state types, their rules and their hooks.
 *
 * Declaration is depth-first: a parent must exist before its children.
 * Since a child can only point at an already declared node, the tree can
 * never contain a cycle. Once sealed the registry is read-only and may be
 * shared by every actor interpreted from the same definition.
 *
 * @example
 * ```ts
 * const registry = new StateRegistry<PlayerState, PlayerEvent>()
 *   .declare("Idle", (idle) => idle.on("Play", () => new Playing({ position: 0 })))
 *   .declare("Started", (started) => {
 *     started.declare("Playing", (playing) =>
 *       playing.on("Pause", () => new Paused({ position: 0 }))
 *     );
 *     started.declare("Paused");
 *   });
 * ```
 */
export class StateRegistry<S extends MachineState, E extends MachineEvent> {
  private readonly nodes = new Map<string, StateNode<S>>();
  private sealed = false;

  declare(stateType: StateType<S>, configure?: ConfigureState<S, E>): this;
  declare(
    stateType: StateType<S>,
    parentType: StateType<S> | undefined,
    configure?: ConfigureState<S, E>
  ): this;
  declare(
    stateType: string,
    parentOrConfigure?: string | ConfigureState<S, E>,
    maybeConfigure?: ConfigureState<S, E>
  ): this {
    const parentType = typeof parentOrConfigure === "string" ? parentOrConfigure : undefined;
    const configure = typeof parentOrConfigure === "function" ? parentOrConfigure : maybeConfigure;

    this.assertOpen(stateType);

    if (this.nodes.has(stateType)) {
      throw new DuplicateStateError({
        message: `State "${stateType}" is already declared`,
        stateType,
      });
    }

    let parent: StateNode<S> | undefined;
    if (parentType !== undefined) {
      parent = this.nodes.get(parentType);
      if (!parent) {
        throw new UnknownParentError({
          message: `Cannot declare "${stateType}" under undeclared parent "${parentType}"`,
          stateType,
          parentType,
        });
      }
    }

    const node: StateNode<S> = {
      stateType,
      parent: parent ? parent.stateType : null,
      depth: parent ? parent.depth + 1 : 0,
      children: [],
      rules: [],
      hooks: { enter: [], exit: [], change: [] },
    };
    this.nodes.set(stateType, node);
    parent?.children.push(stateType);

    configure?.(new StateBuilder(this, node));
    return this;
  }

  /**
   * Make the registry read-only. Idempotent.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /** @internal used by StateBuilder before every mutation */
  assertOpen(stateType: string): void {
    if (this.sealed) {
      throw new RegistrySealedError({
        message: `Cannot modify "${stateType}": the registry is sealed`,
        stateType,
      });
    }
  }

  has(stateType: string): boolean {
    return this.nodes.has(stateType);
  }

  get(stateType: string): StateNode<S> | undefined {
    return this.nodes.get(stateType);
  }

  /**
   * Declared state types, in declaration order.
   */
  stateTypes(): ReadonlyArray<string> {
    return [...this.nodes.keys()];
  }

  /**
   * Path from `stateType` up to its root, leaf first. Empty when undeclared.
   */
  ancestryOf(stateType: string): ReadonlyArray<string> {
    const ancestry: string[] = [];
    let node = this.nodes.get(stateType);
    while (node) {
      ancestry.push(node.stateType);
      node = node.parent === null ? undefined : this.nodes.get(node.parent);
    }
    return ancestry;
  }

  /**
   * True when `ancestor` is `stateType` itself or one of its ancestors.
   */
  isDescendantOf(stateType: string, ancestor: string): boolean {
    return this.ancestryOf(stateType).includes(ancestor);
  }

  /**
   * Candidate rules for a concrete state type: its own rules first, then
   * its parent's, then the grandparent's. Registration order within a level.
   */
  rulesFor(stateType: string): ReadonlyArray<TransitionRule<S>> {
    return this.ancestryOf(stateType).flatMap((level) => this.nodes.get(level)?.rules ?? []);
  }

  /**
   * Hooks of one kind registered on exactly this level, in registration order.
   */
  hooksFor<K extends HookKind>(stateType: string, kind: K): ReadonlyArray<HookByKind<S>[K]> {
    const node = this.nodes.get(stateType);
    return node ? node.hooks[kind] : [];
  }
}
