/**
 * State Tree Description
 *
 * Static view of a machine definition, for documentation, visualization
 * and sanity checks. Rule bodies are never invoked, so targets are unknown;
 * only the declared tree, event labels and hook counts are reported.
 */

import type { MachineDefinition } from "./machine.js";
import type { HookKind, MachineEvent, MachineState } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface StateDescription {
  readonly stateType: string;
  readonly parent: string | null;
  readonly children: readonly string[];
  readonly depth: number;
  /** Event labels of the rules declared on this level, registration order */
  readonly events: readonly string[];
  readonly hooks: Readonly<Record<HookKind, number>>;
}

export interface MachineDescription {
  readonly id: string;
  readonly states: Readonly<Record<string, StateDescription>>;
  /** Root-level state types, declaration order */
  readonly roots: readonly string[];
  /** State types without children, declaration order */
  readonly leaves: readonly string[];
  /**
   * Events handled while in `stateType`, including inherited ones, in
   * evaluation order and without duplicates.
   */
  getEventsForState(stateType: string): readonly string[];
  /** Path from `stateType` to its root, leaf first */
  getAncestry(stateType: string): readonly string[];
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Describe the declared tree of a machine.
 *
 * @example
 * ```ts
 * const description = describeMachine(player);
 * description.roots                        // ["Idle", "Started"]
 * description.getEventsForState("Playing") // ["Pause", "Stop"]
 * ```
 */
export function describeMachine<S extends MachineState, E extends MachineEvent>(
  definition: MachineDefinition<S, E>
): MachineDescription {
  const { registry } = definition;
  const states: Record<string, StateDescription> = {};

  for (const stateType of registry.stateTypes()) {
    const node = registry.get(stateType);
    if (!node) continue;

    states[stateType] = {
      stateType,
      parent: node.parent,
      children: [...node.children],
      depth: node.depth,
      events: node.rules.map((rule) => rule.event),
      hooks: {
        enter: node.hooks.enter.length,
        exit: node.hooks.exit.length,
        change: node.hooks.change.length,
      },
    };
  }

  const described = Object.values(states);

  return {
    id: definition.id,
    states,
    roots: described
      .filter((state) => state.parent === null)
      .map((state) => state.stateType),
    leaves: described
      .filter((state) => state.children.length === 0)
      .map((state) => state.stateType),

    getEventsForState(stateType: string): readonly string[] {
      return Array.from(new Set(registry.rulesFor(stateType).map((rule) => rule.event)));
    },

    getAncestry(stateType: string): readonly string[] {
      return registry.ancestryOf(stateType);
    },
  };
}
