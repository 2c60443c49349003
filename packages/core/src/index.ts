/**
 * statetree
 *
 * Hierarchical, event-driven state machines on Effect:
 * - States declared as a tree; inner states inherit and shadow outer rules
 * - Rules tried one at a time, first non-null state wins
 * - Synchronous or Effect-returning rule bodies
 * - Fire-and-forget enter / change / exit hooks ordered by ancestry
 * - One event fully resolved before the next
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./registry.js";
export * from "./builder.js";
export * from "./evaluator.js";
export * from "./dispatcher.js";
export * from "./machine.js";
export * from "./graph.js";
export * from "./logging.js";

// Re-export namespaces for organization
import * as Machine from "./machine.js";
import * as Graph from "./graph.js";
export { Machine, Graph };
