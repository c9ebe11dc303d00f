import { ConflictError } from "./bases/conflict-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Configuration invalid
// ---------------------------------------------------------------------------

/**
 * Thrown at setup time when a handler registry or interceptor cannot be built,
 * most notably when no `default` handler is reachable after merging tables.
 *
 * Never recovered from automatically.
 */
export class ConfigurationError extends ValidationError<"CONFIGURATION_INVALID"> {
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
  ) {
    super({
      code: "CONFIGURATION_INVALID",
      message: `Invalid exception configuration: ${message}`,
      ...(metadata ? { metadata } : {}),
      ...(issues ? { issues } : {}),
    });
  }
}

// ---------------------------------------------------------------------------
// Hierarchy cycle
// ---------------------------------------------------------------------------

/**
 * Thrown when deriving `child` from `parent` would make the tag hierarchy cyclic.
 * The hierarchy is left exactly as it was before the call.
 */
export class CycleError extends ConflictError<"HIERARCHY_CYCLE"> {
  readonly child: string;
  readonly parent: string;

  constructor(child: string, parent: string) {
    super({
      code: "HIERARCHY_CYCLE",
      message:
        child === parent
          ? `Tag '${child}' cannot derive from itself`
          : `Deriving '${child}' from '${parent}' would create a cycle ('${parent}' already derives from '${child}')`,
      metadata: { child, parent },
    });
    this.child = child;
    this.parent = parent;
  }
}
