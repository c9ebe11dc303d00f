import { ConfigurationError, CycleError } from "@faultmap/errors";
import { z } from "zod";
import type { ErrorTag } from "./types.js";

const TagSchema = z.string().min(1, "Tag must be a non-empty string");

function validateTag(value: unknown, field: string): ErrorTag {
  const result = TagSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(
      `invalid tag ${JSON.stringify(value)}`,
      result.error.issues.map((issue) => ({ field, message: issue.message, code: issue.code })),
    );
  }
  return result.data;
}

/**
 * Breadth-first closure over one direction of the derivation relation.
 * Nearest tags come first; `start` itself is never included.
 */
function closure(edges: ReadonlyMap<ErrorTag, ReadonlySet<ErrorTag>>, start: ErrorTag): Set<ErrorTag> {
  const reached = new Set<ErrorTag>();
  const queue: ErrorTag[] = [start];
  for (let i = 0; i < queue.length; i++) {
    const tag = queue[i];
    if (tag === undefined) break;
    for (const next of edges.get(tag) ?? []) {
      if (next === start || reached.has(next)) continue;
      reached.add(next);
      queue.push(next);
    }
  }
  return reached;
}

/**
 * Append-only "derives from" graph between error tags.
 *
 * Owned by the pipeline configuration and passed explicitly to the
 * dispatcher. Writes happen at setup; call `freeze()` once setup is done
 * to reject later writes.
 */
export class TagHierarchy {
  private readonly parentEdges = new Map<ErrorTag, Set<ErrorTag>>();
  private readonly childEdges = new Map<ErrorTag, Set<ErrorTag>>();
  private frozen = false;

  /**
   * Build a hierarchy from `[child, parent]` pairs, applied in order.
   */
  static from(edges: Iterable<readonly [ErrorTag, ErrorTag]>): TagHierarchy {
    const hierarchy = new TagHierarchy();
    for (const [child, parent] of edges) {
      hierarchy.derive(child, parent);
    }
    return hierarchy;
  }

  /**
   * Record that `child` derives from `parent`.
   * Adding an existing edge is a no-op, frozen or not.
   *
   * @throws CycleError if the edge would make the graph cyclic (hierarchy unchanged)
   * @throws ConfigurationError if the hierarchy is frozen or a tag is empty
   */
  derive(child: ErrorTag, parent: ErrorTag): this {
    validateTag(child, "child");
    validateTag(parent, "parent");
    if (this.parentEdges.get(child)?.has(parent)) {
      return this;
    }
    if (this.frozen) {
      throw new ConfigurationError(
        `tag hierarchy is frozen; cannot derive '${child}' from '${parent}'`,
      );
    }
    if (this.isA(parent, child)) {
      throw new CycleError(child, parent);
    }

    let parents = this.parentEdges.get(child);
    if (!parents) {
      parents = new Set();
      this.parentEdges.set(child, parents);
    }
    parents.add(parent);

    let children = this.childEdges.get(parent);
    if (!children) {
      children = new Set();
      this.childEdges.set(parent, children);
    }
    children.add(child);

    return this;
  }

  /** Direct parents of a tag */
  parents(tag: ErrorTag): ReadonlySet<ErrorTag> {
    return new Set(this.parentEdges.get(tag));
  }

  /** Tags reachable through parent edges, nearest first, excluding `tag` */
  ancestors(tag: ErrorTag): ReadonlySet<ErrorTag> {
    return closure(this.parentEdges, tag);
  }

  /** Tags reachable through child edges, nearest first, excluding `tag` */
  descendants(tag: ErrorTag): ReadonlySet<ErrorTag> {
    return closure(this.childEdges, tag);
  }

  /** True when `child` is `parent` or derives from it transitively */
  isA(child: ErrorTag, parent: ErrorTag): boolean {
    return child === parent || this.ancestors(child).has(parent);
  }

  /** Every tag that appears in at least one edge */
  tags(): ErrorTag[] {
    return [...new Set([...this.parentEdges.keys(), ...this.childEdges.keys()])];
  }

  /** Reject all further `derive` calls */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}
