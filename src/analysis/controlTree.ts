import { MissingMetadataError } from "../errors.js";
import type { ScopeId } from "./access.js";

interface ScopeNode {
  id: ScopeId;
  parent?: ScopeId;
  children: ScopeId[];
  pipelined: boolean;
}

export interface ScopeOptions {
  parent?: ScopeId;
  /** Stages of a pipelined scope overlap in time, so memories shared between them need N-buffering. */
  pipelined?: boolean;
}

/**
 * Controller hierarchy the accesses live in. Children keep declaration order,
 * which is also their pipeline stage order.
 */
export class ControlTree {
  private readonly scopes = new Map<ScopeId, ScopeNode>();

  addScope(id: ScopeId, options: ScopeOptions = {}): this {
    if (this.scopes.has(id)) {
      throw new Error(`Scope ${id} is already defined`);
    }
    if (options.parent !== undefined) {
      this.node(options.parent).children.push(id);
    }
    this.scopes.set(id, { id, parent: options.parent, children: [], pipelined: options.pipelined ?? false });
    return this;
  }

  has(id: ScopeId): boolean {
    return this.scopes.has(id);
  }

  parent(id: ScopeId): ScopeId | undefined {
    return this.node(id).parent;
  }

  children(id: ScopeId): readonly ScopeId[] {
    return this.node(id).children;
  }

  isPipelined(id: ScopeId): boolean {
    return this.node(id).pipelined;
  }

  /** The scope itself followed by every enclosing scope up to the root. */
  ancestors(id: ScopeId): ScopeId[] {
    const chain: ScopeId[] = [];
    let current: ScopeId | undefined = id;
    while (current !== undefined) {
      chain.push(current);
      current = this.node(current).parent;
    }
    return chain;
  }

  isWithin(scope: ScopeId, ancestor: ScopeId): boolean {
    return this.ancestors(scope).includes(ancestor);
  }

  lca(a: ScopeId, b: ScopeId): ScopeId | undefined {
    const seen = new Set(this.ancestors(a));
    return this.ancestors(b).find((scope) => seen.has(scope));
  }

  /**
   * Index of the child of `pipeline` that contains `scope`, or undefined when
   * the scope is not nested strictly inside the pipeline.
   */
  stageOf(pipeline: ScopeId, scope: ScopeId): number | undefined {
    const chain = this.ancestors(scope);
    const at = chain.indexOf(pipeline);
    if (at <= 0) {
      return undefined;
    }
    return this.node(pipeline).children.indexOf(chain[at - 1]);
  }

  private node(id: ScopeId): ScopeNode {
    const node = this.scopes.get(id);
    if (!node) {
      throw new MissingMetadataError("scope", `No control scope defined for ${id}`, { symbol: id });
    }
    return node;
  }
}
