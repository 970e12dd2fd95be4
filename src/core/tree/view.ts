/**
 * In-memory structural view of the question forest.
 *
 * Built from the flat (id, parent_id) table. Holds structure only, never
 * answers, so answer updates never invalidate it.
 */
import { TreeReferenceError, ErrorCodes } from '../../utils/errors.js';
import type { NodeShape } from './types.js';

export interface TreeLink {
  id: number;
  parentId: number | null;
}

export class TreeView {
  private readonly childIndex = new Map<number, number[]>();
  private readonly depths = new Map<number, number>();
  private readonly descendantCounts = new Map<number, number>();
  readonly roots: number[] = [];

  private constructor(links: TreeLink[]) {
    const ids = new Set(links.map(link => link.id));

    for (const link of links) {
      this.childIndex.set(link.id, this.childIndex.get(link.id) ?? []);
      if (link.parentId === null) {
        this.roots.push(link.id);
        continue;
      }
      if (!ids.has(link.parentId)) {
        throw new TreeReferenceError(
          ErrorCodes.PARENT_NOT_FOUND,
          `Question ${link.id} references missing parent ${link.parentId}`,
          { id: link.id, parentId: link.parentId }
        );
      }
      const siblings = this.childIndex.get(link.parentId);
      if (siblings) {
        siblings.push(link.id);
      } else {
        this.childIndex.set(link.parentId, [link.id]);
      }
    }

    // Breadth-first from the roots: anything not reached sits on a cycle.
    const order: number[] = [];
    for (const root of this.roots) {
      this.depths.set(root, 0);
      order.push(root);
    }
    for (let i = 0; i < order.length; i++) {
      const id = order[i];
      const depth = this.depths.get(id) ?? 0;
      for (const child of this.childIndex.get(id) ?? []) {
        this.depths.set(child, depth + 1);
        order.push(child);
      }
    }

    if (order.length !== ids.size) {
      const cycle = [...ids].filter(id => !this.depths.has(id));
      throw new TreeReferenceError(
        ErrorCodes.CYCLE_DETECTED,
        `Parent chain cycle among questions ${cycle.join(', ')}`,
        { ids: cycle }
      );
    }

    for (let i = order.length - 1; i >= 0; i--) {
      const id = order[i];
      let total = 0;
      for (const child of this.childIndex.get(id) ?? []) {
        total += 1 + (this.descendantCounts.get(child) ?? 0);
      }
      this.descendantCounts.set(id, total);
    }
  }

  /**
   * Build a view, validating parent references and acyclicity.
   *
   * @throws TreeReferenceError on a dangling parent or a cycle
   */
  static fromLinks(links: TreeLink[]): TreeView {
    return new TreeView(links);
  }

  get size(): number {
    return this.depths.size;
  }

  has(id: number): boolean {
    return this.depths.has(id);
  }

  /**
   * Direct children in insertion order.
   */
  children(id: number): number[] {
    return [...(this.childIndex.get(id) ?? [])];
  }

  depth(id: number): number {
    return this.depths.get(id) ?? 0;
  }

  descendantCount(id: number): number {
    return this.descendantCounts.get(id) ?? 0;
  }

  shape(id: number): NodeShape {
    return {
      id,
      depth: this.depth(id),
      descendantCount: this.descendantCount(id),
      childCount: this.childIndex.get(id)?.length ?? 0,
    };
  }

  /**
   * Every node id, parents before children.
   */
  ids(): number[] {
    return [...this.depths.keys()];
  }
}
