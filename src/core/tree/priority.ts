/**
 * Priority ranking over the tree's shape.
 *
 * Broad, shallow questions gate more of the tree than narrow, deep ones and
 * should be asked first. Scores depend on structure only, never on answers.
 */
import type { NodeShape, PriorityScorer, QuestionNode } from './types.js';
import type { TreeView } from './view.js';

/**
 * Default scorer: (descendants + 1) / (depth + 1).
 * Increases with subtree size, decreases with depth.
 */
export const structuralPriority: PriorityScorer = ({ descendantCount, depth }: NodeShape) =>
  (descendantCount + 1) / (depth + 1);

/**
 * Score every node of a view in one pass.
 * Returns a fresh map; callers replace their previous map wholesale.
 */
export function calculatePriorities(
  view: TreeView,
  scorer: PriorityScorer = structuralPriority
): Map<number, number> {
  const priorities = new Map<number, number>();
  for (const id of view.ids()) {
    priorities.set(id, scorer(view.shape(id)));
  }
  return priorities;
}

/**
 * Order nodes by priority, highest first, ties by ascending id.
 */
export function rankByPriority(nodes: QuestionNode[], limit?: number): QuestionNode[] {
  const ranked = [...nodes].sort((a, b) => b.priority - a.priority || a.id - b.id);
  return limit === undefined ? ranked : ranked.slice(0, Math.max(0, limit));
}
