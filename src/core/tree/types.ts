/**
 * Type definitions for the question tree.
 */

/**
 * A question in the tree.
 */
export interface QuestionNode {
  /** Unique, monotonically assigned id */
  id: number;
  /** Question text (never empty) */
  question: string;
  /** Answer text, null while unanswered */
  answer: string | null;
  /** Parent question id, null for a root */
  parentId: number | null;
  /** Last computed priority; 0 until priorities are calculated */
  priority: number;
  /** When the question was stored */
  createdAt: string;
}

/**
 * Raw database row from the questions table.
 */
export interface QuestionRow {
  id: number;
  question: string;
  answer: string | null;
  parent_id: number | null;
  created_at: string;
}

/**
 * A persisted question without derived fields.
 */
export type QuestionRecord = Omit<QuestionNode, 'priority'>;

/**
 * Structural facts about one node, as consumed by priority scorers.
 */
export interface NodeShape {
  id: number;
  /** 0 for a root */
  depth: number;
  /** All transitive children */
  descendantCount: number;
  /** Direct children */
  childCount: number;
}

/**
 * Computes a priority score from a node's position in the tree.
 */
export type PriorityScorer = (shape: NodeShape) => number;
