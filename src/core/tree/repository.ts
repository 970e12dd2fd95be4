/**
 * Question repository - CRUD operations for the questions table.
 */

import type Database from 'better-sqlite3';
import type { QuestionRecord, QuestionRow } from './types.js';

/**
 * Convert a database row to a QuestionRecord.
 */
function rowToRecord(row: QuestionRow): QuestionRecord {
  return {
    id: row.id,
    question: row.question,
    answer: row.answer,
    parentId: row.parent_id,
    createdAt: row.created_at,
  };
}

export interface QuestionQueryOptions {
  /** true: answered only, false: unanswered only */
  answered?: boolean;
  /** Only direct children of this id */
  parentId?: number;
}

/**
 * Question repository.
 * Every method is a single statement, so each write is committed on return.
 */
export class QuestionRepository {
  constructor(private readonly db: Database.Database) {}

  /**
   * Insert a question and return its new id.
   */
  insert(question: string, parentId: number | null): number {
    const result = this.db.prepare(
      'INSERT INTO questions (question, answer, parent_id) VALUES (?, NULL, ?)'
    ).run(question, parentId);
    return Number(result.lastInsertRowid);
  }

  /**
   * Get a question by id.
   */
  get(id: number): QuestionRecord | null {
    const row = this.db.prepare(
      'SELECT * FROM questions WHERE id = ?'
    ).get(id) as QuestionRow | undefined;
    return row ? rowToRecord(row) : null;
  }

  /**
   * Get all questions matching query options, in id order.
   */
  query(options: QuestionQueryOptions = {}): QuestionRecord[] {
    let sql = 'SELECT * FROM questions WHERE 1=1';
    const params: number[] = [];

    if (options.answered === true) {
      sql += ' AND answer IS NOT NULL';
    } else if (options.answered === false) {
      sql += ' AND answer IS NULL';
    }

    if (options.parentId !== undefined) {
      sql += ' AND parent_id = ?';
      params.push(options.parentId);
    }

    sql += ' ORDER BY id';

    const rows = this.db.prepare(sql).all(...params) as QuestionRow[];
    return rows.map(rowToRecord);
  }

  /**
   * Set the answer of a question.
   * Returns false when no row has the id.
   */
  updateAnswer(id: number, answer: string): boolean {
    const result = this.db.prepare(
      'UPDATE questions SET answer = ? WHERE id = ?'
    ).run(answer, id);
    return result.changes > 0;
  }

  /**
   * Delete a question with no children.
   * Returns false when no such row exists.
   */
  deleteLeaf(id: number): boolean {
    const result = this.db.prepare(
      'DELETE FROM questions WHERE id = ? AND NOT EXISTS (SELECT 1 FROM questions WHERE parent_id = ?)'
    ).run(id, id);
    return result.changes > 0;
  }

  /**
   * Id and parent id of every question, for building the structural view.
   */
  links(): Array<{ id: number; parentId: number | null }> {
    const rows = this.db.prepare(
      'SELECT id, parent_id FROM questions ORDER BY id'
    ).all() as Array<{ id: number; parent_id: number | null }>;
    return rows.map(row => ({ id: row.id, parentId: row.parent_id }));
  }

  /**
   * Check if a question exists.
   */
  exists(id: number): boolean {
    const row = this.db.prepare(
      'SELECT 1 FROM questions WHERE id = ?'
    ).get(id);
    return row !== undefined;
  }

  /**
   * Count questions.
   */
  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) as count FROM questions').get() as { count: number };
    return row.count;
  }
}
