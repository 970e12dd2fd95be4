/**
 * QuestionTree - the persistent question hierarchy.
 *
 * Nodes live in SQLite; the structural view and the priority map are
 * derived in memory. The view is rebuilt only after a structural change,
 * the priority map only when calculatePriorities() is called.
 */
import type Database from 'better-sqlite3';
import { QuestionRepository } from './repository.js';
import { TreeView } from './view.js';
import { calculatePriorities, rankByPriority, structuralPriority } from './priority.js';
import type { PriorityScorer, QuestionNode, QuestionRecord } from './types.js';
import {
  NotFoundError,
  TreeReferenceError,
  ValidationError,
  ErrorCodes,
} from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';

const log = rootLogger.child('tree');

export interface QuestionTreeOptions {
  /** Replaces the default (descendants + 1) / (depth + 1) scorer */
  scorer?: PriorityScorer;
}

export class QuestionTree {
  private readonly repo: QuestionRepository;
  private readonly scorer: PriorityScorer;
  private priorities = new Map<number, number>();
  private view: TreeView | null = null;
  private structureVersion = 0;
  private viewVersion = -1;

  constructor(db: Database.Database, options: QuestionTreeOptions = {}) {
    this.repo = new QuestionRepository(db);
    this.scorer = options.scorer ?? structuralPriority;
  }

  /**
   * Add a question, optionally under a parent. Returns the new id.
   *
   * @throws TreeReferenceError when parentId does not name a stored question
   * @throws ValidationError when the text is empty
   */
  addQuestion(question: string, parentId?: number | null): number {
    if (question.trim().length === 0) {
      throw new ValidationError(ErrorCodes.INVALID_QUESTION, 'Question text must not be empty');
    }
    const parent = parentId ?? null;
    if (parent !== null && !this.repo.exists(parent)) {
      throw new TreeReferenceError(
        ErrorCodes.PARENT_NOT_FOUND,
        `Parent question ${parent} does not exist`,
        { parentId: parent }
      );
    }

    const id = this.repo.insert(question, parent);
    this.structureVersion++;
    log.debug(`Added question ${id}${parent === null ? '' : ` under ${parent}`}`);
    return id;
  }

  /**
   * @throws NotFoundError when the id is unknown
   */
  getQuestion(id: number): QuestionNode {
    return this.toNode(this.require(id));
  }

  /**
   * Direct children in insertion order.
   *
   * @throws NotFoundError when the id is unknown
   */
  getChildren(id: number): QuestionNode[] {
    this.require(id);
    return this.repo.query({ parentId: id }).map(record => this.toNode(record));
  }

  /**
   * Set or overwrite a question's answer. No history is kept.
   *
   * @throws NotFoundError when the id is unknown
   */
  updateAnswer(id: number, answer: string): void {
    if (!this.repo.updateAnswer(id, answer)) {
      throw this.notFound(id);
    }
    log.debug(`Answered question ${id}`);
  }

  /**
   * Delete a question that has no children.
   *
   * @throws NotFoundError when the id is unknown
   * @throws TreeReferenceError when other questions hang under it
   */
  removeQuestion(id: number): void {
    this.require(id);
    if (!this.repo.deleteLeaf(id)) {
      throw new TreeReferenceError(
        ErrorCodes.HAS_CHILDREN,
        `Question ${id} has child questions`,
        { id }
      );
    }
    this.structureVersion++;
    this.priorities.delete(id);
    log.debug(`Removed question ${id}`);
  }

  /**
   * @throws NotFoundError when the id is unknown
   */
  isAnswered(id: number): boolean {
    return this.require(id).answer !== null;
  }

  getUnansweredQuestions(): QuestionNode[] {
    return this.repo.query({ answered: false }).map(record => this.toNode(record));
  }

  getAnsweredQuestions(): QuestionNode[] {
    return this.repo.query({ answered: true }).map(record => this.toNode(record));
  }

  getAllQuestions(): QuestionNode[] {
    return this.repo.query().map(record => this.toNode(record));
  }

  /**
   * Materialize the structural view. Returns the cached view when nothing
   * structural changed since the last build.
   *
   * @throws TreeReferenceError when stored data has a dangling parent or a cycle
   */
  buildTree(): TreeView {
    if (this.view && this.viewVersion === this.structureVersion) {
      return this.view;
    }
    this.view = TreeView.fromLinks(this.repo.links());
    this.viewVersion = this.structureVersion;
    log.debug(`Built tree view with ${this.view.size} questions and ${this.view.roots.length} roots`);
    return this.view;
  }

  /**
   * Root questions of the current view, in id order. Null until buildTree() runs.
   */
  get roots(): QuestionNode[] | null {
    if (!this.view) return null;
    return this.view.roots.map(id => this.getQuestion(id));
  }

  /**
   * Recompute every node's priority from the tree's shape.
   */
  calculatePriorities(): void {
    this.priorities = calculatePriorities(this.buildTree(), this.scorer);
  }

  /**
   * Questions ranked by priority (highest first, ties by ascending id).
   * Before any calculatePriorities() call every priority is 0 and the
   * ranking is id order.
   */
  getHighPriorityQuestions(limit?: number): QuestionNode[] {
    return rankByPriority(this.getAllQuestions(), limit);
  }

  count(): number {
    return this.repo.count();
  }

  private require(id: number): QuestionRecord {
    const record = this.repo.get(id);
    if (!record) {
      throw this.notFound(id);
    }
    return record;
  }

  private notFound(id: number): NotFoundError {
    return new NotFoundError(
      ErrorCodes.QUESTION_NOT_FOUND,
      `Question ${id} not found`,
      { id }
    );
  }

  private toNode(record: QuestionRecord): QuestionNode {
    return { ...record, priority: this.priorities.get(record.id) ?? 0 };
  }
}
