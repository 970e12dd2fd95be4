/**
 * Reconciles answer state between the question tree and the tagged
 * entries of the knowledge base.
 *
 * Each pass scans everything and keeps going past per-node failures; the
 * failures come back in the report and are logged as warnings. Nothing is
 * deleted in either direction.
 */
import type { QuestionTree } from '../tree/tree.js';
import type { QuestionAnswerKB } from '../kb/knowledge-base.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';

const log = rootLogger.child('sync');

export type SyncDirection = 'kb-to-tree' | 'tree-to-kb';

export interface SyncFailure {
  treeId: number;
  error: string;
}

export interface SyncReport {
  direction: SyncDirection;
  /** Entries (kb-to-tree) or answered nodes (tree-to-kb) examined */
  scanned: number;
  /** Tree ids whose state changed, in scan order */
  updated: number[];
  failures: SyncFailure[];
}

export class Synchronizer {
  constructor(
    private readonly tree: QuestionTree,
    private readonly kb: QuestionAnswerKB
  ) {}

  /**
   * Copy answers from tagged entries into unanswered tree nodes.
   * Answered nodes are never overwritten.
   */
  async syncKbToTree(): Promise<SyncReport> {
    const report = this.emptyReport('kb-to-tree');
    const entries = await this.kb.getTreeQuestions();
    report.scanned = entries.length;

    for (const entry of entries) {
      if (entry.answer === null) continue;
      try {
        if (!this.tree.isAnswered(entry.treeId)) {
          this.tree.updateAnswer(entry.treeId, entry.answer);
          report.updated.push(entry.treeId);
        }
      } catch (error) {
        this.recordFailure(report, entry.treeId, error);
      }
    }

    this.logReport(report);
    return report;
  }

  /**
   * Copy every answered node's answer into all tagged entries with its id.
   */
  async syncTreeToKb(): Promise<SyncReport> {
    const report = this.emptyReport('tree-to-kb');
    const answered = this.tree.getAnsweredQuestions();
    report.scanned = answered.length;

    for (const node of answered) {
      if (node.answer === null) continue;
      try {
        const changed = await this.kb.updateTreeQuestion(node.id, node.answer);
        if (changed > 0) {
          report.updated.push(node.id);
        }
      } catch (error) {
        this.recordFailure(report, node.id, error);
      }
    }

    this.logReport(report);
    return report;
  }

  private emptyReport(direction: SyncDirection): SyncReport {
    return { direction, scanned: 0, updated: [], failures: [] };
  }

  private recordFailure(report: SyncReport, treeId: number, error: unknown): void {
    const message = errorMessage(error);
    report.failures.push({ treeId, error: message });
    log.warn(`${report.direction}: question ${treeId} failed: ${message}`);
  }

  private logReport(report: SyncReport): void {
    log.debug(
      `${report.direction}: scanned ${report.scanned}, updated ${report.updated.length}, failed ${report.failures.length}`
    );
  }
}
