/**
 * QuestionAnswerSystem - the façade over the question tree, the knowledge
 * base and the synchronizer.
 *
 * add/answer write the tree first and then mirror the change into the
 * knowledge base straight away. A question whose entry cannot be indexed
 * is taken out of the tree again; an answer that cannot be mirrored stays
 * in the tree for a later tree-to-kb sync.
 */
import type Database from 'better-sqlite3';
import { QuestionTree } from '../tree/tree.js';
import type { PriorityScorer } from '../tree/types.js';
import { QuestionAnswerKB, type KbQueryOptions } from '../kb/knowledge-base.js';
import type { KbMatch } from '../kb/types.js';
import type { QaPair } from '../../llm/types.js';
import { SqliteVectorStore } from '../kb/sqlite-store.js';
import { createEmbedder } from '../kb/embedder.js';
import { Synchronizer, type SyncReport } from '../sync/synchronizer.js';
import { getDb, closeDb } from '../db/manager.js';
import { initializeTreeSchema, initializeVectorSchema } from '../db/schema.js';
import { resolveStoragePaths } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { getAvailableProvider } from '../../llm/providers/factory.js';
import type { Credentials } from '../../utils/credentials.js';
import { logger as rootLogger } from '../../utils/logger.js';

const log = rootLogger.child('service');

export interface QuestionSummary {
  id: number;
  question: string;
  parentId: number | null;
}

export interface AnsweredQuestionSummary extends QuestionSummary {
  answer: string;
}

export interface SuggestedQuestion extends QuestionSummary {
  priority: number;
}

export interface QuestionAnswerSystemOptions {
  /** Rewordings indexed alongside each added question */
  numRewordings?: number;
  /** Default result count for query() */
  nResults?: number;
  /** Releases whatever the system was opened on */
  onClose?: () => void;
}

export class QuestionAnswerSystem {
  private readonly synchronizer: Synchronizer;
  private readonly numRewordings: number;
  private readonly nResults: number;
  private readonly onClose?: () => void;

  constructor(
    readonly tree: QuestionTree,
    readonly kb: QuestionAnswerKB,
    options: QuestionAnswerSystemOptions = {}
  ) {
    this.synchronizer = new Synchronizer(tree, kb);
    this.numRewordings = options.numRewordings ?? 0;
    this.nResults = options.nResults ?? 5;
    this.onClose = options.onClose;
  }

  /**
   * Add a question to the tree and index it in the knowledge base.
   * Nothing is stored when indexing fails.
   *
   * @throws TreeReferenceError when parentId is unknown
   */
  async addQuestion(question: string, parentId?: number | null): Promise<number> {
    const id = this.tree.addQuestion(question, parentId);
    try {
      await this.kb.addTreeQuestion(question, id, null, this.numRewordings);
    } catch (error) {
      this.tree.removeQuestion(id);
      log.debug(`Question ${id} removed after indexing failed`);
      throw error;
    }
    log.debug(`Question ${id} indexed`);
    return id;
  }

  /**
   * Answer a question in the tree and push the answer to its tagged entries.
   *
   * @throws NotFoundError when the id is unknown or has no tagged entry
   */
  async answerQuestion(id: number, answer: string): Promise<void> {
    this.tree.updateAnswer(id, answer);
    await this.kb.updateTreeQuestion(id, answer);
  }

  getUnansweredQuestions(): QuestionSummary[] {
    return this.tree.getUnansweredQuestions().map(({ id, question, parentId }) => ({
      id,
      question,
      parentId,
    }));
  }

  getAnsweredQuestions(): AnsweredQuestionSummary[] {
    return this.tree.getAnsweredQuestions().flatMap(({ id, question, parentId, answer }) =>
      answer === null ? [] : [{ id, question, parentId, answer }]
    );
  }

  syncKbToTree(): Promise<SyncReport> {
    return this.synchronizer.syncKbToTree();
  }

  syncTreeToKb(): Promise<SyncReport> {
    return this.synchronizer.syncTreeToKb();
  }

  /**
   * Recompute priorities and return the best unanswered question, or null
   * when the tree is empty or fully answered.
   */
  suggestNextQuestion(): SuggestedQuestion | null {
    this.tree.buildTree();
    this.tree.calculatePriorities();

    const next = this.tree.getHighPriorityQuestions().find(node => node.answer === null);
    if (!next) return null;

    return {
      id: next.id,
      question: next.question,
      parentId: next.parentId,
      priority: next.priority,
    };
  }

  query(question: string | string[], options: KbQueryOptions = {}): Promise<KbMatch[]> {
    return this.kb.query(question, { ...options, nResults: options.nResults ?? this.nResults });
  }

  /**
   * Extract QA pairs from prose and index each one. Returns the pairs added.
   */
  async ingestText(text: string): Promise<QaPair[]> {
    const pairs = await this.kb.generateQaPairs(text);
    for (const pair of pairs) {
      await this.kb.addQa(pair.q, pair.a);
    }
    log.info(`Ingested ${pairs.length} QA pairs`);
    return pairs;
  }

  close(): void {
    this.onClose?.();
  }
}

export interface OpenSystemOptions {
  scorer?: PriorityScorer;
}

/**
 * Open the system on the databases named by configuration.
 */
export async function openQuestionAnswerSystem(
  projectRoot: string,
  config: Config,
  credentials: Credentials = {},
  options: OpenSystemOptions = {}
): Promise<QuestionAnswerSystem> {
  const { treeDbPath, vectorDbPath } = resolveStoragePaths(projectRoot, config);
  log.debug(`Tree database: ${treeDbPath}`);
  log.debug(`Vector database: ${vectorDbPath}`);

  const treeDb: Database.Database = getDb(treeDbPath, initializeTreeSchema);
  const vectorDb: Database.Database = getDb(vectorDbPath, initializeVectorSchema);
  const close = (): void => {
    closeDb(treeDbPath);
    closeDb(vectorDbPath);
  };

  try {
    const store = new SqliteVectorStore(vectorDb, createEmbedder(config.embedding, credentials));
    const kb = await QuestionAnswerKB.open(store, config.storage.collection, {
      provider: getAvailableProvider(config.llm.default_provider, config.llm, credentials),
      rewordingModel: config.llm.rewording_model,
      qaPairsModel: config.llm.qa_pairs_model,
      maxRetries: config.extraction.max_retries,
    });
    const tree = new QuestionTree(treeDb, { scorer: options.scorer });

    return new QuestionAnswerSystem(tree, kb, {
      numRewordings: config.retrieval.num_rewordings,
      nResults: config.retrieval.n_results,
      onClose: close,
    });
  } catch (error) {
    close();
    throw error;
  }
}
