/**
 * QuestionAnswerKB - question/answer pairs in a similarity-searchable collection.
 *
 * Each question text (and each rewording of it) is one document; the answer
 * rides along in the document's metadata under `answer`. Questions that
 * mirror a tree node carry `tree_id` and `from_tree: true` as well.
 */
import { randomUUID } from 'node:crypto';
import type {
  KbMatch,
  Metadata,
  MetadataFilter,
  TreeEntry,
  VectorCollection,
  VectorStore,
} from './types.js';
import type { CompletionProvider, QaPair } from '../../llm/types.js';
import { generateRewordings } from '../../llm/rewording.js';
import { generateQaPairs, DEFAULT_MAX_RETRIES } from '../../llm/qa-extractor.js';
import {
  ExternalServiceError,
  NotFoundError,
  ValidationError,
  ErrorCodes,
} from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';

const log = rootLogger.child('kb');

const ANSWER_KEY = 'answer';

export const DEFAULT_N_RESULTS = 5;

export interface KnowledgeBaseOptions {
  /** Needed for rewordings and QA-pair extraction only */
  provider?: CompletionProvider | null;
  rewordingModel?: string;
  qaPairsModel?: string;
  maxRetries?: number;
}

export interface KbQueryOptions {
  nResults?: number;
  metadataFilter?: MetadataFilter;
  numRewordings?: number;
}

/**
 * Serialize an answer for storage. Undefined for null/undefined, which
 * leaves the metadata without an answer key.
 */
export function serializeAnswer(answer: unknown): string | undefined {
  if (answer === null || answer === undefined) return undefined;
  if (typeof answer === 'string') return answer;
  if (typeof answer === 'object') return JSON.stringify(answer);
  return String(answer);
}

function withAnswer(metadata: Metadata, answer: string | undefined): Metadata {
  const rest = { ...metadata };
  delete rest[ANSWER_KEY];
  return answer === undefined ? rest : { ...rest, [ANSWER_KEY]: answer };
}

function answerOf(metadata: Metadata): string | null {
  const value = metadata[ANSWER_KEY];
  return value === undefined ? null : String(value);
}

function requireCount(label: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(
      ErrorCodes.INVALID_ARGUMENT,
      `${label} must be an integer >= ${min}, got ${value}`
    );
  }
}

export class QuestionAnswerKB {
  private readonly provider: CompletionProvider | null;
  private readonly rewordingModel?: string;
  private readonly qaPairsModel?: string;
  private readonly maxRetries: number;

  private constructor(
    private readonly store: VectorStore,
    private collection: VectorCollection,
    options: KnowledgeBaseOptions
  ) {
    this.provider = options.provider ?? null;
    this.rewordingModel = options.rewordingModel;
    this.qaPairsModel = options.qaPairsModel;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  }

  /**
   * Open (creating if needed) the named collection.
   */
  static async open(
    store: VectorStore,
    collectionName: string,
    options: KnowledgeBaseOptions = {}
  ): Promise<QuestionAnswerKB> {
    const collection = await store.getOrCreateCollection(collectionName);
    log.debug(`Opened collection '${collectionName}'`);
    return new QuestionAnswerKB(store, collection, options);
  }

  get collectionName(): string {
    return this.collection.name;
  }

  count(): Promise<number> {
    return this.collection.count();
  }

  /**
   * The question followed by `count` rewordings.
   *
   * @throws ExternalServiceError when no provider is configured or the call fails
   */
  async generateRewordings(question: string, count: number): Promise<string[]> {
    if (count === 0) return [question];
    return generateRewordings(this.requireProvider(), question, count, {
      model: this.rewordingModel,
    });
  }

  /**
   * Extract QA pairs from prose; [] when extraction keeps failing.
   *
   * @throws ExternalServiceError when no provider is configured
   */
  async generateQaPairs(text: string): Promise<QaPair[]> {
    return generateQaPairs(this.requireProvider(), text, {
      model: this.qaPairsModel,
      maxRetries: this.maxRetries,
    });
  }

  /**
   * Index a question (and its rewordings, or every entry of a list) with
   * one answer. Returns the set of indexed question texts.
   */
  async addQa(
    question: string | string[],
    answer: unknown,
    metadata: Metadata = {},
    numRewordings = 0
  ): Promise<Set<string>> {
    const questions = await this.expand(question, numRewordings);
    if (questions.length === 0) return new Set();

    const stored = withAnswer(metadata, serializeAnswer(answer));
    await this.collection.add({
      ids: questions.map(() => `qa_${randomUUID()}`),
      documents: questions,
      metadatas: questions.map(() => ({ ...stored })),
    });
    questions.forEach(q => log.debug(`Added question: ${q}`));
    return new Set(questions);
  }

  /**
   * Fan the question out, query each variant, keep the first hit per
   * distinct answer, and return the best `nResults` by similarity.
   */
  async query(question: string | string[], options: KbQueryOptions = {}): Promise<KbMatch[]> {
    const nResults = options.nResults ?? DEFAULT_N_RESULTS;
    requireCount('nResults', nResults, 1);
    const where = options.metadataFilter && Object.keys(options.metadataFilter).length > 0
      ? options.metadataFilter
      : undefined;

    const questions = await this.expand(question, options.numRewordings ?? 0);

    const matches: KbMatch[] = [];
    for (const q of questions) {
      log.debug(`Querying question: ${q}`);
      const [hits = []] = await this.collection.query({ queryTexts: [q], nResults, where });
      for (const hit of hits) {
        matches.push({
          id: hit.id,
          question: hit.document,
          answer: answerOf(hit.metadata),
          metadata: withAnswer(hit.metadata, undefined),
          similarity: 1 - hit.distance,
        });
      }
    }

    const seen = new Set<string | null>();
    const unique = matches.filter(match => {
      if (seen.has(match.answer)) return false;
      seen.add(match.answer);
      return true;
    });

    return unique
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, nResults);
  }

  /**
   * Overwrite the answer of the document nearest to `question`.
   *
   * @throws NotFoundError when the collection is empty
   */
  async updateAnswer(question: string, answer: unknown): Promise<void> {
    const [hits = []] = await this.collection.query({ queryTexts: [question], nResults: 1 });
    const nearest = hits[0];
    if (!nearest) {
      throw new NotFoundError(
        ErrorCodes.KB_QUESTION_NOT_FOUND,
        'Question not found in KB',
        { question }
      );
    }

    await this.collection.update({
      ids: [nearest.id],
      documents: [question],
      metadatas: [withAnswer(nearest.metadata, serializeAnswer(answer))],
    });
    log.info(`Answer to question '${question}' has been updated`);
  }

  async getAllQuestions(): Promise<string[]> {
    const docs = await this.collection.get();
    return docs.map(doc => doc.document);
  }

  /**
   * Delete every document; the collection itself stays. Returns the number removed.
   */
  async clear(): Promise<number> {
    const docs = await this.collection.get();
    const removed = await this.collection.delete(docs.map(doc => doc.id));
    log.debug(`Collection '${this.collection.name}' has been cleared`);
    return removed;
  }

  /**
   * Drop the collection and create it again.
   */
  async resetDatabase(): Promise<void> {
    const name = this.collection.name;
    if (await this.store.deleteCollection(name)) {
      log.debug(`Collection '${name}' has been deleted`);
    } else {
      log.debug(`Collection '${name}' did not exist`);
    }
    this.collection = await this.store.createCollection(name);
    log.debug(`Collection '${name}' has been recreated`);
  }

  /**
   * Index a question that mirrors tree node `treeId`.
   */
  async addTreeQuestion(
    question: string,
    treeId: number,
    answer?: string | null,
    numRewordings = 0
  ): Promise<Set<string>> {
    return this.addQa(question, answer ?? null, { tree_id: treeId, from_tree: true }, numRewordings);
  }

  /**
   * Every tagged tree entry, in insertion order.
   */
  async getTreeQuestions(): Promise<TreeEntry[]> {
    const docs = await this.collection.get({ where: { from_tree: true } });
    const entries: TreeEntry[] = [];
    for (const doc of docs) {
      const treeId = doc.metadata.tree_id;
      if (typeof treeId !== 'number') {
        log.warn(`Document ${doc.id} is tagged from_tree but has no numeric tree_id`);
        continue;
      }
      entries.push({ id: doc.id, treeId, question: doc.document, answer: answerOf(doc.metadata) });
    }
    return entries;
  }

  /**
   * Write `answer` into every entry tagged with `treeId`. Entries that
   * already hold that answer are left alone. Returns the number changed.
   *
   * @throws NotFoundError when no entry carries the tree id
   */
  async updateTreeQuestion(treeId: number, answer: string): Promise<number> {
    const docs = await this.collection.get({ where: { tree_id: treeId, from_tree: true } });
    if (docs.length === 0) {
      throw new NotFoundError(
        ErrorCodes.TREE_ENTRY_NOT_FOUND,
        `No knowledge base entry for tree question ${treeId}`,
        { treeId }
      );
    }

    const stale = docs.filter(doc => answerOf(doc.metadata) !== answer);
    if (stale.length > 0) {
      await this.collection.update({
        ids: stale.map(doc => doc.id),
        metadatas: stale.map(doc => withAnswer(doc.metadata, answer)),
      });
      log.debug(`Updated ${stale.length} entries for tree question ${treeId}`);
    }
    return stale.length;
  }

  private async expand(question: string | string[], numRewordings: number): Promise<string[]> {
    if (Array.isArray(question)) return question;
    requireCount('numRewordings', numRewordings, 0);
    return this.generateRewordings(question, numRewordings);
  }

  private requireProvider(): CompletionProvider {
    if (!this.provider) {
      throw new ExternalServiceError(
        ErrorCodes.EXTERNAL_UNAVAILABLE,
        'No completion provider configured. Set OPENAI_API_KEY or ANTHROPIC_API_KEY.'
      );
    }
    return this.provider;
  }
}
