/**
 * SQLite-backed vector store.
 *
 * Documents, JSON metadata and JSON-encoded embeddings live in one table
 * keyed by (collection, id). Queries score every document of the
 * collection by cosine distance (1 - cosine similarity), so distances fall
 * in [0, 2] and similarity = 1 - distance.
 */
import type Database from 'better-sqlite3';
import { z } from 'zod';
import type {
  AddRequest,
  Embedder,
  GetRequest,
  Metadata,
  MetadataFilter,
  QueryHit,
  QueryRequest,
  StoredDocument,
  UpdateRequest,
  VectorCollection,
  VectorStore,
} from './types.js';
import { cosineSimilarity } from './embedder.js';
import { transaction } from '../db/manager.js';
import {
  ExternalServiceError,
  NotFoundError,
  ValidationError,
  ErrorCodes,
} from '../../utils/errors.js';

interface DocumentRow {
  id: string;
  document: string;
  metadata: string;
  embedding: string;
}

const MetadataSchema = z.record(z.string(), z.union([z.string(), z.number(), z.boolean()]));
const EmbeddingSchema = z.array(z.number());

function parseMetadata(raw: string): Metadata {
  return MetadataSchema.parse(JSON.parse(raw));
}

function parseEmbedding(raw: string): number[] {
  return EmbeddingSchema.parse(JSON.parse(raw));
}

/**
 * True when every filter key is present with an equal value.
 */
export function matchesFilter(metadata: Metadata, where?: MetadataFilter): boolean {
  if (!where) return true;
  return Object.entries(where).every(([key, value]) => metadata[key] === value);
}

function requireSameLength(label: string, expected: number, actual: number): void {
  if (expected !== actual) {
    throw new ValidationError(
      ErrorCodes.INVALID_ARGUMENT,
      `${label}: expected ${expected} entries, got ${actual}`
    );
  }
}

class SqliteCollection implements VectorCollection {
  constructor(
    readonly name: string,
    private readonly db: Database.Database,
    private readonly embedder: Embedder
  ) {}

  async add(request: AddRequest): Promise<void> {
    requireSameLength('documents', request.ids.length, request.documents.length);
    requireSameLength('metadatas', request.ids.length, request.metadatas.length);
    if (new Set(request.ids).size !== request.ids.length) {
      throw new ValidationError(ErrorCodes.INVALID_ARGUMENT, 'Duplicate ids in add request');
    }

    const embeddings = await this.embed(request.documents);
    const exists = this.db.prepare('SELECT 1 FROM documents WHERE collection = ? AND id = ?');
    const insert = this.db.prepare(
      'INSERT INTO documents (collection, id, document, metadata, embedding) VALUES (?, ?, ?, ?, ?)'
    );

    transaction(this.db, () => {
      request.ids.forEach((id, i) => {
        if (exists.get(this.name, id) !== undefined) {
          throw new ValidationError(
            ErrorCodes.INVALID_ARGUMENT,
            `Document id ${id} already exists in collection ${this.name}`,
            { id }
          );
        }
        insert.run(
          this.name,
          id,
          request.documents[i],
          JSON.stringify(request.metadatas[i]),
          JSON.stringify(embeddings[i])
        );
      });
    });
  }

  async query(request: QueryRequest): Promise<QueryHit[][]> {
    if (request.queryTexts.length === 0) return [];

    const queryEmbeddings = await this.embed(request.queryTexts);
    const candidates = this.rows()
      .map(row => ({ row, metadata: parseMetadata(row.metadata) }))
      .filter(({ metadata }) => matchesFilter(metadata, request.where))
      .map(({ row, metadata }) => ({
        id: row.id,
        document: row.document,
        metadata,
        embedding: parseEmbedding(row.embedding),
      }));

    const limit = Math.max(0, request.nResults);
    return queryEmbeddings.map(queryEmbedding =>
      candidates
        .map(candidate => {
          if (candidate.embedding.length !== queryEmbedding.length) {
            throw new ExternalServiceError(
              ErrorCodes.EXTERNAL_MALFORMED,
              `Embedding dimension mismatch in collection ${this.name}: stored ${candidate.embedding.length}, query ${queryEmbedding.length}`
            );
          }
          return {
            id: candidate.id,
            document: candidate.document,
            metadata: candidate.metadata,
            distance: 1 - cosineSimilarity(queryEmbedding, candidate.embedding),
          };
        })
        .sort((a, b) => a.distance - b.distance)
        .slice(0, limit)
    );
  }

  async update(request: UpdateRequest): Promise<void> {
    if (request.documents) {
      requireSameLength('documents', request.ids.length, request.documents.length);
    }
    if (request.metadatas) {
      requireSameLength('metadatas', request.ids.length, request.metadatas.length);
    }

    const embeddings = request.documents ? await this.embed(request.documents) : null;
    const updateDocument = this.db.prepare(
      'UPDATE documents SET document = ?, embedding = ? WHERE collection = ? AND id = ?'
    );
    const updateMetadata = this.db.prepare(
      'UPDATE documents SET metadata = ? WHERE collection = ? AND id = ?'
    );
    const exists = this.db.prepare('SELECT 1 FROM documents WHERE collection = ? AND id = ?');

    transaction(this.db, () => {
      request.ids.forEach((id, i) => {
        if (exists.get(this.name, id) === undefined) {
          throw new NotFoundError(
            ErrorCodes.KB_QUESTION_NOT_FOUND,
            `Document ${id} not found in collection ${this.name}`,
            { id }
          );
        }
        if (request.documents && embeddings) {
          updateDocument.run(request.documents[i], JSON.stringify(embeddings[i]), this.name, id);
        }
        if (request.metadatas) {
          updateMetadata.run(JSON.stringify(request.metadatas[i]), this.name, id);
        }
      });
    });
  }

  async get(request: GetRequest = {}): Promise<StoredDocument[]> {
    const ids = request.ids ? new Set(request.ids) : null;
    return this.rows()
      .filter(row => !ids || ids.has(row.id))
      .map(row => ({ id: row.id, document: row.document, metadata: parseMetadata(row.metadata) }))
      .filter(doc => matchesFilter(doc.metadata, request.where));
  }

  async delete(ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const placeholders = ids.map(() => '?').join(',');
    const result = this.db.prepare(
      `DELETE FROM documents WHERE collection = ? AND id IN (${placeholders})`
    ).run(this.name, ...ids);
    return result.changes;
  }

  async count(): Promise<number> {
    const row = this.db.prepare(
      'SELECT COUNT(*) as count FROM documents WHERE collection = ?'
    ).get(this.name) as { count: number };
    return row.count;
  }

  private rows(): DocumentRow[] {
    return this.db.prepare(
      'SELECT id, document, metadata, embedding FROM documents WHERE collection = ? ORDER BY seq'
    ).all(this.name) as DocumentRow[];
  }

  private async embed(texts: string[]): Promise<number[][]> {
    const embeddings = await this.embedder.embed(texts);
    if (embeddings.length !== texts.length) {
      throw new ExternalServiceError(
        ErrorCodes.EXTERNAL_MALFORMED,
        `Embedder ${this.embedder.name} returned ${embeddings.length} vectors for ${texts.length} texts`
      );
    }
    return embeddings;
  }
}

export class SqliteVectorStore implements VectorStore {
  constructor(
    private readonly db: Database.Database,
    private readonly embedder: Embedder
  ) {}

  async getOrCreateCollection(name: string): Promise<VectorCollection> {
    this.db.prepare('INSERT OR IGNORE INTO collections (name) VALUES (?)').run(name);
    return new SqliteCollection(name, this.db, this.embedder);
  }

  /**
   * @throws ValidationError when the collection already exists
   */
  async createCollection(name: string): Promise<VectorCollection> {
    const result = this.db.prepare('INSERT OR IGNORE INTO collections (name) VALUES (?)').run(name);
    if (result.changes === 0) {
      throw new ValidationError(
        ErrorCodes.INVALID_ARGUMENT,
        `Collection ${name} already exists`,
        { name }
      );
    }
    return new SqliteCollection(name, this.db, this.embedder);
  }

  async deleteCollection(name: string): Promise<boolean> {
    return transaction(this.db, () => {
      this.db.prepare('DELETE FROM documents WHERE collection = ?').run(name);
      return this.db.prepare('DELETE FROM collections WHERE name = ?').run(name).changes > 0;
    });
  }
}
