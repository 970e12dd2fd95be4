/**
 * Types for the similarity store and the question/answer knowledge base.
 */

export type MetadataValue = string | number | boolean;

/**
 * Document metadata. Values are scalars; absence stands in for null.
 */
export type Metadata = Record<string, MetadataValue>;

/**
 * Equality filter: a document matches when every key has the given value.
 */
export type MetadataFilter = Metadata;

export interface AddRequest {
  ids: string[];
  documents: string[];
  metadatas: Metadata[];
}

export interface QueryRequest {
  queryTexts: string[];
  nResults: number;
  where?: MetadataFilter;
}

export interface UpdateRequest {
  ids: string[];
  /** Replacement texts; re-embedded when given */
  documents?: string[];
  metadatas?: Metadata[];
}

export interface GetRequest {
  ids?: string[];
  where?: MetadataFilter;
}

export interface StoredDocument {
  id: string;
  document: string;
  metadata: Metadata;
}

/**
 * A nearest-neighbour hit. Distance is store-native: lower is closer.
 */
export interface QueryHit extends StoredDocument {
  distance: number;
}

/**
 * A named collection of embedded documents.
 */
export interface VectorCollection {
  readonly name: string;
  add(request: AddRequest): Promise<void>;
  /** One hit list per query text, nearest first */
  query(request: QueryRequest): Promise<QueryHit[][]>;
  update(request: UpdateRequest): Promise<void>;
  /** Documents in insertion order */
  get(request?: GetRequest): Promise<StoredDocument[]>;
  delete(ids: string[]): Promise<number>;
  count(): Promise<number>;
}

/**
 * Collection lifecycle by name.
 */
export interface VectorStore {
  getOrCreateCollection(name: string): Promise<VectorCollection>;
  createCollection(name: string): Promise<VectorCollection>;
  /** Returns false when the collection did not exist */
  deleteCollection(name: string): Promise<boolean>;
}

/**
 * Turns texts into vectors.
 */
export interface Embedder {
  readonly name: string;
  embed(texts: string[]): Promise<number[][]>;
}

/**
 * A knowledge base query result.
 */
export interface KbMatch {
  id: string;
  question: string;
  /** null for tagged tree entries that are not answered yet */
  answer: string | null;
  /** Document metadata without the answer key */
  metadata: Metadata;
  /** 1 - distance; higher is better */
  similarity: number;
}

/**
 * A tagged tree entry as read back from the knowledge base.
 */
export interface TreeEntry {
  id: string;
  treeId: number;
  question: string;
  answer: string | null;
}
