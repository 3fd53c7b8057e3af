/**
 * types.ts - Route index interfaces and types
 *
 * What this file does:
 * Defines the contract the semantic router uses to talk to its storage
 * engine. The router imports from here and never touches Typesense (or any
 * other backend) directly.
 *
 * Key concepts:
 * - RouteIndex: store labelled utterance embeddings, search them, and keep a
 *   small amount of config used to detect drift between local routes and the
 *   stored index
 * - EmbeddingFunction: turns text into vectors for similarity search
 * - RouteMatch: one search hit, already converted to a similarity score
 * - ConfigParameter: a named string value stored next to the records
 */

/**
 * A function that converts text into embedding vectors.
 *
 * Every vector produced by one embedder has the same width. The route index
 * fixes its collection width from the first vector it sees, so swapping to a
 * model with a different width needs a fresh index.
 */
export interface EmbeddingFunction {
  /**
   * Converts an array of text strings into embedding vectors.
   *
   * @param texts - The strings to embed (utterances or incoming queries)
   * @returns One vector per input text, in input order
   */
  embed(texts: string[]): Promise<number[][]>;
}

/** A function schema attached to a route, e.g. for tool calling. */
export type FunctionSchema = Record<string, unknown>;

/** Free-form key/value payload stored alongside an utterance. */
export type RecordMetadata = Record<string, unknown>;

/**
 * A batch of utterances to index.
 *
 * The three required arrays are parallel: embeddings[i] is the vector for
 * utterances[i], which belongs to the route labels[i]. The optional lists may
 * be shorter or missing; absent entries are stored as empty JSON values.
 */
export interface AddRequest {
  embeddings: number[][];
  labels: string[];
  /** Utterances are coerced to strings before they are stored. */
  utterances: unknown[];
  functionSchemas?: Array<FunctionSchema | null>;
  metadataList?: RecordMetadata[];
}

/**
 * A similarity search request.
 */
export interface QueryRequest {
  vector: number[];
  /** Maximum number of hits (default: 5) */
  topK?: number;
  /** Restrict hits to these labels. An empty list means no restriction. */
  labelFilter?: string[];
}

/**
 * One search hit.
 *
 * score is a similarity in [0, 1], (1 + cosine) / 2: 1.0 for an identical
 * direction, 0.5 for orthogonal vectors, 0.0 for opposite ones.
 */
export interface RouteMatch {
  label: string;
  score: number;
}

/**
 * One stored utterance as returned by a full enumeration.
 */
export interface EnumeratedRecord {
  label: string;
  text: string;
  /** The stored function schema, still JSON-serialized ("null" when absent) */
  structuredSchema: string;
  /** Decoded metadata; only present when requested and decodable */
  metadata?: RecordMetadata;
}

export interface EnumerationResult {
  ids: string[];
  records: EnumeratedRecord[];
}

export interface EnumerateOptions {
  /** Only return records whose label starts with this prefix */
  prefix?: string;
  /** Decode and attach each record's free-form metadata */
  includeMetadata?: boolean;
}

/**
 * A named value kept in the index, such as the hash of the route set.
 */
export interface ConfigParameter {
  field: string;
  value: string;
  scope?: string;
  /** ISO timestamp of the write; absent for values that were never written */
  createdAt?: string;
}

/**
 * What an index reports about itself.
 *
 * An index that does not exist yet describes itself with zero dimensions and
 * zero vectors.
 */
export interface IndexDescription {
  type: string;
  dimensions: number;
  vectors: number;
}

/**
 * The storage contract of the semantic router.
 *
 * Usage pattern:
 *   1. add() - index route utterances (idempotent per label + utterance)
 *   2. query() - find the closest utterances to an incoming vector
 *   3. getAll() + readConfig()/writeConfig() - compare the stored route set
 *      against the local one and re-sync when they drift apart
 *
 * Read-style members (isReady, describe, count) never reject; they report an
 * empty index when the backend is absent or unreachable. Write-style members
 * reject on backend failure.
 */
export interface RouteIndex {
  /** Short identifier of the backend kind (e.g., "typesense") */
  readonly type: string;

  add(request: AddRequest): Promise<void>;

  /**
   * Removes every record stored under a label.
   * @returns How many records were removed
   */
  delete(label: string): Promise<number>;

  /** Removes every record, config included. */
  deleteAll(): Promise<void>;

  /** Removes the index itself. */
  deleteIndex(): Promise<void>;

  /**
   * Removes specific utterances.
   * @param labelToTexts - Route label mapped to the utterances to remove
   * @returns How many records were actually removed
   */
  removeRecords(labelToTexts: Record<string, unknown[]>): Promise<number>;

  query(request: QueryRequest): Promise<RouteMatch[]>;

  getAll(options?: EnumerateOptions): Promise<EnumerationResult>;

  readConfig(field: string, scope?: string): Promise<ConfigParameter>;

  writeConfig(config: ConfigParameter): Promise<ConfigParameter>;

  /** Creates the backing collection if its width is already known. */
  initIndex(): Promise<void>;

  isReady(): Promise<boolean>;

  describe(): Promise<IndexDescription>;

  count(): Promise<number>;
}
