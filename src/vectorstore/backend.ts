/**
 * backend.ts - The document-search backend seen by the route index
 *
 * TypesenseRouteIndex only needs a handful of collection and document calls.
 * DocumentBackend names exactly those, bound to a single collection, so the
 * index logic can be exercised against InMemoryBackend in tests and against
 * TypesenseBackend in production.
 *
 * Absence is part of the return types (null / false / 0 / []) rather than an
 * exception: a missing collection or document is an expected state for every
 * caller. Anything else (connection refused, timeout, rejected payload)
 * rejects the promise.
 */

/** Name of the vector field in every route collection. */
export const VECTOR_FIELD = "embedding";

/** A field of the collection schema, in Typesense's own field notation. */
export type CollectionFieldSpec = {
  name: string;
  type: "string" | "float[]";
  facet?: boolean;
  optional?: boolean;
  num_dim?: number;
};

export interface CollectionSchemaSpec {
  name: string;
  fields: CollectionFieldSpec[];
}

/** What the backend reports about an existing collection. */
export interface CollectionInfo {
  numDocuments: number;
  /** Width of the vector field, or null when the schema does not expose one */
  vectorDimensions: number | null;
}

/**
 * A stored route document. Field names are the backend field names.
 *
 * structured_schema and metadata hold JSON text; the backend schema is flat.
 */
export type RouteDocument = {
  id: string;
  label: string;
  text: string;
  structured_schema: string;
  metadata: string;
  embedding: number[];
};

export interface SearchRequest {
  /** Vector clause, e.g. "embedding:([0.1,0.2], k:5)" */
  vectorQuery?: string;
  /** Filter expression, e.g. "label:=`billing`" */
  filterBy?: string;
  /** 1-based page number */
  page: number;
  perPage: number;
}

/**
 * A search hit before validation. document is whatever the backend stored.
 */
export interface SearchHit {
  document: unknown;
  /** Cosine distance in [0, 2]; only present for vector searches */
  vectorDistance?: number;
}

export interface DocumentBackend {
  /** Name of the collection this backend is bound to */
  readonly collectionName: string;

  /** @returns null when the collection does not exist */
  retrieveCollection(): Promise<CollectionInfo | null>;

  /** @returns "exists" when another writer created it first */
  createCollection(schema: CollectionSchemaSpec): Promise<"created" | "exists">;

  /** @returns false when there was nothing to drop */
  dropCollection(): Promise<boolean>;

  /**
   * Imports documents with upsert semantics: an existing id is replaced.
   * @returns How many documents the backend accepted
   */
  importDocuments(documents: RouteDocument[]): Promise<number>;

  upsertDocument(document: RouteDocument): Promise<void>;

  /** @returns How many documents matched the filter (0 if no collection) */
  deleteByFilter(filterBy: string): Promise<number>;

  /** @returns null when the document (or the collection) does not exist */
  retrieveDocument(id: string): Promise<unknown>;

  /** @returns false when the document (or the collection) does not exist */
  deleteDocument(id: string): Promise<boolean>;

  /** @returns [] when the collection does not exist */
  search(request: SearchRequest): Promise<SearchHit[]>;
}
