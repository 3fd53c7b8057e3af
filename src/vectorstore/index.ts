/**
 * vectorstore/index.ts - Public API for the route index module
 *
 * Import from here, not from the individual files.
 *
 * Usage:
 *   import {
 *     TypesenseBackend,
 *     TypesenseRouteIndex,
 *     VoyageEmbedding,
 *     type RouteIndex,
 *   } from "./vectorstore";
 */

// Contract the router codes against
export type {
  RouteIndex,
  AddRequest,
  QueryRequest,
  RouteMatch,
  EnumeratedRecord,
  EnumerationResult,
  EnumerateOptions,
  ConfigParameter,
  IndexDescription,
  EmbeddingFunction,
  FunctionSchema,
  RecordMetadata,
} from "./types";

// Backend port and implementations
export type {
  DocumentBackend,
  RouteDocument,
  CollectionInfo,
  CollectionSchemaSpec,
  SearchRequest,
  SearchHit,
} from "./backend";
export { VECTOR_FIELD } from "./backend";
export { TypesenseBackend } from "./typesense-backend";
export { InMemoryBackend } from "./in-memory-backend";

// Index and its building blocks
export { TypesenseRouteIndex, TYPESENSE_INDEX_TYPE } from "./typesense-index";
export type { TypesenseRouteIndexOptions } from "./typesense-index";
export { makeRecordId, toRouteDocument } from "./document-mapper";
export { ensureCollection, buildCollectionSchema } from "./schema";
export {
  distanceToSimilarity,
  buildLabelFilter,
  renderVectorQuery,
  CONFIG_LABEL,
  MAX_COSINE_DISTANCE,
} from "./query";
export { enumerateAll, PAGE_SIZE } from "./paginator";
export { readConfig, writeConfig, configDocumentId } from "./config-store";
export { IndexInputError, PayloadDecodeError } from "./errors";

// Embeddings
export { VoyageEmbedding } from "./embeddings";
