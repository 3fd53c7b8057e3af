/**
 * typesense-index.ts - RouteIndex backed by a Typesense collection
 *
 * What this file does:
 * Implements the RouteIndex contract on top of a DocumentBackend. This is
 * where the router's expectations meet the backend's protocol:
 *
 * - add() maps utterances to documents with deterministic ids, creates the
 *   collection lazily from the first vector's width, and upserts the whole
 *   batch in one import request
 * - query() renders a vector clause plus label filter and converts cosine
 *   distances into similarities
 * - getAll() pages through the whole collection for route sync
 * - readConfig()/writeConfig() keep the route-set hash as a config document
 * - isReady()/describe()/count() ask the backend every time and never throw
 *
 * The only state held here is the vector width, once known. The collection
 * is the source of truth for everything else.
 */

import type { DocumentBackend } from "./backend";
import { readConfig, writeConfig } from "./config-store";
import { makeRecordId, toRouteDocument } from "./document-mapper";
import { IndexInputError } from "./errors";
import { enumerateAll } from "./paginator";
import { DEFAULT_TOP_K, buildSearchRequest, labelEquals, toRouteMatches } from "./query";
import { ensureCollection } from "./schema";
import type {
  AddRequest,
  ConfigParameter,
  EnumerateOptions,
  EnumerationResult,
  IndexDescription,
  QueryRequest,
  RouteIndex,
  RouteMatch,
} from "./types";
import { withIndexSpan, type IndexSpanTarget } from "../tracing/index-tracing";

export const TYPESENSE_INDEX_TYPE = "typesense";

export interface TypesenseRouteIndexOptions {
  /**
   * Vector width, when already known (e.g. from the embedding model).
   * Otherwise it is learned from the first add() or from the collection.
   */
  dimensions?: number;
  /** Log sink for informational messages and warnings (default: stdout) */
  log?: (message: string) => void;
}

/**
 * Usage:
 *   const backend = new TypesenseBackend(loadIndexConfig());
 *   const index = new TypesenseRouteIndex(backend);
 *
 *   await index.add({ embeddings, labels, utterances });
 *   const matches = await index.query({ vector, topK: 5 });
 */
export class TypesenseRouteIndex implements RouteIndex {
  readonly type = TYPESENSE_INDEX_TYPE;

  private readonly backend: DocumentBackend;
  private readonly log: (message: string) => void;
  private readonly spanTarget: IndexSpanTarget;

  /** Vector width of the collection, once known. Not authoritative. */
  private dimensions: number | null;

  constructor(backend: DocumentBackend, options?: TypesenseRouteIndexOptions) {
    this.backend = backend;
    this.log = options?.log ?? console.log;
    this.dimensions = options?.dimensions ?? null;
    this.spanTarget = {
      system: TYPESENSE_INDEX_TYPE,
      collection: backend.collectionName,
    };
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  /**
   * Upserts a batch of utterances.
   *
   * @throws IndexInputError when the parallel arrays differ in length or a
   *         label is empty or contains a backtick
   */
  async add(request: AddRequest): Promise<void> {
    const { embeddings, labels, utterances } = request;
    if (embeddings.length !== labels.length || labels.length !== utterances.length) {
      throw new IndexInputError(
        `add() needs one label and one utterance per embedding; got ${embeddings.length} embeddings, ` +
          `${labels.length} labels, ${utterances.length} utterances.`
      );
    }
    const emptyAt = labels.findIndex((label) => label.length === 0);
    if (emptyAt !== -1) {
      throw new IndexInputError(`Route label at position ${emptyAt} is empty.`);
    }
    const quotedAt = labels.findIndex((label) => label.includes("`"));
    if (quotedAt !== -1) {
      throw new IndexInputError(
        `Route label at position ${quotedAt} contains a backtick, which filter expressions cannot quote.`
      );
    }
    if (embeddings.length === 0) return;

    const width = embeddings[0].length;

    await withIndexSpan(
      this.spanTarget,
      "add",
      { "route_index.batch_size": embeddings.length, "route_index.dimensions": width },
      async () => {
        const documents = embeddings.map((vector, i) =>
          toRouteDocument({
            label: labels[i],
            utterance: utterances[i],
            functionSchema: request.functionSchemas?.[i] ?? null,
            metadata: request.metadataList?.[i] ?? {},
            vector,
          })
        );

        const outcome = await ensureCollection(this.backend, width);
        if (outcome === "created") {
          this.log(
            `Created collection "${this.backend.collectionName}" with ${width} dimensions.`
          );
        }
        this.dimensions = width;

        const imported = await this.backend.importDocuments(documents);
        this.log(`Upserted ${imported} documents into "${this.backend.collectionName}".`);
      }
    );
  }

  /**
   * Removes every record of a route with a single filtered delete.
   */
  async delete(label: string): Promise<number> {
    return withIndexSpan(this.spanTarget, "delete", { "route_index.label": label }, async (span) => {
      const deleted = await this.backend.deleteByFilter(labelEquals(label));
      span.setAttribute("route_index.deleted", deleted);
      this.log(`Deleted ${deleted} documents of route "${label}".`);
      return deleted;
    });
  }

  /**
   * Drops the collection. Dropping a collection that does not exist is a
   * no-op. The cached width is forgotten, since the next add() may create
   * the collection with another width.
   */
  async deleteAll(): Promise<void> {
    await withIndexSpan(this.spanTarget, "delete_all", {}, async () => {
      const dropped = await this.backend.dropCollection();
      this.dimensions = null;
      if (dropped) {
        this.log(`Deleted collection "${this.backend.collectionName}".`);
      }
    });
  }

  async deleteIndex(): Promise<void> {
    await this.deleteAll();
  }

  /**
   * Deletes individual utterances by their derived ids. Ids that are already
   * gone count as removed-nothing, not as errors.
   */
  async removeRecords(labelToTexts: Record<string, unknown[]>): Promise<number> {
    const ids = Object.entries(labelToTexts).flatMap(([label, texts]) =>
      texts.map((text) => makeRecordId(label, text))
    );

    return withIndexSpan(
      this.spanTarget,
      "remove_records",
      { "route_index.batch_size": ids.length },
      async (span) => {
        let removed = 0;
        for (const id of ids) {
          if (await this.backend.deleteDocument(id)) removed++;
        }
        span.setAttribute("route_index.deleted", removed);
        return removed;
      }
    );
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  /**
   * Nearest-neighbor search. Results are ordered by descending similarity.
   */
  async query(request: QueryRequest): Promise<RouteMatch[]> {
    const topK = request.topK ?? DEFAULT_TOP_K;
    return withIndexSpan(
      this.spanTarget,
      "query",
      {
        "route_index.top_k": topK,
        "route_index.label_filter_size": request.labelFilter?.length ?? 0,
      },
      async (span) => {
        const hits = await this.backend.search(
          buildSearchRequest(request.vector, topK, request.labelFilter)
        );
        const matches = toRouteMatches(hits, (error) => {
          const message = error instanceof Error ? error.message : String(error);
          this.log(`Warning: skipping unreadable search hit: ${message}`);
        });
        span.setAttribute("route_index.hits", matches.length);
        return matches;
      }
    );
  }

  async getAll(options?: EnumerateOptions): Promise<EnumerationResult> {
    return withIndexSpan(this.spanTarget, "get_all", {}, async (span) => {
      const result = await enumerateAll(this.backend, { ...options, log: this.log });
      span.setAttribute("route_index.records", result.ids.length);
      return result;
    });
  }

  async readConfig(field: string, scope?: string): Promise<ConfigParameter> {
    return withIndexSpan(this.spanTarget, "read_config", { "route_index.config_field": field }, () =>
      readConfig(this.backend, field, scope, this.log)
    );
  }

  async writeConfig(config: ConfigParameter): Promise<ConfigParameter> {
    return withIndexSpan(
      this.spanTarget,
      "write_config",
      { "route_index.config_field": config.field },
      () => writeConfig(this.backend, config, this.dimensions, this.log)
    );
  }

  /**
   * Creates the collection up front when the width is known; otherwise the
   * first add() creates it.
   */
  async initIndex(): Promise<void> {
    if (this.dimensions === null) return;
    const width = this.dimensions;
    await withIndexSpan(this.spanTarget, "init_index", { "route_index.dimensions": width }, () =>
      ensureCollection(this.backend, width)
    );
  }

  // -------------------------------------------------------------------------
  // Introspection (never throws)
  // -------------------------------------------------------------------------

  async isReady(): Promise<boolean> {
    try {
      return (await this.backend.retrieveCollection()) !== null;
    } catch (error) {
      this.warn("isReady", error);
      return false;
    }
  }

  /**
   * Reports type, width and document count. A missing collection or an
   * unreachable backend both describe as an empty index.
   */
  async describe(): Promise<IndexDescription> {
    const empty: IndexDescription = { type: this.type, dimensions: 0, vectors: 0 };
    try {
      const info = await this.backend.retrieveCollection();
      if (!info) return empty;
      if (this.dimensions === null && info.vectorDimensions !== null) {
        this.dimensions = info.vectorDimensions;
      }
      return {
        type: this.type,
        dimensions: this.dimensions ?? 0,
        vectors: info.numDocuments,
      };
    } catch (error) {
      this.warn("describe", error);
      return empty;
    }
  }

  /**
   * Number of stored documents, config documents included. 0 when the
   * collection is missing or the backend cannot be reached.
   */
  async count(): Promise<number> {
    try {
      const info = await this.backend.retrieveCollection();
      return info?.numDocuments ?? 0;
    } catch (error) {
      this.warn("count", error);
      return 0;
    }
  }

  private warn(operation: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.log(`Warning: ${operation} could not reach "${this.backend.collectionName}": ${message}`);
  }
}
