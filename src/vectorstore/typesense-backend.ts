/**
 * typesense-backend.ts - DocumentBackend over the Typesense JS client
 *
 * This is the only file in the project that imports from "typesense".
 * Everything else codes against DocumentBackend in backend.ts.
 *
 * Typesense signals absence with ObjectNotFound (HTTP 404) and a lost create
 * race with ObjectAlreadyExists (HTTP 409). Both are mapped to return values
 * here; every other error (connection refused, timeout, 401, 400) is passed
 * through untouched.
 */

import { Client, Errors } from "typesense";
import {
  VECTOR_FIELD,
  type CollectionInfo,
  type CollectionSchemaSpec,
  type DocumentBackend,
  type RouteDocument,
  type SearchHit,
  type SearchRequest,
} from "./backend";
import type { IndexConfig } from "../config";

/**
 * Runs a Typesense call, returning `absent` when the object does not exist.
 */
async function orAbsent<T>(call: () => Promise<T>, absent: T): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof Errors.ObjectNotFound) return absent;
    throw error;
  }
}

/**
 * Usage:
 *   const backend = new TypesenseBackend(loadIndexConfig());
 *   const info = await backend.retrieveCollection();
 */
export class TypesenseBackend implements DocumentBackend {
  readonly collectionName: string;
  private readonly client: Client;

  constructor(config: IndexConfig) {
    this.collectionName = config.collectionName;
    this.client = new Client({
      nodes: [
        {
          host: config.host,
          port: config.port,
          protocol: config.protocol,
        },
      ],
      apiKey: config.apiKey,
      connectionTimeoutSeconds: config.connectionTimeoutSeconds,
    });
  }

  async retrieveCollection(): Promise<CollectionInfo | null> {
    const schema = await orAbsent(
      () => this.client.collections(this.collectionName).retrieve(),
      null
    );
    if (!schema) return null;

    const vectorField = schema.fields?.find((field) => field.name === VECTOR_FIELD);
    return {
      numDocuments: schema.num_documents,
      vectorDimensions: vectorField?.num_dim ?? null,
    };
  }

  async createCollection(schema: CollectionSchemaSpec): Promise<"created" | "exists"> {
    try {
      await this.client.collections().create(schema);
      return "created";
    } catch (error) {
      if (error instanceof Errors.ObjectAlreadyExists) return "exists";
      throw error;
    }
  }

  async dropCollection(): Promise<boolean> {
    return orAbsent(async () => {
      await this.client.collections(this.collectionName).delete();
      return true;
    }, false);
  }

  /**
   * Imports with action "upsert". The client rejects with an ImportError
   * when any document fails, so a resolved call means every document landed.
   */
  async importDocuments(documents: RouteDocument[]): Promise<number> {
    const results = await this.client
      .collections(this.collectionName)
      .documents()
      .import(documents, { action: "upsert" });
    return results.filter((result) => result.success).length;
  }

  async upsertDocument(document: RouteDocument): Promise<void> {
    await this.client.collections(this.collectionName).documents().upsert(document);
  }

  async deleteByFilter(filterBy: string): Promise<number> {
    const response = await orAbsent(
      () =>
        this.client
          .collections(this.collectionName)
          .documents()
          .delete({ filter_by: filterBy }),
      null
    );
    return response?.num_deleted ?? 0;
  }

  async retrieveDocument(id: string): Promise<unknown> {
    return orAbsent<unknown>(
      () => this.client.collections(this.collectionName).documents(id).retrieve(),
      null
    );
  }

  async deleteDocument(id: string): Promise<boolean> {
    return orAbsent(async () => {
      await this.client.collections(this.collectionName).documents(id).delete();
      return true;
    }, false);
  }

  /**
   * Runs one search page. The query text is always the wildcard; ranking
   * comes from the vector clause when there is one, otherwise documents are
   * listed in the backend's default order.
   */
  async search(request: SearchRequest): Promise<SearchHit[]> {
    const response = await orAbsent(
      () =>
        this.client
          .collections(this.collectionName)
          .documents()
          .search({
            q: "*",
            query_by: "label",
            page: request.page,
            per_page: request.perPage,
            ...(request.vectorQuery ? { vector_query: request.vectorQuery } : {}),
            ...(request.filterBy ? { filter_by: request.filterBy } : {}),
          }),
      null
    );

    return (response?.hits ?? []).map((hit) => ({
      document: hit.document,
      vectorDistance: hit.vector_distance,
    }));
  }
}
