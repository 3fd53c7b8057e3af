/**
 * in-memory-backend.ts - In-process DocumentBackend for tests
 *
 * Behaves like a single Typesense collection closely enough to exercise the
 * route index end to end without a server:
 * - vectors must match the collection width, as in Typesense
 * - vector clauses ("embedding:([...], k:N)") rank by cosine distance in [0, 2]
 * - filter expressions support `field:=` and `field:!=` terms joined with
 *   `||` inside parentheses and `&&` between groups
 * - listing without a vector clause returns documents in insertion order,
 *   paged by page / perPage
 */

import {
  VECTOR_FIELD,
  type CollectionInfo,
  type CollectionSchemaSpec,
  type DocumentBackend,
  type RouteDocument,
  type SearchHit,
  type SearchRequest,
} from "./backend";

interface StoredCollection {
  schema: CollectionSchemaSpec;
  dimensions: number | null;
  documents: Map<string, RouteDocument>;
}

type FilterTerm = { field: string; negate: boolean; value: string };

const VECTOR_CLAUSE = /^(\w+):\(\[([^\]]*)\],\s*k:(\d+)\)$/;
const FILTER_TERM = /^(\w+):(!?=)`([^`]*)`$/;

export class InMemoryBackend implements DocumentBackend {
  readonly collectionName: string;
  private collection: StoredCollection | null = null;

  constructor(collectionName = "semantic_routes") {
    this.collectionName = collectionName;
  }

  async retrieveCollection(): Promise<CollectionInfo | null> {
    if (!this.collection) return null;
    return {
      numDocuments: this.collection.documents.size,
      vectorDimensions: this.collection.dimensions,
    };
  }

  async createCollection(schema: CollectionSchemaSpec): Promise<"created" | "exists"> {
    if (this.collection) return "exists";
    const vectorField = schema.fields.find((field) => field.name === VECTOR_FIELD);
    this.collection = {
      schema,
      dimensions: vectorField?.num_dim ?? null,
      documents: new Map(),
    };
    return "created";
  }

  async dropCollection(): Promise<boolean> {
    const existed = this.collection !== null;
    this.collection = null;
    return existed;
  }

  async importDocuments(documents: RouteDocument[]): Promise<number> {
    const collection = this.requireCollection();
    documents.forEach((document) => this.checkWidth(collection, document));
    for (const document of documents) {
      collection.documents.set(document.id, { ...document });
    }
    return documents.length;
  }

  async upsertDocument(document: RouteDocument): Promise<void> {
    const collection = this.requireCollection();
    this.checkWidth(collection, document);
    collection.documents.set(document.id, { ...document });
  }

  async deleteByFilter(filterBy: string): Promise<number> {
    if (!this.collection) return 0;
    const groups = parseFilter(filterBy);
    let deleted = 0;
    for (const [id, document] of this.collection.documents) {
      if (matchesFilter(document, groups)) {
        this.collection.documents.delete(id);
        deleted++;
      }
    }
    return deleted;
  }

  async retrieveDocument(id: string): Promise<unknown> {
    const document = this.collection?.documents.get(id);
    return document ? { ...document } : null;
  }

  async deleteDocument(id: string): Promise<boolean> {
    return this.collection?.documents.delete(id) ?? false;
  }

  async search(request: SearchRequest): Promise<SearchHit[]> {
    if (!this.collection) return [];

    const groups = request.filterBy ? parseFilter(request.filterBy) : [];
    const candidates = [...this.collection.documents.values()].filter((document) =>
      matchesFilter(document, groups)
    );

    let ranked: SearchHit[];
    if (request.vectorQuery) {
      const { vector, k } = parseVectorClause(request.vectorQuery);
      ranked = candidates
        .map((document) => ({
          document: { ...document },
          vectorDistance: cosineDistance(vector, document.embedding),
        }))
        .sort((a, b) => a.vectorDistance - b.vectorDistance)
        .slice(0, k);
    } else {
      ranked = candidates.map((document) => ({ document: { ...document } }));
    }

    const start = (request.page - 1) * request.perPage;
    return ranked.slice(start, start + request.perPage);
  }

  private requireCollection(): StoredCollection {
    if (!this.collection) {
      throw new Error(`Not found: collection "${this.collectionName}" does not exist.`);
    }
    return this.collection;
  }

  private checkWidth(collection: StoredCollection, document: RouteDocument): void {
    if (collection.dimensions !== null && document.embedding.length !== collection.dimensions) {
      throw new Error(
        `Field \`${VECTOR_FIELD}\` must have ${collection.dimensions} dimensions, got ${document.embedding.length}.`
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseVectorClause(clause: string): { vector: number[]; k: number } {
  const match = VECTOR_CLAUSE.exec(clause);
  if (!match) throw new Error(`Malformed vector query: ${clause}`);
  const vector = match[2].length === 0 ? [] : match[2].split(",").map(Number);
  return { vector, k: Number(match[3]) };
}

/**
 * Parses "a && (b || c)" into [[a], [b, c]]: every group must match, and a
 * group matches when any of its terms does.
 */
function parseFilter(expression: string): FilterTerm[][] {
  return expression.split(" && ").map((group) =>
    group
      .trim()
      .replace(/^\((.*)\)$/, "$1")
      .split(" || ")
      .map((term) => {
        const match = FILTER_TERM.exec(term.trim());
        if (!match) throw new Error(`Unsupported filter term: ${term}`);
        return { field: match[1], negate: match[2] === "!=", value: match[3] };
      })
  );
}

function matchesFilter(document: RouteDocument, groups: FilterTerm[][]): boolean {
  return groups.every((terms) =>
    terms.some((term) => {
      const value = term.field === "label" ? document.label : term.field === "text" ? document.text : undefined;
      return term.negate ? value !== term.value : value === term.value;
    })
  );
}

function cosineDistance(a: number[], b: number[]): number {
  let dot = 0;
  let magA = 0;
  let magB = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }
  if (magA === 0 || magB === 0) return 1;
  const similarity = dot / (Math.sqrt(magA) * Math.sqrt(magB));
  return Math.min(2, Math.max(0, 1 - similarity));
}
