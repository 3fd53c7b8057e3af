/**
 * schema.ts - Route collection schema and lazy creation
 *
 * The collection is created on the first write, with the vector width taken
 * from that write. The width cannot change afterwards; writing vectors of a
 * different width is rejected by the backend.
 */

import {
  VECTOR_FIELD,
  type CollectionSchemaSpec,
  type DocumentBackend,
} from "./backend";

/**
 * Builds the schema of a route collection.
 *
 * label is faceted so it can be used in filter expressions; the two JSON
 * fields are optional so config documents and older records still validate.
 */
export function buildCollectionSchema(
  name: string,
  dimensions: number
): CollectionSchemaSpec {
  return {
    name,
    fields: [
      { name: "label", type: "string", facet: true },
      { name: "text", type: "string" },
      { name: "structured_schema", type: "string", optional: true },
      { name: "metadata", type: "string", optional: true },
      { name: VECTOR_FIELD, type: "float[]", num_dim: dimensions },
    ],
  };
}

/**
 * Makes sure the collection exists before anything is written to it.
 *
 * Checks for the collection first and only creates it when absent. Several
 * processes starting at once may all see it absent; whichever loses the
 * create race gets "exists" back from the backend, which counts as success.
 *
 * An existing collection is trusted to have a compatible width.
 *
 * @returns "exists" if nothing was created, "created" otherwise
 */
export async function ensureCollection(
  backend: DocumentBackend,
  dimensions: number
): Promise<"exists" | "created"> {
  const existing = await backend.retrieveCollection();
  if (existing) return "exists";

  return backend.createCollection(
    buildCollectionSchema(backend.collectionName, dimensions)
  );
}
