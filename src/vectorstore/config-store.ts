/**
 * config-store.ts - Named config values kept inside the route collection
 *
 * The router stores a hash of its route set here and compares it on start-up
 * to decide whether the index needs re-syncing. Each value is an ordinary
 * document under the reserved label "__config__":
 *
 *   id:       "__config__<field>"
 *   text:     the value
 *   metadata: {"scope": ..., "createdAt": ...}
 *
 * Because the collection requires a vector on every document, config
 * documents carry a zero vector of the collection's width.
 */

import { z } from "zod";
import type { DocumentBackend, RouteDocument } from "./backend";
import {
  decodeStoredJson,
  parseRouteDocument,
  storedJson,
  type StoredDocument,
} from "./document-mapper";
import { PayloadDecodeError } from "./errors";
import { CONFIG_LABEL } from "./query";
import type { ConfigParameter } from "./types";

export function configDocumentId(field: string): string {
  return `${CONFIG_LABEL}${field}`;
}

const configMetadataSchema = z.object({
  scope: z.string().nullable().optional(),
  createdAt: z.string().optional(),
});

/**
 * Reads a config value.
 *
 * A field that was never written (or a collection that does not exist yet)
 * reads as an empty string, which the router treats as "no prior state".
 */
export async function readConfig(
  backend: DocumentBackend,
  field: string,
  scope?: string,
  log: (message: string) => void = console.log
): Promise<ConfigParameter> {
  const raw = await backend.retrieveDocument(configDocumentId(field));
  if (raw === null) {
    return withScope({ field, value: "" }, scope);
  }

  let document: StoredDocument;
  try {
    document = parseRouteDocument(raw);
  } catch (error) {
    if (!(error instanceof PayloadDecodeError)) throw error;
    log(`Warning: config "${field}" is unreadable, treating it as unset: ${error.message}`);
    return withScope({ field, value: "" }, scope);
  }
  const config = withScope({ field, value: document.text }, scope);

  try {
    const meta = decodeStoredJson(
      storedJson("metadata", document.metadata),
      configMetadataSchema
    );
    if (meta.createdAt) config.createdAt = meta.createdAt;
  } catch (error) {
    if (!(error instanceof PayloadDecodeError)) throw error;
    log(`Warning: ignoring metadata of config "${field}": ${error.message}`);
  }

  return config;
}

/**
 * Writes a config value as a zero-vector document.
 *
 * The width comes from the caller's cached value, then from the collection
 * schema, then falls back to 1 for a collection whose schema does not expose
 * it. When there is no collection and no known width the write is skipped:
 * creating a collection from a config write would fix a width no embedding
 * matches.
 *
 * @param dimensions - Vector width already known to the caller, if any
 * @returns The stored config (with createdAt), or the input unchanged when
 *          the write was skipped
 */
export async function writeConfig(
  backend: DocumentBackend,
  config: ConfigParameter,
  dimensions: number | null,
  log: (message: string) => void = console.log
): Promise<ConfigParameter> {
  let width = dimensions;
  if (width === null) {
    const info = await backend.retrieveCollection();
    if (!info) {
      log(
        `Skipping config write for "${config.field}": collection "${backend.collectionName}" does not exist yet.`
      );
      return config;
    }
    width = info.vectorDimensions ?? 1;
  }

  const createdAt = new Date().toISOString();
  const document: RouteDocument = {
    id: configDocumentId(config.field),
    label: CONFIG_LABEL,
    text: config.value,
    structured_schema: "null",
    metadata: JSON.stringify({ scope: config.scope ?? null, createdAt }),
    embedding: new Array<number>(width).fill(0),
  };
  await backend.upsertDocument(document);

  return { ...config, createdAt };
}

function withScope(config: ConfigParameter, scope?: string): ConfigParameter {
  return scope === undefined ? config : { ...config, scope };
}
