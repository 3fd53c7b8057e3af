/**
 * paginator.ts - Full enumeration of a route collection
 *
 * Used by route sync to rebuild the stored (label, utterance) set. Pages
 * through a wildcard listing 250 documents at a time until the backend
 * returns an empty page.
 */

import type { DocumentBackend } from "./backend";
import {
  decodeStoredJson,
  parseRouteDocument,
  recordMetadataSchema,
  storedJson,
  type StoredDocument,
} from "./document-mapper";
import { PayloadDecodeError } from "./errors";
import { CONFIG_LABEL } from "./query";
import type {
  EnumerateOptions,
  EnumeratedRecord,
  EnumerationResult,
} from "./types";

/** Documents per listing page (Typesense's per_page maximum). */
export const PAGE_SIZE = 250;

export interface PaginatorOptions extends EnumerateOptions {
  log?: (message: string) => void;
}

/**
 * Enumerates every route record in the collection.
 *
 * Stops at the first empty page. Also stops when a page holds only hits that
 * were already returned, so a backend that keeps serving the same page cannot
 * trap the loop. Unreadable hits still count as new, keyed by their raw id
 * (or their raw JSON when they have none), so a page of them does not end the
 * scan. Backend errors reject immediately; nothing is retried.
 *
 * Config documents (label "__config__") are not route records and are left
 * out of the result.
 */
export async function enumerateAll(
  backend: DocumentBackend,
  options?: PaginatorOptions
): Promise<EnumerationResult> {
  const log = options?.log ?? console.log;
  const ids: string[] = [];
  const records: EnumeratedRecord[] = [];
  const seen = new Set<string>();

  for (let page = 1; ; page++) {
    const hits = await backend.search({ page, perPage: PAGE_SIZE });
    if (hits.length === 0) break;

    let fresh = 0;
    for (const hit of hits) {
      const key = hitKey(hit.document);
      if (seen.has(key)) continue;
      seen.add(key);
      fresh++;

      let document: StoredDocument;
      try {
        document = parseRouteDocument(hit.document);
      } catch (error) {
        log(`Warning: skipping unreadable document on page ${page}: ${describeError(error)}`);
        continue;
      }

      if (document.label === CONFIG_LABEL) continue;
      if (options?.prefix && !document.label.startsWith(options.prefix)) continue;

      const record: EnumeratedRecord = {
        label: document.label,
        text: document.text,
        structuredSchema: document.structured_schema,
      };

      if (options?.includeMetadata) {
        try {
          record.metadata = decodeStoredJson(
            storedJson("metadata", document.metadata),
            recordMetadataSchema
          );
        } catch (error) {
          if (!(error instanceof PayloadDecodeError)) throw error;
          log(`Warning: dropping metadata of ${document.id}: ${error.message}`);
        }
      }

      ids.push(document.id);
      records.push(record);
    }

    if (fresh === 0) {
      log(`Warning: page ${page} repeated earlier results; stopping enumeration.`);
      break;
    }
  }

  return { ids, records };
}

/** Identity of a raw hit before validation. */
function hitKey(document: unknown): string {
  if (typeof document === "object" && document !== null && "id" in document) {
    const { id } = document;
    if (typeof id === "string") return `id:${id}`;
  }
  return `raw:${JSON.stringify(document) ?? String(document)}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
