/**
 * document-mapper.ts - Route utterances to backend documents and back
 *
 * What this file does:
 * - makeRecordId(): deterministic document id for a (label, utterance) pair
 * - toRouteDocument(): builds the flat document stored in the collection
 * - storedJson() / decodeStoredJson(): the JSON-in-a-string fields, modelled
 *   as a tagged payload and decoded through a zod schema
 * - parseRouteDocument(): validates a document read back from the backend
 *
 * Everything here is pure; no network calls.
 */

import { createHash } from "crypto";
import { z } from "zod";
import type { RouteDocument } from "./backend";
import { PayloadDecodeError } from "./errors";
import type { FunctionSchema, RecordMetadata } from "./types";

/** Separator between label and utterance in the id hash input. */
const ID_SEPARATOR = "::";

/** Hex characters kept from the sha256 digest (64 bits). */
const ID_LENGTH = 16;

/**
 * Derives the document id for a (label, utterance) pair.
 *
 * The same pair always yields the same id, so re-indexing an utterance
 * overwrites its previous document instead of adding a duplicate.
 */
export function makeRecordId(label: string, utterance: unknown): string {
  return createHash("sha256")
    .update(`${label}${ID_SEPARATOR}${String(utterance)}`)
    .digest("hex")
    .slice(0, ID_LENGTH);
}

export interface RecordInput {
  label: string;
  utterance: unknown;
  functionSchema?: FunctionSchema | null;
  metadata?: RecordMetadata;
  vector: number[];
}

/**
 * Converts one utterance into the document stored in the backend.
 *
 * A missing function schema is stored as "null" and missing metadata as "{}",
 * never as an absent field, so readers can always parse both.
 */
export function toRouteDocument(input: RecordInput): RouteDocument {
  const text = String(input.utterance);
  return {
    id: makeRecordId(input.label, text),
    label: input.label,
    text,
    structured_schema: JSON.stringify(input.functionSchema ?? null),
    metadata: JSON.stringify(input.metadata ?? {}),
    embedding: input.vector,
  };
}

// ---------------------------------------------------------------------------
// Stored JSON payloads
// ---------------------------------------------------------------------------

/**
 * A JSON value that the backend keeps as an opaque string.
 */
export interface StoredPayload {
  format: "json";
  /** Backend field the payload came from, for error reporting */
  field: string;
  raw: string;
}

export function storedJson(field: string, raw: string): StoredPayload {
  return { format: "json", field, raw };
}

/**
 * Decodes a stored payload into a typed value.
 *
 * @throws PayloadDecodeError when the text is not JSON or does not match schema
 */
export function decodeStoredJson<T>(
  payload: StoredPayload,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PayloadDecodeError(payload.field, message);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new PayloadDecodeError(
      payload.field,
      "unexpected shape",
      result.error.issues
    );
  }
  return result.data;
}

/** Free-form metadata must decode to a plain JSON object. */
export const recordMetadataSchema: z.ZodType<RecordMetadata> = z.record(
  z.unknown()
);

// ---------------------------------------------------------------------------
// Documents read back from the backend
// ---------------------------------------------------------------------------

/**
 * Shape of a stored document as far as readers care. Missing text fields fall
 * back to the empty JSON values the mapper would have written.
 */
const storedDocumentSchema = z.object({
  id: z.string(),
  label: z.string().default(""),
  text: z.string().default(""),
  structured_schema: z.string().default("null"),
  metadata: z.string().default("{}"),
});

export type StoredDocument = z.infer<typeof storedDocumentSchema>;

/**
 * Validates a raw backend document.
 *
 * @throws PayloadDecodeError when the document lacks an id or has fields of
 *         the wrong type
 */
export function parseRouteDocument(document: unknown): StoredDocument {
  const result = storedDocumentSchema.safeParse(document);
  if (!result.success) {
    throw new PayloadDecodeError("document", "unexpected shape", result.error.issues);
  }
  return result.data;
}
