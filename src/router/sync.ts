/**
 * sync.ts - Keeps the stored index in line with the local route catalog
 *
 * The index keeps a hash of the route set it was last synced from (config
 * field "sr_hash"). On sync:
 *
 * 1. Hash the local routes and compare with the stored hash. Equal → done.
 * 2. Enumerate the stored records and diff them against the local routes.
 * 3. Remove stored utterances the catalog no longer has.
 * 4. Embed and upsert utterances that are new or whose schema/metadata changed.
 * 5. Store the new hash.
 *
 * Every step is idempotent, so an interrupted sync is repaired by the next one.
 */

import { createHash } from "crypto";
import type { EmbeddingFunction, EnumeratedRecord, RouteIndex } from "../vectorstore";
import type { Route } from "./routes";

/** Config field holding the hash of the last synced route set. */
export const ROUTES_HASH_FIELD = "sr_hash";

export interface SyncOptions {
  index: RouteIndex;
  routes: Route[];
  embedder: EmbeddingFunction;
  /** Progress messages (default: stdout) */
  onProgress?: (message: string) => void;
}

export interface SyncResult {
  status: "in-sync" | "synced";
  added: number;
  removed: number;
  hash: string;
}

/** One utterance as the local catalog wants it stored. */
interface LocalEntry {
  label: string;
  text: string;
  structuredSchema: string;
  metadata: Record<string, unknown>;
}

/**
 * Serializes a JSON value with object keys sorted, so equal values always
 * produce equal strings.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/**
 * Hash of everything about the routes that ends up in the index. Route and
 * utterance order do not matter; score thresholds are not stored and are
 * left out.
 */
export function computeRoutesHash(routes: Route[]): string {
  const normalized = [...routes]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((route) => ({
      name: route.name,
      utterances: [...route.utterances].sort(),
      functionSchema: route.functionSchema ?? null,
      metadata: route.metadata ?? {},
    }));
  return createHash("sha256").update(canonicalJson(normalized)).digest("hex");
}

function entryKey(label: string, text: string): string {
  return `${label}\u0000${text}`;
}

function localEntries(routes: Route[]): Map<string, LocalEntry> {
  const entries = new Map<string, LocalEntry>();
  for (const route of routes) {
    for (const text of route.utterances) {
      entries.set(entryKey(route.name, text), {
        label: route.name,
        text,
        structuredSchema: JSON.stringify(route.functionSchema ?? null),
        metadata: route.metadata ?? {},
      });
    }
  }
  return entries;
}

function isCurrent(stored: EnumeratedRecord, wanted: LocalEntry): boolean {
  return (
    stored.structuredSchema === wanted.structuredSchema &&
    canonicalJson(stored.metadata ?? {}) === canonicalJson(wanted.metadata)
  );
}

/**
 * Brings the index in line with the local routes.
 */
export async function syncRoutes(options: SyncOptions): Promise<SyncResult> {
  const { index, routes, embedder } = options;
  const onProgress = options.onProgress ?? console.log;

  const hash = computeRoutesHash(routes);
  const stored = await index.readConfig(ROUTES_HASH_FIELD);
  if (stored.value === hash) {
    onProgress("Index is in sync with the local routes.");
    return { status: "in-sync", added: 0, removed: 0, hash };
  }

  onProgress(
    stored.value
      ? "Local routes changed since the last sync; reconciling index..."
      : "No sync recorded in the index; reconciling..."
  );

  const wanted = localEntries(routes);
  const { records } = await index.getAll({ includeMetadata: true });

  const storedByKey = new Map<string, EnumeratedRecord>();
  const toRemove: Record<string, string[]> = {};
  let removeCount = 0;
  for (const record of records) {
    const key = entryKey(record.label, record.text);
    storedByKey.set(key, record);
    if (!wanted.has(key)) {
      (toRemove[record.label] ??= []).push(record.text);
      removeCount++;
    }
  }

  const toAdd = [...wanted.entries()]
    .filter(([key, entry]) => {
      const existing = storedByKey.get(key);
      return !existing || !isCurrent(existing, entry);
    })
    .map(([, entry]) => entry);

  let removed = 0;
  if (removeCount > 0) {
    onProgress(`Removing ${removeCount} stale utterances...`);
    removed = await index.removeRecords(toRemove);
  }

  if (toAdd.length > 0) {
    onProgress(`Embedding and indexing ${toAdd.length} utterances...`);
    const embeddings = await embedder.embed(toAdd.map((entry) => entry.text));
    const byName = new Map(routes.map((route) => [route.name, route]));
    await index.add({
      embeddings,
      labels: toAdd.map((entry) => entry.label),
      utterances: toAdd.map((entry) => entry.text),
      functionSchemas: toAdd.map((entry) => byName.get(entry.label)?.functionSchema ?? null),
      metadataList: toAdd.map((entry) => entry.metadata),
    });
  }

  await index.writeConfig({ field: ROUTES_HASH_FIELD, value: hash });

  onProgress(`Sync complete: ${toAdd.length} added, ${removed} removed.`);
  return { status: "synced", added: toAdd.length, removed, hash };
}
