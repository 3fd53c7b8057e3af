/**
 * sync.test.ts - Unit tests for route catalog sync
 *
 * Syncs into a real TypesenseRouteIndex over InMemoryBackend, with a fake
 * embedder that turns each text into a small deterministic vector.
 */

import { describe, it, expect, vi } from "vitest";
import { InMemoryBackend, TypesenseRouteIndex, type EmbeddingFunction } from "../vectorstore";
import type { Route } from "./routes";
import { ROUTES_HASH_FIELD, canonicalJson, computeRoutesHash, syncRoutes } from "./sync";

// ---------------------------------------------------------------------------
// Test fixture helpers
// ---------------------------------------------------------------------------

function createEmbedder(): EmbeddingFunction & { embed: ReturnType<typeof vi.fn> } {
  return {
    embed: vi.fn(async (texts: string[]) => texts.map((text) => [text.length, 1, 0])),
  };
}

function createIndex(): TypesenseRouteIndex {
  return new TypesenseRouteIndex(new InMemoryBackend(), { log: vi.fn() });
}

const ROUTES: Route[] = [
  { name: "billing", utterances: ["refund please", "invoice copy"] },
  { name: "chitchat", utterances: ["hello"] },
];

async function storedTexts(index: TypesenseRouteIndex): Promise<string[]> {
  const { records } = await index.getAll();
  return records.map((record) => `${record.label}/${record.text}`).sort();
}

// ---------------------------------------------------------------------------
// canonicalJson / computeRoutesHash
// ---------------------------------------------------------------------------

describe("canonicalJson", () => {
  it("sorts object keys at every level and drops undefined values", () => {
    expect(canonicalJson({ b: 1, a: [{ d: 1, c: 2 }], skip: undefined })).toBe(
      '{"a":[{"c":2,"d":1}],"b":1}'
    );
  });

  it("serializes scalars like JSON.stringify", () => {
    expect(canonicalJson("x")).toBe('"x"');
    expect(canonicalJson(null)).toBe("null");
    expect(canonicalJson(1.5)).toBe("1.5");
  });
});

describe("computeRoutesHash", () => {
  it("ignores route and utterance order", () => {
    const reordered: Route[] = [
      { name: "chitchat", utterances: ["hello"] },
      { name: "billing", utterances: ["invoice copy", "refund please"] },
    ];

    expect(computeRoutesHash(reordered)).toBe(computeRoutesHash(ROUTES));
  });

  it("ignores score thresholds", () => {
    const withThreshold: Route[] = [{ ...ROUTES[0], scoreThreshold: 0.8 }, ROUTES[1]];

    expect(computeRoutesHash(withThreshold)).toBe(computeRoutesHash(ROUTES));
  });

  it("changes when an utterance or metadata changes", () => {
    const base = computeRoutesHash(ROUTES);

    expect(computeRoutesHash([ROUTES[0], { name: "chitchat", utterances: ["hi"] }])).not.toBe(base);
    expect(
      computeRoutesHash([ROUTES[0], { ...ROUTES[1], metadata: { tone: "casual" } }])
    ).not.toBe(base);
  });

  it("is a sha256 hex digest", () => {
    expect(computeRoutesHash(ROUTES)).toMatch(/^[0-9a-f]{64}$/);
  });
});

// ---------------------------------------------------------------------------
// syncRoutes
// ---------------------------------------------------------------------------

describe("syncRoutes", () => {
  it("indexes every utterance on the first sync and stores the hash", async () => {
    const index = createIndex();
    const embedder = createEmbedder();
    const onProgress = vi.fn();

    const result = await syncRoutes({ index, routes: ROUTES, embedder, onProgress });

    expect(result).toEqual({ status: "synced", added: 3, removed: 0, hash: computeRoutesHash(ROUTES) });
    expect(await storedTexts(index)).toEqual([
      "billing/invoice copy",
      "billing/refund please",
      "chitchat/hello",
    ]);
    expect((await index.readConfig(ROUTES_HASH_FIELD)).value).toBe(computeRoutesHash(ROUTES));
    expect(embedder.embed).toHaveBeenCalledOnce();
    expect(onProgress.mock.calls.map(([message]) => message)).toEqual([
      "No sync recorded in the index; reconciling...",
      "Embedding and indexing 3 utterances...",
      "Sync complete: 3 added, 0 removed.",
    ]);
  });

  it("does nothing when the stored hash matches", async () => {
    const index = createIndex();
    const embedder = createEmbedder();
    await syncRoutes({ index, routes: ROUTES, embedder, onProgress: vi.fn() });
    const onProgress = vi.fn();

    const result = await syncRoutes({ index, routes: ROUTES, embedder, onProgress });

    expect(result.status).toBe("in-sync");
    expect(embedder.embed).toHaveBeenCalledOnce();
    expect(onProgress).toHaveBeenCalledWith("Index is in sync with the local routes.");
  });

  it("removes dropped utterances and embeds only new ones", async () => {
    const index = createIndex();
    const embedder = createEmbedder();
    await syncRoutes({ index, routes: ROUTES, embedder, onProgress: vi.fn() });

    const changed: Route[] = [
      { name: "billing", utterances: ["refund please", "charged twice"] },
      { name: "chitchat", utterances: ["hello"] },
    ];
    const result = await syncRoutes({ index, routes: changed, embedder, onProgress: vi.fn() });

    expect(result).toMatchObject({ status: "synced", added: 1, removed: 1 });
    expect(embedder.embed).toHaveBeenLastCalledWith(["charged twice"]);
    expect(await storedTexts(index)).toEqual([
      "billing/charged twice",
      "billing/refund please",
      "chitchat/hello",
    ]);
  });

  it("re-indexes utterances whose metadata changed", async () => {
    const index = createIndex();
    const embedder = createEmbedder();
    await syncRoutes({ index, routes: ROUTES, embedder, onProgress: vi.fn() });

    const changed: Route[] = [ROUTES[0], { ...ROUTES[1], metadata: { tone: "casual" } }];
    const result = await syncRoutes({ index, routes: changed, embedder, onProgress: vi.fn() });

    expect(result).toMatchObject({ added: 1, removed: 0 });
    const { records } = await index.getAll({ includeMetadata: true });
    expect(records.find((record) => record.text === "hello")?.metadata).toEqual({ tone: "casual" });
  });

  it("stores function schemas with their route's utterances", async () => {
    const index = createIndex();
    const routes: Route[] = [{ name: "billing", utterances: ["refund please"], functionSchema: { name: "refund" } }];

    await syncRoutes({ index, routes, embedder: createEmbedder(), onProgress: vi.fn() });

    const { records } = await index.getAll();
    expect(records).toEqual([{ label: "billing", text: "refund please", structuredSchema: '{"name":"refund"}' }]);
  });

  it("finishes an interrupted sync without re-embedding stored utterances", async () => {
    const index = createIndex();
    await index.add({
      embeddings: [
        [13, 1, 0],
        [12, 1, 0],
        [5, 1, 0],
      ],
      labels: ["billing", "billing", "chitchat"],
      utterances: ["refund please", "invoice copy", "hello"],
    });
    const embedder = createEmbedder();

    const result = await syncRoutes({ index, routes: ROUTES, embedder, onProgress: vi.fn() });

    expect(result).toMatchObject({ status: "synced", added: 0, removed: 0 });
    expect(embedder.embed).not.toHaveBeenCalled();
    expect((await index.readConfig(ROUTES_HASH_FIELD)).value).toBe(computeRoutesHash(ROUTES));
  });
});
