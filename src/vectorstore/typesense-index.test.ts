/**
 * typesense-index.test.ts - Unit tests for TypesenseRouteIndex
 *
 * Runs the index against InMemoryBackend, which ranks by cosine distance and
 * evaluates filter expressions the way a Typesense collection does. No
 * Typesense server or embedding API needed.
 */

import { describe, it, expect, vi } from "vitest";
import { makeRecordId } from "./document-mapper";
import { IndexInputError } from "./errors";
import { InMemoryBackend } from "./in-memory-backend";
import { TypesenseRouteIndex } from "./typesense-index";
import type { AddRequest } from "./types";

// ---------------------------------------------------------------------------
// Test fixture helpers
// ---------------------------------------------------------------------------

function createIndex(options: { dimensions?: number } = {}) {
  const backend = new InMemoryBackend();
  const log = vi.fn();
  const index = new TypesenseRouteIndex(backend, { ...options, log });
  return { backend, index, log };
}

/**
 * Two billing utterances near the x axis and one chitchat utterance on the
 * y axis.
 */
function makeAddRequest(overrides: Partial<AddRequest> = {}): AddRequest {
  return {
    embeddings: [
      [1, 0, 0],
      [0.8, 0.2, 0],
      [0, 1, 0],
    ],
    labels: ["billing", "billing", "chitchat"],
    utterances: ["I was charged twice", "refund my order", "hello there"],
    ...overrides,
  };
}

const QUERY = [0.9, 0.1, 0];

// ---------------------------------------------------------------------------
// add
// ---------------------------------------------------------------------------

describe("add", () => {
  it("creates the collection from the first vector's width", async () => {
    const { index, log } = createIndex();

    await index.add(makeAddRequest());

    expect(await index.describe()).toEqual({ type: "typesense", dimensions: 3, vectors: 3 });
    expect(log).toHaveBeenCalledWith('Created collection "semantic_routes" with 3 dimensions.');
    expect(log).toHaveBeenCalledWith('Upserted 3 documents into "semantic_routes".');
  });

  it("is idempotent for the same (label, utterance) pairs", async () => {
    const { index } = createIndex();

    await index.add(makeAddRequest());
    await index.add(makeAddRequest());

    expect(await index.count()).toBe(3);
  });

  it("keeps one record carrying the latest vector when a pair is re-added", async () => {
    const { backend, index } = createIndex();
    await index.add({ embeddings: [[1, 0]], labels: ["billing"], utterances: ["refund please"] });

    await index.add({ embeddings: [[0, 1]], labels: ["billing"], utterances: ["refund please"] });

    expect(await index.count()).toBe(1);
    expect(await backend.retrieveDocument(makeRecordId("billing", "refund please"))).toEqual(
      expect.objectContaining({ embedding: [0, 1] })
    );
  });

  it("stores function schemas and metadata with each utterance", async () => {
    const { backend, index } = createIndex();

    await index.add(
      makeAddRequest({
        functionSchemas: [{ name: "refund" }, null, null],
        metadataList: [{ team: "finance" }, {}, {}],
      })
    );

    expect(await backend.retrieveDocument(makeRecordId("billing", "I was charged twice"))).toEqual(
      expect.objectContaining({
        structured_schema: '{"name":"refund"}',
        metadata: '{"team":"finance"}',
      })
    );
  });

  it("does nothing for an empty batch", async () => {
    const { index } = createIndex();

    await index.add({ embeddings: [], labels: [], utterances: [] });

    expect(await index.isReady()).toBe(false);
  });

  it("rejects parallel arrays of different lengths", async () => {
    const { index } = createIndex();

    await expect(index.add(makeAddRequest({ labels: ["billing"] }))).rejects.toThrow(IndexInputError);
  });

  it("rejects an empty label", async () => {
    const { index } = createIndex();

    await expect(
      index.add(makeAddRequest({ labels: ["billing", "", "chitchat"] }))
    ).rejects.toThrow("Route label at position 1 is empty.");
  });

  it("rejects a label containing a backtick", async () => {
    const { index } = createIndex();

    await expect(
      index.add(makeAddRequest({ labels: ["billing", "bill`ing", "chitchat"] }))
    ).rejects.toThrow(
      "Route label at position 1 contains a backtick, which filter expressions cannot quote."
    );
    expect(await index.isReady()).toBe(false);
  });

  it("rejects vectors of another width once the collection exists", async () => {
    const { index } = createIndex();
    await index.add(makeAddRequest());

    await expect(
      index.add({ embeddings: [[1, 0]], labels: ["billing"], utterances: ["short vector"] })
    ).rejects.toThrow("must have 3 dimensions");
  });
});

// ---------------------------------------------------------------------------
// query
// ---------------------------------------------------------------------------

describe("query", () => {
  it("ranks billing above chitchat for a billing-like query", async () => {
    const { index } = createIndex();
    await index.add({
      embeddings: [
        [1, 0, 0],
        [0, 1, 0],
      ],
      labels: ["billing", "chitchat"],
      utterances: ["refund please", "nice weather"],
    });

    const matches = await index.query({ vector: QUERY, topK: 2 });

    expect(matches.map((match) => match.label)).toEqual(["billing", "chitchat"]);
    expect(matches[0].score).toBeCloseTo(0.99694, 4);
    expect(matches[1].score).toBeCloseTo(0.5552, 4);
  });

  it("returns the nearest utterances as descending similarities", async () => {
    const { index } = createIndex();
    await index.add(makeAddRequest());

    const matches = await index.query({ vector: QUERY, topK: 2 });

    expect(matches.map((match) => match.label)).toEqual(["billing", "billing"]);
    expect(matches[0].score).toBeCloseTo(0.99694, 4);
    expect(matches[0].score).toBeGreaterThan(matches[1].score);
  });

  it("only returns labels from the filter", async () => {
    const { index } = createIndex();
    await index.add(makeAddRequest());

    const matches = await index.query({ vector: QUERY, topK: 2, labelFilter: ["chitchat"] });

    expect(matches).toHaveLength(1);
    expect(matches[0].label).toBe("chitchat");
    expect(matches[0].score).toBeCloseTo(0.5552, 4);
  });

  it.each([1, 2, 3, 10])("keeps a two-route filter over three routes at topK %i", async (topK) => {
    const { index } = createIndex();
    await index.add({
      embeddings: [
        [1, 0, 0],
        [0, 1, 0],
        [0, 0, 1],
        [0.9, 0.1, 0],
      ],
      labels: ["billing", "chitchat", "shipping", "shipping"],
      utterances: ["refund please", "hello", "where is my parcel", "track my order"],
    });

    const matches = await index.query({ vector: QUERY, topK, labelFilter: ["billing", "chitchat"] });

    expect(matches).toHaveLength(Math.min(topK, 2));
    expect(matches.every((match) => match.label === "billing" || match.label === "chitchat")).toBe(true);
    expect(matches[0].label).toBe("billing");
  });

  it("never returns config documents", async () => {
    const { index } = createIndex();
    await index.add(makeAddRequest());
    await index.writeConfig({ field: "sr_hash", value: "abc123" });

    const matches = await index.query({ vector: QUERY, topK: 10 });

    expect(matches.map((match) => match.label)).toEqual(["billing", "billing", "chitchat"]);
  });

  it("returns nothing when the collection does not exist", async () => {
    const { index } = createIndex();

    expect(await index.query({ vector: QUERY })).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// deletes
// ---------------------------------------------------------------------------

describe("delete", () => {
  it("removes every utterance of one route", async () => {
    const { index } = createIndex();
    await index.add(makeAddRequest());

    expect(await index.delete("billing")).toBe(2);
    expect((await index.getAll()).records.map((record) => record.label)).toEqual(["chitchat"]);
  });

  it("deletes nothing when the collection does not exist", async () => {
    const { index } = createIndex();

    expect(await index.delete("billing")).toBe(0);
  });
});

describe("removeRecords", () => {
  it("deletes the listed utterances and counts only those that existed", async () => {
    const { index } = createIndex();
    await index.add(makeAddRequest());

    const removed = await index.removeRecords({
      billing: ["I was charged twice"],
      chitchat: ["never stored"],
    });

    expect(removed).toBe(1);
    expect((await index.getAll()).records.map((record) => record.text)).toEqual([
      "refund my order",
      "hello there",
    ]);
  });

  it("removes nothing when the collection does not exist", async () => {
    const { index } = createIndex();

    expect(await index.removeRecords({ billing: ["I was charged twice"] })).toBe(0);
  });
});

describe("deleteAll", () => {
  it("drops the collection and forgets its width", async () => {
    const { index } = createIndex();
    await index.add(makeAddRequest());

    await index.deleteAll();

    expect(await index.isReady()).toBe(false);
    expect(await index.describe()).toEqual({ type: "typesense", dimensions: 0, vectors: 0 });

    await index.add({ embeddings: [[1, 0]], labels: ["billing"], utterances: ["narrow"] });
    expect((await index.describe()).dimensions).toBe(2);
  });

  it("is a no-op when the collection does not exist", async () => {
    const { index } = createIndex();

    await expect(index.deleteIndex()).resolves.toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// getAll / config
// ---------------------------------------------------------------------------

describe("getAll", () => {
  it("returns ids derived from label and utterance", async () => {
    const { index } = createIndex();
    await index.add(makeAddRequest());

    const { ids } = await index.getAll();

    expect(ids).toEqual([
      makeRecordId("billing", "I was charged twice"),
      makeRecordId("billing", "refund my order"),
      makeRecordId("chitchat", "hello there"),
    ]);
  });
});

describe("config", () => {
  it("round-trips a value through the collection", async () => {
    const { index } = createIndex();
    await index.add(makeAddRequest());

    await index.writeConfig({ field: "routes_hash", value: "abc123" });

    expect((await index.readConfig("routes_hash")).value).toBe("abc123");
    expect((await index.getAll()).records).toHaveLength(3);
  });

  it("reads as empty before anything was written", async () => {
    const { index } = createIndex();

    expect(await index.readConfig("routes_hash")).toEqual({ field: "routes_hash", value: "" });
  });

  it("skips the write before the collection exists", async () => {
    const { index } = createIndex();

    await index.writeConfig({ field: "routes_hash", value: "abc123" });

    expect(await index.isReady()).toBe(false);
    expect((await index.readConfig("routes_hash")).value).toBe("");
  });
});

// ---------------------------------------------------------------------------
// initIndex / introspection
// ---------------------------------------------------------------------------

describe("initIndex", () => {
  it("creates the collection when the width is known", async () => {
    const { index } = createIndex({ dimensions: 4 });

    await index.initIndex();

    expect(await index.describe()).toEqual({ type: "typesense", dimensions: 4, vectors: 0 });
  });

  it("waits for the first add when the width is unknown", async () => {
    const { index } = createIndex();

    await index.initIndex();

    expect(await index.isReady()).toBe(false);
  });
});

describe("introspection", () => {
  it("reports an unreachable backend as not ready and empty", async () => {
    const { backend, index, log } = createIndex();
    vi.spyOn(backend, "retrieveCollection").mockRejectedValue(new Error("connect ECONNREFUSED"));

    expect(await index.isReady()).toBe(false);
    expect(await index.describe()).toEqual({ type: "typesense", dimensions: 0, vectors: 0 });
    expect(await index.count()).toBe(0);
    expect(log).toHaveBeenCalledWith(
      'Warning: isReady could not reach "semantic_routes": connect ECONNREFUSED'
    );
  });

  it("learns the width of an existing collection from describe", async () => {
    const first = createIndex();
    await first.index.add(makeAddRequest());

    const second = new TypesenseRouteIndex(first.backend, { log: vi.fn() });

    expect((await second.describe()).dimensions).toBe(3);
  });
});
