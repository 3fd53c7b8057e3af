/**
 * query.ts - Builds vector search requests and converts their results
 *
 * Typesense reports cosine *distance* (0 = identical, 2 = opposite). The
 * router works with a similarity in [0, 1], so every hit goes through
 * distanceToSimilarity():
 *
 *   similarity = 1 - distance / 2
 *
 * That is (1 + cosine) / 2: orthogonal vectors score 0.5.
 *
 * The conversion is monotonic-decreasing, so the backend's nearest-first
 * order is already descending similarity and no re-sorting is needed.
 */

import { VECTOR_FIELD, type SearchHit, type SearchRequest } from "./backend";
import { parseRouteDocument } from "./document-mapper";
import type { RouteMatch } from "./types";

/** Largest cosine distance the backend can report. */
export const MAX_COSINE_DISTANCE = 2;

/** Label reserved for config documents; never a real route. */
export const CONFIG_LABEL = "__config__";

export const DEFAULT_TOP_K = 5;

export function distanceToSimilarity(distance: number): number {
  return 1 - distance / 2;
}

/**
 * Renders the vector clause: "embedding:([0.1,0.2,0.3], k:5)".
 */
export function renderVectorQuery(vector: number[], topK: number): string {
  return `${VECTOR_FIELD}:([${vector.join(",")}], k:${topK})`;
}

/**
 * Quotes a filter value with backticks so labels containing spaces, commas or
 * operators are matched literally. Typesense has no escape for a backtick
 * inside the quotes, so add() refuses labels that contain one.
 */
function quoteFilterValue(value: string): string {
  return `\`${value}\``;
}

export function labelEquals(label: string): string {
  return `label:=${quoteFilterValue(label)}`;
}

/**
 * Builds the filter for a similarity search.
 *
 * Config documents are always excluded. A non-empty label list adds an
 * OR-of-equality group, e.g.
 *
 *   label:!=`__config__` && (label:=`billing` || label:=`refunds`)
 *
 * The expression grows linearly with the list; callers with thousands of
 * labels should filter in smaller groups.
 */
export function buildLabelFilter(labelFilter?: string[]): string {
  const excludeConfig = `label:!=${quoteFilterValue(CONFIG_LABEL)}`;
  if (!labelFilter || labelFilter.length === 0) return excludeConfig;

  const anyLabel = labelFilter.map(labelEquals).join(" || ");
  return `${excludeConfig} && (${anyLabel})`;
}

/**
 * Builds the single-page search request for a top-k query.
 */
export function buildSearchRequest(
  vector: number[],
  topK: number,
  labelFilter?: string[]
): SearchRequest {
  return {
    vectorQuery: renderVectorQuery(vector, topK),
    filterBy: buildLabelFilter(labelFilter),
    page: 1,
    perPage: topK,
  };
}

/**
 * Converts raw hits into route matches, keeping the backend order.
 *
 * A hit without a distance is ranked as far away as possible rather than
 * dropped. A hit whose document cannot be validated is skipped and reported
 * through onInvalid.
 */
export function toRouteMatches(
  hits: SearchHit[],
  onInvalid?: (error: unknown) => void
): RouteMatch[] {
  const matches: RouteMatch[] = [];
  for (const hit of hits) {
    let label: string;
    try {
      label = parseRouteDocument(hit.document).label;
    } catch (error) {
      onInvalid?.(error);
      continue;
    }
    const distance = hit.vectorDistance ?? MAX_COSINE_DISTANCE;
    matches.push({ label, score: distanceToSimilarity(distance) });
  }
  return matches;
}
