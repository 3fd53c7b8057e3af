/**
 * semantic-router.ts - Routes text to the closest route
 *
 * For each input text:
 * 1. Embed it
 * 2. Query the index for the top-k closest utterances
 * 3. Group the hits by route label and aggregate their similarities
 * 4. Take the route with the best aggregate, if its best single hit clears
 *    the route's threshold
 */

import type { EmbeddingFunction, RouteIndex, RouteMatch } from "../vectorstore";
import type { Route } from "./routes";
import { syncRoutes, type SyncResult } from "./sync";

export type Aggregation = "mean" | "max" | "sum";

export interface SemanticRouterOptions {
  index: RouteIndex;
  embedder: EmbeddingFunction;
  routes: Route[];
  /** Utterances considered per query (default: 5) */
  topK?: number;
  /** How hits of one route combine into its score (default: "mean") */
  aggregation?: Aggregation;
  /** Threshold for routes without their own scoreThreshold (default: 0.82) */
  defaultThreshold?: number;
}

export interface RouteChoice {
  /** Chosen route, or null when nothing cleared its threshold */
  name: string | null;
  /** Aggregated similarity of the chosen route */
  similarityScore: number | null;
}

export interface RouteOptions {
  /** Only consider these routes */
  routeFilter?: string[];
}

/**
 * Minimum best-hit similarity for routes without their own threshold.
 * Scores are (1 + cosine) / 2, so this is a cosine of 0.64.
 */
export const DEFAULT_SCORE_THRESHOLD = 0.82;

const NO_ROUTE: RouteChoice = { name: null, similarityScore: null };

function aggregate(scores: number[], aggregation: Aggregation): number {
  switch (aggregation) {
    case "max":
      return Math.max(...scores);
    case "sum":
      return scores.reduce((total, score) => total + score, 0);
    case "mean":
      return scores.reduce((total, score) => total + score, 0) / scores.length;
  }
}

/**
 * Usage:
 *   const router = new SemanticRouter({ index, embedder, routes });
 *   await router.sync();
 *   const choice = await router.route("I was charged twice");
 *   // { name: "billing", similarityScore: 0.87 }
 */
export class SemanticRouter {
  private readonly index: RouteIndex;
  private readonly embedder: EmbeddingFunction;
  private readonly routes: Route[];
  private readonly topK: number;
  private readonly aggregation: Aggregation;
  private readonly defaultThreshold: number;

  constructor(options: SemanticRouterOptions) {
    this.index = options.index;
    this.embedder = options.embedder;
    this.routes = options.routes;
    this.topK = options.topK ?? 5;
    this.aggregation = options.aggregation ?? "mean";
    this.defaultThreshold = options.defaultThreshold ?? DEFAULT_SCORE_THRESHOLD;
  }

  /** Number of routes in the local catalog. */
  get routeCount(): number {
    return this.routes.length;
  }

  /**
   * Brings the index in line with this router's routes. See sync.ts.
   */
  async sync(onProgress?: (message: string) => void): Promise<SyncResult> {
    return syncRoutes({
      index: this.index,
      routes: this.routes,
      embedder: this.embedder,
      onProgress,
    });
  }

  async route(text: string, options?: RouteOptions): Promise<RouteChoice> {
    const [choice] = await this.routeBatch([text], options);
    return choice;
  }

  /**
   * Routes several texts with one embedding call.
   */
  async routeBatch(texts: string[], options?: RouteOptions): Promise<RouteChoice[]> {
    if (texts.length === 0) return [];
    const vectors = await this.embedder.embed(texts);

    const choices: RouteChoice[] = [];
    for (const vector of vectors) {
      const matches = await this.index.query({
        vector,
        topK: this.topK,
        labelFilter: options?.routeFilter,
      });
      choices.push(this.classify(matches));
    }
    return choices;
  }

  /**
   * Picks the route with the best aggregated score. On ties the route whose
   * first hit ranked higher wins.
   */
  private classify(matches: RouteMatch[]): RouteChoice {
    const byLabel = new Map<string, number[]>();
    for (const match of matches) {
      const scores = byLabel.get(match.label) ?? [];
      scores.push(match.score);
      byLabel.set(match.label, scores);
    }

    let best: { label: string; score: number; scores: number[] } | null = null;
    for (const [label, scores] of byLabel) {
      const score = aggregate(scores, this.aggregation);
      if (!best || score > best.score) best = { label, score, scores };
    }
    if (!best) return NO_ROUTE;

    const chosen = best;
    const threshold =
      this.routes.find((route) => route.name === chosen.label)?.scoreThreshold ??
      this.defaultThreshold;
    if (Math.max(...chosen.scores) <= threshold) return NO_ROUTE;

    return { name: chosen.label, similarityScore: chosen.score };
  }
}
