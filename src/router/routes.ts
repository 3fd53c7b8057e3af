/**
 * routes.ts - The route catalog
 *
 * A route is a label plus example utterances. Incoming text is routed to the
 * label whose utterances it is closest to. The catalog is plain JSON:
 *
 *   {
 *     "routes": [
 *       { "name": "billing", "utterances": ["where is my invoice", ...] }
 *     ]
 *   }
 *
 * data/routes.json ships as the default catalog.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import defaultCatalog from "../../data/routes.json";

export const routeSchema = z.object({
  name: z.string().min(1),
  utterances: z.array(z.string().min(1)).min(1),
  /** Function schema stored with every utterance of the route */
  functionSchema: z.record(z.unknown()).optional(),
  /** Free-form metadata stored with every utterance of the route */
  metadata: z.record(z.unknown()).optional(),
  /** Minimum similarity for this route; falls back to the router default */
  scoreThreshold: z.number().min(-1).max(1).optional(),
});

export type Route = z.infer<typeof routeSchema>;

const catalogSchema = z
  .object({ routes: z.array(routeSchema) })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.routes.forEach((route, i) => {
      if (seen.has(route.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["routes", i, "name"],
          message: `duplicate route name "${route.name}"`,
        });
      }
      seen.add(route.name);
    });
  });

/**
 * Validates a parsed catalog.
 *
 * @param raw - Parsed JSON
 * @param source - Where it came from, for the error message
 * @throws Error listing every problem found
 */
export function parseRoutes(raw: unknown, source: string): Route[] {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid route catalog ${source}: ${problems}`);
  }
  return parsed.data.routes;
}

/**
 * Loads the route catalog from a JSON file, or the bundled default.
 */
export function loadRoutes(file?: string): Route[] {
  if (!file) return parseRoutes(defaultCatalog, "data/routes.json");

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Could not read route catalog ${file}: ${message}`);
  }
  return parseRoutes(raw, file);
}
