/**
 * config.ts - Environment configuration for the Typesense connection
 *
 * Read once when the index is constructed. Every variable has a default, so
 * an empty environment connects to a local, unauthenticated Typesense. A
 * missing API key is not an error here; an unauthorized backend fails on
 * first use instead.
 *
 * | Variable                              | Default          |
 * |---------------------------------------|------------------|
 * | TYPESENSE_HOST                        | localhost        |
 * | TYPESENSE_PORT                        | 8108             |
 * | TYPESENSE_PROTOCOL                    | http             |
 * | TYPESENSE_API_KEY                     | (empty)          |
 * | TYPESENSE_COLLECTION                  | semantic_routes  |
 * | TYPESENSE_CONNECTION_TIMEOUT_SECONDS  | 10               |
 */

import { z } from "zod";

const envSchema = z.object({
  TYPESENSE_HOST: z.string().min(1).default("localhost"),
  TYPESENSE_PORT: z.coerce.number().int().positive().default(8108),
  TYPESENSE_PROTOCOL: z.enum(["http", "https"]).default("http"),
  TYPESENSE_API_KEY: z.string().default(""),
  TYPESENSE_COLLECTION: z.string().min(1).default("semantic_routes"),
  TYPESENSE_CONNECTION_TIMEOUT_SECONDS: z.coerce.number().positive().default(10),
});

export interface IndexConfig {
  host: string;
  port: number;
  protocol: "http" | "https";
  apiKey: string;
  collectionName: string;
  connectionTimeoutSeconds: number;
}

/**
 * Builds the connection config from environment variables.
 *
 * @param env - Variables to read (default: process.env)
 * @param overrides - Values that win over the environment (e.g. CLI flags)
 * @throws Error listing every invalid variable
 */
export function loadIndexConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides?: Partial<IndexConfig>
): IndexConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid Typesense configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    host: vars.TYPESENSE_HOST,
    port: vars.TYPESENSE_PORT,
    protocol: vars.TYPESENSE_PROTOCOL,
    apiKey: vars.TYPESENSE_API_KEY,
    collectionName: vars.TYPESENSE_COLLECTION,
    connectionTimeoutSeconds: vars.TYPESENSE_CONNECTION_TIMEOUT_SECONDS,
    ...overrides,
  };
}
