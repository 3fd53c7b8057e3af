#!/usr/bin/env node
/**
 * index.ts - CLI entry point for semantic-route-index
 *
 * Commands:
 *
 * 1. Sync the route catalog into Typesense:
 *    semantic-route-index sync [--routes catalog.json]
 *
 * 2. Route one or more texts:
 *    semantic-route-index route "I was charged twice" "hello!"
 *    Syncs first (unless --skip-sync), then prints the chosen route per text.
 *
 * 3. Inspect or drop the index:
 *    semantic-route-index describe
 *    semantic-route-index delete-index
 *
 * Typesense connection settings come from TYPESENSE_* environment variables
 * (see src/config.ts); --collection overrides TYPESENSE_COLLECTION.
 */

// Initialize OpenTelemetry tracing before any other imports
import "./tracing";

import { Command } from "commander";
import { loadIndexConfig, type IndexConfig } from "./config";
import { SemanticRouter, loadRoutes } from "./router";
import { TypesenseBackend, TypesenseRouteIndex, VoyageEmbedding } from "./vectorstore";

// ---------------------------------------------------------------------------
// Environment validation
// ---------------------------------------------------------------------------

/**
 * Validates that the Voyage AI API key is set.
 * sync and route embed text; describe and delete-index do not.
 */
function validateVoyageKey(): void {
  if (!process.env.VOYAGE_API_KEY) {
    console.error("Error: VOYAGE_API_KEY environment variable is not set.");
    console.error("");
    console.error("Export your API key:");
    console.error("  export VOYAGE_API_KEY=your-key-here");
    process.exit(1);
  }
}

interface IndexFlags {
  collection?: string;
}

function createIndex(flags: IndexFlags): TypesenseRouteIndex {
  const overrides: Partial<IndexConfig> = {};
  if (flags.collection) overrides.collectionName = flags.collection;
  return new TypesenseRouteIndex(
    new TypesenseBackend(loadIndexConfig(process.env, overrides))
  );
}

/**
 * Prints a failure with a hint matching its likely cause, then exits.
 */
function reportFailure(action: string, error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  if (message.includes("ECONNREFUSED") || message.includes("timeout")) {
    console.error(`\nTypesense connection failed: ${message}`);
    console.error("Is Typesense running? Check TYPESENSE_HOST, TYPESENSE_PORT and TYPESENSE_PROTOCOL.");
  } else if (message.includes("401") || message.includes("403") || message.includes("API key")) {
    console.error(`\nAPI key error: ${message}`);
    console.error("Check TYPESENSE_API_KEY and VOYAGE_API_KEY environment variables.");
  } else {
    console.error(`\n${action} failed: ${message}`);
  }
  process.exit(1);
}

/**
 * Main function - sets up the CLI subcommands
 */
async function main() {
  const program = new Command();

  program
    .name("semantic-route-index")
    .description("Route text to intents using embeddings stored in Typesense")
    .version("0.1.0");

  // -------------------------------------------------------------------------
  // sync: push the route catalog into the index
  // -------------------------------------------------------------------------

  program
    .command("sync")
    .description("Sync the route catalog into the Typesense collection")
    .option("--routes <file>", "Route catalog JSON (default: bundled data/routes.json)")
    .option("--collection <name>", "Collection name (default: TYPESENSE_COLLECTION or semantic_routes)")
    .action(async (options: { routes?: string } & IndexFlags) => {
      validateVoyageKey();

      const router = new SemanticRouter({
        index: createIndex(options),
        embedder: new VoyageEmbedding(),
        routes: loadRoutes(options.routes),
      });

      console.log(`\nSyncing ${router.routeCount} routes...\n`);
      try {
        await router.sync();
      } catch (error) {
        reportFailure("Sync", error);
      }
    });

  // -------------------------------------------------------------------------
  // route: classify texts
  // -------------------------------------------------------------------------

  program
    .command("route")
    .description("Route one or more texts to the closest route")
    .argument("<texts...>", "Texts to route")
    .option("--routes <file>", "Route catalog JSON (default: bundled data/routes.json)")
    .option("--collection <name>", "Collection name (default: TYPESENSE_COLLECTION or semantic_routes)")
    .option("--top-k <n>", "Utterances considered per text", "5")
    .option("--skip-sync", "Route against the index as it is, without syncing first")
    .action(
      async (
        texts: string[],
        options: { routes?: string; topK: string; skipSync?: boolean } & IndexFlags
      ) => {
        validateVoyageKey();

        const topK = Number.parseInt(options.topK, 10);
        if (!Number.isInteger(topK) || topK < 1) {
          console.error(`Error: --top-k must be a positive integer, got "${options.topK}".`);
          process.exit(1);
        }

        const router = new SemanticRouter({
          index: createIndex(options),
          embedder: new VoyageEmbedding(),
          routes: loadRoutes(options.routes),
          topK,
        });

        try {
          if (!options.skipSync) await router.sync();
          const choices = await router.routeBatch(texts);
          console.log();
          choices.forEach((choice, i) => {
            const score = choice.similarityScore === null ? "" : ` (${choice.similarityScore.toFixed(3)})`;
            console.log(`${texts[i]} → ${choice.name ?? "(no route)"}${score}`);
          });
        } catch (error) {
          reportFailure("Routing", error);
        }
      }
    );

  // -------------------------------------------------------------------------
  // describe / delete-index
  // -------------------------------------------------------------------------

  program
    .command("describe")
    .description("Show readiness, vector width and document count of the index")
    .option("--collection <name>", "Collection name (default: TYPESENSE_COLLECTION or semantic_routes)")
    .action(async (options: IndexFlags) => {
      const index = createIndex(options);
      const [ready, description] = await Promise.all([index.isReady(), index.describe()]);
      console.log(`Ready:      ${ready ? "yes" : "no"}`);
      console.log(`Type:       ${description.type}`);
      console.log(`Dimensions: ${description.dimensions}`);
      console.log(`Documents:  ${description.vectors}`);
    });

  program
    .command("delete-index")
    .description("Drop the Typesense collection")
    .option("--collection <name>", "Collection name (default: TYPESENSE_COLLECTION or semantic_routes)")
    .action(async (options: IndexFlags) => {
      try {
        await createIndex(options).deleteIndex();
      } catch (error) {
        reportFailure("Delete", error);
      }
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
