/**
 * Rebuild the menu graph from data/menu.json
 *
 * Usage: npm run seed
 */

import { FalkorDB } from "falkordb";
import { loadConfig } from "../config/env.js";
import { falkorConnectionOptions } from "../database/falkorClient.js";
import { CLEAR_GRAPH_QUERY, CREATE_MENU_QUERY, MENU_SUMMARY_QUERY, readMenuFile } from "../database/menuSeed.js";
import { createLogger, parseLogLevel } from "../utils/logger.js";
import { errorMessage, toError } from "../utils/errors.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(parseLogLevel(config.logLevel));
  const menu = await readMenuFile();

  logger.info("Seeding menu graph", { graph: config.falkor.graph, entries: menu.length });

  const db = await FalkorDB.connect(falkorConnectionOptions(config.falkor));
  try {
    const graph = db.selectGraph(config.falkor.graph);
    await graph.query(CLEAR_GRAPH_QUERY);
    await graph.query(CREATE_MENU_QUERY, { params: { menu } });

    const summary = await graph.roQuery(MENU_SUMMARY_QUERY);
    logger.info("Menu graph seeded", { graph: config.falkor.graph, summary: summary.data });
  } finally {
    await db.close();
  }
}

main().catch((error: unknown) => {
  console.error(`Seeding failed: ${errorMessage(error)}`);
  console.error(toError(error).stack);
  process.exit(1);
});
