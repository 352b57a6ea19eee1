/**
 * Fixed read queries against the menu graph
 */

import { z } from "genkit";
import type { QueryClient } from "../types/agent.js";
import type { Logger } from "../utils/logger.js";

export const MENU_PRICES_QUERY = `
MATCH (p:Pastel)
RETURN p.name AS name, p.price AS price
ORDER BY name
`.trim();

const menuPriceRowSchema = z.object({
  name: z.string().min(1),
  price: z.union([z.number(), z.string().min(1)]).transform(Number).pipe(z.number().finite().nonnegative()),
});

export type MenuPrice = z.infer<typeof menuPriceRowSchema>;

/**
 * Load every pastel with its price; rows with a missing name or unusable price are skipped
 */
export async function loadMenuPrices(queryClient: QueryClient, logger: Logger): Promise<MenuPrice[]> {
  const rows = await queryClient.runQuery(MENU_PRICES_QUERY);
  const entries: MenuPrice[] = [];

  for (const row of rows) {
    const parsed = menuPriceRowSchema.safeParse(row);
    if (!parsed.success) {
      logger.warn("Invalid menu row skipped", { row });
      continue;
    }
    entries.push(parsed.data);
  }

  return entries;
}
