/**
 * Menu file format and the writes that load it into the graph
 */

import { readFile } from "fs/promises";
import { z } from "genkit";

export const DEFAULT_MENU_FILE = new URL("../../data/menu.json", import.meta.url);

export const menuEntrySchema = z.object({
  name: z.string().min(1),
  category: z.enum(["Salgado", "Doce"]),
  price: z.number().finite().nonnegative(),
  ingredients: z.array(z.string().min(1)).min(1),
});

export const menuFileSchema = z.array(menuEntrySchema).min(1);

export type MenuEntry = z.infer<typeof menuEntrySchema>;

export const CLEAR_GRAPH_QUERY = "MATCH (n) DETACH DELETE n";

export const CREATE_MENU_QUERY = `
UNWIND $menu AS entry
CREATE (p:Pastel {name: entry.name, category: entry.category, price: entry.price})
WITH p, entry.ingredients AS ingredients
UNWIND ingredients AS ingredient
MERGE (i:Ingrediente {name: ingredient})
CREATE (p)-[:FEITO_DE]->(i)
`.trim();

export const MENU_SUMMARY_QUERY = `
MATCH (p:Pastel)-[r:FEITO_DE]->(i:Ingrediente)
RETURN count(DISTINCT p) AS pastels, count(DISTINCT i) AS ingredients, count(r) AS relationships
`.trim();

export async function readMenuFile(file: URL = DEFAULT_MENU_FILE): Promise<MenuEntry[]> {
  const raw: unknown = JSON.parse(await readFile(file, "utf-8"));
  return menuFileSchema.parse(raw);
}
