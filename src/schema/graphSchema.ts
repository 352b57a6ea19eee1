/**
 * Describes the menu graph's labels, properties and relationships for Cypher generation
 */

import type { QueryClient, QueryRow } from "../types/agent.js";
import type { Logger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";

export const NODE_LABELS_QUERY = "MATCH (n) UNWIND labels(n) AS label RETURN DISTINCT label ORDER BY label";

export const NODE_PROPERTIES_QUERY = `
MATCH (n)
UNWIND labels(n) AS label
UNWIND keys(n) AS property
RETURN label, collect(DISTINCT property) AS properties
`.trim();

export const RELATIONSHIPS_QUERY = `
MATCH (start)-[r]->(end)
RETURN DISTINCT labels(start) AS source, type(r) AS rel_type, labels(end) AS target, keys(r) AS properties
`.trim();

const strings = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];

export function describeSchema(labelRows: QueryRow[], propertyRows: QueryRow[], relationshipRows: QueryRow[]): string {
  const labels = labelRows.map((row) => row.label).filter((label): label is string => typeof label === "string");
  const properties = new Map<string, string[]>();
  for (const row of propertyRows) {
    if (typeof row.label === "string") {
      properties.set(row.label, strings(row.properties));
    }
  }

  const lines: string[] = [];

  if (labels.length > 0) {
    lines.push("Node types:");
    for (const label of labels) {
      const props = [...(properties.get(label) ?? [])].sort().join(", ") || "no explicit properties";
      lines.push(`- ${label} { ${props} }`);
    }
  } else {
    lines.push("Node types: none found.");
  }

  if (relationshipRows.length > 0) {
    lines.push("\nRelationships:");
    for (const row of relationshipRows) {
      const lhs = strings(row.source).join(":") || "Unknown";
      const rhs = strings(row.target).join(":") || "Unknown";
      const relType = typeof row.rel_type === "string" ? row.rel_type : "UNKNOWN";
      const props = [...strings(row.properties)].sort().join(", ") || "no properties";
      lines.push(`- (${lhs})-[:${relType}]->(${rhs}) { ${props} }`);
    }
  } else {
    lines.push("\nRelationships: none found.");
  }

  return lines.join("\n");
}

/**
 * Loads the description once; an introspection failure is not cached so the next call retries
 */
export class GraphSchemaCache {
  private cached: Promise<string> | null = null;

  constructor(
    private readonly queryClient: QueryClient,
    private readonly logger: Logger
  ) {}

  get(): Promise<string> {
    if (!this.cached) {
      this.cached = this.load().catch((error: unknown) => {
        this.cached = null;
        throw error;
      });
    }
    return this.cached;
  }

  invalidate(): void {
    this.cached = null;
  }

  private async load(): Promise<string> {
    const [labels, properties, relationships] = await Promise.all([
      this.queryClient.runQuery(NODE_LABELS_QUERY),
      this.queryClient.runQuery(NODE_PROPERTIES_QUERY),
      this.queryClient.runQuery(RELATIONSHIPS_QUERY),
    ]).catch((error: unknown) => {
      this.logger.warn("Graph schema introspection failed", { error: errorMessage(error) });
      throw error;
    });

    const description = describeSchema(labels, properties, relationships);
    this.logger.debug("Graph schema loaded", { description });
    return description;
  }
}
