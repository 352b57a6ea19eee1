/**
 * Convert graph replies into plain JSON rows the model can read
 */

import type { QueryRow } from "../types/agent.js";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Nodes become { labels, properties }, edges { type, properties }; internal ids are dropped
 */
export function normalizeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(normalizeValue);
  }
  if (!isRecord(value)) {
    return value;
  }
  if ("labels" in value && "properties" in value) {
    return { labels: value.labels, properties: value.properties };
  }
  if ("relationshipType" in value && "properties" in value) {
    return { type: value.relationshipType, properties: value.properties };
  }
  const plain: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    plain[key] = normalizeValue(entry);
  }
  return plain;
}

/**
 * Column names like "p.name" are shortened to "name"; blank or numeric headers become col_<index>
 */
export function normalizeHeader(header: string, index: number): string {
  const trimmed = header.trim();
  if (!trimmed || /^\d+$/.test(trimmed)) {
    return `col_${index}`;
  }
  const parts = trimmed.split(".");
  return parts[parts.length - 1] || `col_${index}`;
}

export function normalizeRows(data: unknown): QueryRow[] {
  if (!Array.isArray(data)) {
    return [];
  }

  return data.filter(isRecord).map((row) => {
    const normalized: QueryRow = {};
    Object.entries(row).forEach(([header, value], index) => {
      normalized[normalizeHeader(header, index)] = normalizeValue(value);
    });
    return normalized;
  });
}
