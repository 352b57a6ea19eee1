/**
 * Text helpers shared by the order tools
 */

/**
 * Lowercase, strip accents and collapse whitespace so "Pastéis  de Queijo" matches "pasteis de queijo"
 */
export function normalizeText(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .trim()
    .replace(/\s+/g, " ");
}

function matchingCharacters(a: string, b: string): number {
  if (!a || !b) return 0;

  // Longest common substring, then recurse on both sides of it
  let bestLength = 0;
  let bestA = 0;
  let bestB = 0;
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        const length = (previous[j - 1] ?? 0) + 1;
        current[j] = length;
        if (length > bestLength) {
          bestLength = length;
          bestA = i - length;
          bestB = j - length;
        }
      }
    }
    previous = current;
  }

  if (bestLength === 0) return 0;

  return (
    bestLength +
    matchingCharacters(a.slice(0, bestA), b.slice(0, bestB)) +
    matchingCharacters(a.slice(bestA + bestLength), b.slice(bestB + bestLength))
  );
}

/**
 * Ratcliff/Obershelp similarity in [0, 1]
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b)) / total;
}

/**
 * Score a candidate menu name against what the customer typed (both normalized)
 */
export function matchScore(target: string, candidate: string): number {
  if (candidate === target) return 1;
  if (candidate.includes(target) || target.includes(candidate)) return 0.9;
  return similarityRatio(target, candidate);
}

export const MIN_MATCH_SCORE = 0.55;

/**
 * Pick the best-scoring candidate; ties keep the earliest one
 */
export function findBestMatch<T>(query: string, candidates: T[], nameOf: (candidate: T) => string): T | null {
  const target = normalizeText(query);
  if (!target) return null;

  let best: T | null = null;
  let bestScore = 0;
  for (const candidate of candidates) {
    const normalized = normalizeText(nameOf(candidate));
    if (!normalized) continue;

    const score = matchScore(target, normalized);
    if (score === 1) return candidate;
    if (score > bestScore) {
      bestScore = score;
      best = candidate;
    }
  }

  return bestScore >= MIN_MATCH_SCORE ? best : null;
}

const QUANTITY_PREFIX =
  /^\s*(\d+)\s*(?:(?:x|vez(?:es)?|past(?:[eé]is|el)|unidades?|pcs?|pçs?)(?=\s|$)\s*)?(?:(?:de|do|da)\s+)?(.+)$/i;

/**
 * Split "2 pastéis de carne" into { item: "carne", quantity: 2 }
 */
export function extractQuantityPrefix(text: string): { item: string; quantity: number | null } {
  const trimmed = text.trim();
  const match = QUANTITY_PREFIX.exec(trimmed);
  if (!match) {
    return { item: trimmed, quantity: null };
  }

  const remainder = (match[2] ?? "").trim();
  if (!remainder || /^\d+$/.test(remainder)) {
    return { item: trimmed, quantity: null };
  }

  return { item: remainder, quantity: parseInt(match[1] ?? "", 10) };
}

export function formatCurrency(value: number): string {
  return `R$${value.toFixed(2).replace(".", ",")}`;
}

export function toCents(value: number): number {
  return Math.round(value * 100);
}
