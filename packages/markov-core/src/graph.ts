import { InvalidArgumentError } from "./errors";
import type { GraphStats, Token, TransitionGraph } from "./types";

export function createGraph(): TransitionGraph {
  return new Map();
}

/**
 * Joins prefix tokens without a separator so the graph stays a plain
 * string-keyed structure. Lossy: ["a", "bc"] and ["ab", "c"] share "abc".
 */
export function prefixKey(tokens: readonly Token[]): string {
  return tokens.join("");
}

export function assertTokens(tokens: unknown, length: number, what: string): asserts tokens is readonly Token[] {
  if (!Array.isArray(tokens)) {
    throw new InvalidArgumentError(`${what} must be an array of tokens`);
  }
  if (tokens.length !== length) {
    throw new InvalidArgumentError(`${what} must be of length: ${length}`);
  }
  tokens.forEach((t: unknown, i) => {
    if (typeof t !== "string") {
      throw new InvalidArgumentError(`${what} token at ${i} is not a string: ${String(t)}`);
    }
  });
}

export function incrementEdge(graph: TransitionGraph, key: string, suffix: Token, by = 1): void {
  const row = graph.get(key) ?? new Map<Token, number>();
  row.set(suffix, (row.get(suffix) ?? 0) + by);
  graph.set(key, row);
}

/** Adds every count in source to target. Applying it twice doubles the contribution. */
export function mergeGraph(target: TransitionGraph, source: ReadonlyMap<string, ReadonlyMap<Token, number>>): void {
  for (const [key, row] of source) {
    const existing = target.get(key);
    if (!existing) {
      target.set(key, new Map(row));
      continue;
    }
    for (const [suffix, count] of row) {
      existing.set(suffix, (existing.get(suffix) ?? 0) + count);
    }
  }
}

export function suffixTotal(row: ReadonlyMap<Token, number>): number {
  let total = 0;
  for (const count of row.values()) total += count;
  return total;
}

export function graphStats(graph: ReadonlyMap<string, ReadonlyMap<Token, number>>): GraphStats {
  let edges = 0;
  let observations = 0;
  for (const row of graph.values()) {
    edges += row.size;
    observations += suffixTotal(row);
  }
  return { prefixes: graph.size, edges, observations };
}
