import { z } from "zod";
import { InvalidArgumentError } from "./errors";
import type { GraphSnapshot, Token, TransitionGraph } from "./types";

const countSchema = z.number().int().positive();

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// z.record rebuilds its output and drops a "__proto__" key, so the input
// object is checked in place and passed through as is.
export const graphSnapshotSchema = z
  .custom<GraphSnapshot>(isPlainObject, { message: "graph snapshot must be an object" })
  .superRefine((value, ctx) => {
    if (!isPlainObject(value)) return;
    for (const [key, row] of Object.entries(value)) {
      if (!isPlainObject(row)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "suffix row must be an object" });
        continue;
      }
      const entries = Object.entries(row);
      if (entries.length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "suffix row must not be empty" });
      }
      for (const [suffix, count] of entries) {
        const parsed = countSchema.safeParse(count);
        if (!parsed.success) {
          const message = parsed.error.issues[0]?.message ?? "invalid count";
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key, suffix], message });
        }
      }
    }
  });

export function parseGraphSnapshot(value: unknown): GraphSnapshot {
  const parsed = graphSnapshotSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? issue.path.join(".") : "<root>";
    throw new InvalidArgumentError(`invalid graph snapshot at ${where}: ${issue?.message ?? "unknown error"}`);
  }
  return parsed.data;
}

// Object.fromEntries defines own properties, so a "__proto__" token stays a plain key.
export function snapshotFromGraph(graph: ReadonlyMap<string, ReadonlyMap<Token, number>>): GraphSnapshot {
  return Object.fromEntries([...graph].map(([key, row]) => [key, Object.fromEntries(row)]));
}

/**
 * Object key order puts integer-like keys first, so suffixes such as "1" may
 * iterate in a different order than they were first observed.
 */
export function graphFromSnapshot(snapshot: GraphSnapshot): TransitionGraph {
  const graph: TransitionGraph = new Map();
  for (const [key, row] of Object.entries(snapshot)) {
    graph.set(key, new Map(Object.entries(row)));
  }
  return graph;
}
