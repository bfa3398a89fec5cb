import { InvalidArgumentError, ValueMismatchError } from "./errors";
import { assertTokens, createGraph, graphStats, incrementEdge, mergeGraph, prefixKey, suffixTotal } from "./graph";
import { graphFromSnapshot, parseGraphSnapshot, snapshotFromGraph } from "./interchange";
import { log } from "./log";
import { pickWeighted, walk } from "./sampler";
import type {
  GraphSnapshot,
  GraphStats,
  MarkovOptions,
  NgramProbability,
  RandomSource,
  SuffixProbabilities,
  Token,
  TransitionGraph,
  WalkOptions
} from "./types";

const DEFAULT_OPTIONS: Required<MarkovOptions> = {
  random: Math.random
};

/**
 * Graph-based n-gram Markov model. Each n-gram is recorded as an edge from
 * its first `order - 1` tokens (concatenated into one key) to its last token.
 * Counts only grow: there is no removal.
 */
export class Markov {
  readonly order: number;
  readonly random: RandomSource;
  private readonly edges: TransitionGraph = createGraph();

  constructor(order: number, options: MarkovOptions = {}) {
    if (typeof order !== "number" || !Number.isInteger(order)) {
      throw new InvalidArgumentError(`N-gram length must be an integer, got ${String(order)}`);
    }
    if (order < 2) {
      throw new InvalidArgumentError(`N-gram length must be at least 2, got ${order}`);
    }
    this.order = order;
    this.random = options.random ?? DEFAULT_OPTIONS.random;
  }

  /** Rebuilds a model from the plain object produced by `toGraph`. */
  static fromGraph(order: number, snapshot: unknown, options: MarkovOptions = {}): Markov {
    const model = new Markov(order, options);
    mergeGraph(model.edges, graphFromSnapshot(parseGraphSnapshot(snapshot)));
    return model;
  }

  /** A copy of the graph; edits to it never reach the model. */
  get graph(): ReadonlyMap<string, ReadonlyMap<Token, number>> {
    const copy = createGraph();
    mergeGraph(copy, this.edges);
    return copy;
  }

  addNgram(tokens: readonly Token[]): void {
    assertTokens(tokens, this.order, "ngram");
    incrementEdge(this.edges, prefixKey(tokens.slice(0, -1)), tokens[tokens.length - 1]);
  }

  /** Suffix -> probability for the prefix; empty when the prefix was never seen. */
  getSuffixes(prefix: readonly Token[]): SuffixProbabilities {
    assertTokens(prefix, this.order - 1, "prefix");
    const out: SuffixProbabilities = new Map();
    const row = this.edges.get(prefixKey(prefix));
    if (!row) return out;
    const total = suffixTotal(row);
    for (const [suffix, count] of row) out.set(suffix, count / total);
    return out;
  }

  getNgrams(prefix: readonly Token[]): NgramProbability[] {
    const out: NgramProbability[] = [];
    for (const [suffix, probability] of this.getSuffixes(prefix)) {
      out.push({ ngram: [...prefix, suffix], probability });
    }
    return out;
  }

  /** Adds every count of `other` into this model. Not idempotent. */
  update(other: Markov): void {
    if (other.order !== this.order) throw new ValueMismatchError(this.order, other.order);
    mergeGraph(this.edges, other.edges);
    log.markov("merged %d prefixes into order-%d model", other.edges.size, this.order);
  }

  randomSuffix(prefix: readonly Token[]): Token | undefined {
    return pickWeighted(this.getSuffixes(prefix), this.random);
  }

  randomNgram(prefix: readonly Token[]): Array<Token | undefined> {
    return [...prefix, this.randomSuffix(prefix)];
  }

  /**
   * Walks the model from `prefix` until the terminal token ("") is drawn.
   * A model trained without terminal tokens never stops on its own; pass
   * `maxSteps` to bound the walk. Throws when the walk reaches a prefix
   * with no observed suffixes.
   */
  randomSequence(prefix: readonly Token[], options?: WalkOptions): Token[] {
    assertTokens(prefix, this.order - 1, "prefix");
    return walk(prefix, (window) => this.randomSuffix(window), options);
  }

  clone(): Markov {
    const copy = new Markov(this.order, { random: this.random });
    copy.update(this);
    return copy;
  }

  toGraph(): GraphSnapshot {
    return snapshotFromGraph(this.edges);
  }

  stats(): GraphStats {
    return graphStats(this.edges);
  }
}
