export type Token = string;

// prefix key -> suffix -> count; Map iteration is first-insertion order
export type TransitionGraph = Map<string, Map<Token, number>>;

export type GraphSnapshot = Record<string, Record<Token, number>>;

export type SuffixProbabilities = Map<Token, number>;

export type NgramProbability = {
  ngram: Token[];
  probability: number;
};

/** Uniform draw in [0, 1). */
export type RandomSource = () => number;

export type MarkovOptions = {
  random?: RandomSource;
};

export type WalkOptions = {
  maxSteps?: number;
};

export type GraphStats = {
  prefixes: number;
  edges: number;
  observations: number;
};

export const TERMINAL_TOKEN: Token = "";
