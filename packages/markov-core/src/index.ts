export { Markov } from "./markov";
export { MarkovError, InvalidArgumentError, ValueMismatchError } from "./errors";
export { prefixKey, graphStats } from "./graph";
export { pickWeighted, walk } from "./sampler";
export type { SuffixDraw } from "./sampler";
export { seededRandom, sequenceRandom } from "./random";
export { graphSnapshotSchema, parseGraphSnapshot, snapshotFromGraph, graphFromSnapshot } from "./interchange";
export { TERMINAL_TOKEN } from "./types";
export type {
  Token,
  TransitionGraph,
  GraphSnapshot,
  GraphStats,
  SuffixProbabilities,
  NgramProbability,
  RandomSource,
  MarkovOptions,
  WalkOptions
} from "./types";
