import { InvalidArgumentError } from "./errors";
import { log } from "./log";
import { TERMINAL_TOKEN } from "./types";
import type { RandomSource, SuffixProbabilities, Token, WalkOptions } from "./types";

/**
 * Weighted draw over a probability view, accumulating mass in the map's
 * iteration order. Returns undefined only for an empty distribution.
 */
export function pickWeighted(distribution: SuffixProbabilities, random: RandomSource): Token | undefined {
  const threshold = random();
  let upto = 0;
  let last: Token | undefined;
  for (const [suffix, probability] of distribution) {
    upto += probability;
    last = suffix;
    if (upto >= threshold) return suffix;
  }
  // float rounding can leave the total mass just under the threshold
  return last;
}

export type SuffixDraw = (window: readonly Token[]) => Token | undefined;

/**
 * Random walk from `prefix`, sliding a window of `prefix.length` tokens.
 * Stops once the terminal token is drawn and returns it as the last element.
 * Without `maxSteps` there is no bound on the number of steps.
 */
export function walk(prefix: readonly Token[], draw: SuffixDraw, options: WalkOptions = {}): Token[] {
  const { maxSteps } = options;
  if (maxSteps !== undefined && !(Number.isInteger(maxSteps) && maxSteps > 0)) {
    throw new InvalidArgumentError(`maxSteps must be a positive integer, got ${maxSteps}`);
  }

  const window = [...prefix];
  const sequence = [...prefix];
  log.sampler("walk start %o (maxSteps=%s)", window, maxSteps ?? "none");

  for (let steps = 1; ; steps++) {
    const suffix = draw(window);
    if (suffix === undefined) {
      log.sampler("dead end at %o after %d steps", window, steps - 1);
      throw new InvalidArgumentError(`no suffix observed for prefix: ${JSON.stringify(window)}`);
    }
    sequence.push(suffix);
    if (suffix === TERMINAL_TOKEN) {
      log.sampler("walk end after %d steps", steps);
      return sequence;
    }
    if (maxSteps !== undefined && steps >= maxSteps) {
      log.sampler("walk stopped at step cap %d", maxSteps);
      return sequence;
    }
    window.shift();
    window.push(suffix);
  }
}
