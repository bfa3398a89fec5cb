import type { RandomSource } from "./types";

function fnv1a32(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function mulberry32(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), 1 | t);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Deterministic random source; the same seed always yields the same draws. */
export function seededRandom(seed: string | number): RandomSource {
  return mulberry32(typeof seed === "number" ? seed : fnv1a32(seed));
}

/** Replays the given draws in order, wrapping around at the end. */
export function sequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) throw new RangeError("sequenceRandom needs at least one value");
  for (const v of values) {
    if (!(v >= 0 && v < 1)) throw new RangeError(`random draw out of [0, 1): ${v}`);
  }
  let i = 0;
  return () => {
    const v = values[i % values.length];
    i++;
    return v;
  };
}
