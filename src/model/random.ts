/** Uniform source over [0, 1). `Math.random` satisfies it. */
export type RandomSource = () => number;

const DEFAULT_SEED = 0x9e3779b9;
const UINT32_RANGE = 0x1_0000_0000;

/**
 * Reproducible xorshift32 source. A zero seed would stay at zero forever,
 * so it is replaced by a fixed non-zero constant.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = Math.trunc(seed) >>> 0;
  if (state === 0) {
    state = DEFAULT_SEED;
  }

  return () => {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state / UINT32_RANGE;
  };
}
