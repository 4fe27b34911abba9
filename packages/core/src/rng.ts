const STATE_INCREMENT = 0x6d2b79f5;

/**
 * Uniform source in `[0, 1)`. The resolver and the discovery gate only ever
 * call `next()`, so any deterministic generator can be injected.
 */
export interface RandomSource {
  next(): number;
}

export interface SeededRandom extends RandomSource {
  getSeed(): number;
  /**
   * Returns the current internal state (position) for restore-and-continue
   * workflows.
   */
  getState(): number;
  setState(state: number): void;
}

export function createSeededRandom(seed: number): SeededRandom {
  const normalizedSeed = seed >>> 0;
  let state = normalizedSeed || 0x1;

  return {
    next() {
      state = (state + STATE_INCREMENT) | 0;
      let t = Math.imul(state ^ (state >>> 15), 1 | state);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
    getSeed() {
      return normalizedSeed;
    },
    getState() {
      return state;
    },
    setState(nextState: number) {
      if (!Number.isFinite(nextState)) {
        throw new Error('RNG state must be a finite number.');
      }
      state = nextState | 0;
    },
  };
}

/**
 * Seeds a generator from `Math.random` for hosts that do not need replays.
 */
export function createUnseededRandom(): SeededRandom {
  return createSeededRandom(Math.floor(Math.random() * 0xffffffff));
}

/**
 * Uniform integer in `[min, max]` (inclusive). Always consumes exactly one
 * draw, including for degenerate ranges, so draw counts stay stable.
 */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  const draw = rng.next();
  if (max <= min) {
    return min;
  }
  const span = max - min + 1;
  return min + Math.min(span - 1, Math.floor(draw * span));
}

/**
 * Uniform float in `[min, max)` using a single draw.
 */
export function randomBetween(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/**
 * Replays a fixed list of draws, cycling when exhausted. Useful for hosts
 * that need to force an outcome (admin tools, scripted scenarios).
 */
export function createSequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new Error('Sequence random source requires at least one value.');
  }
  let index = 0;
  return {
    next() {
      const value = values[index % values.length] ?? 0;
      index += 1;
      return value;
    },
  };
}
