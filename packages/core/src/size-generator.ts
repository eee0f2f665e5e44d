/**
 * Request size generators
 *
 * The allocator treats the request distribution as opaque; anything with a
 * `next()` returning a positive integer will do.
 */

export interface SizeGenerator {
  next(): number
}

export type RandomSource = () => number

/**
 * Uniform integer sizes in [min, max], both inclusive
 */
export function createUniformSizeGenerator(
  min: number,
  max: number,
  random: RandomSource = Math.random,
): SizeGenerator {
  if (!Number.isInteger(min) || !Number.isInteger(max) || min < 1) {
    throw new RangeError(`Invalid request size range [${min}, ${max}]`)
  }
  if (min > max) {
    throw new RangeError(`Request size min ${min} exceeds max ${max}`)
  }
  const span = max - min + 1
  return {
    next: () => min + Math.floor(random() * span),
  }
}

/**
 * Replays a fixed list of sizes, cycling when it runs out
 */
export function createSequenceSizeGenerator(sizes: number[]): SizeGenerator {
  if (sizes.length === 0) {
    throw new RangeError('Size sequence must not be empty')
  }
  let index = 0
  return {
    next: () => {
      const size = sizes[index % sizes.length]
      index++
      return size
    },
  }
}

/**
 * mulberry32: small deterministic PRNG returning floats in [0, 1)
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}
