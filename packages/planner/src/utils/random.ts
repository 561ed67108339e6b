/**
 * Random sources
 *
 * Selection takes its randomness as a parameter so that tests can pin it with a
 * seed. The default source is seeded once per process by the runtime.
 */

/**
 * Returns a float in [0, 1)
 */
export type RandomSource = () => number

export const defaultRandom: RandomSource = Math.random

/**
 * Mulberry32 - small deterministic PRNG
 */
export function createSeededRandom(seed: number): RandomSource {
	let state = seed >>> 0
	return () => {
		let t = (state += 0x6d2b79f5)
		t = Math.imul(t ^ (t >>> 15), t | 1)
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296
	}
}

/**
 * Uniform integer in [0, bound)
 */
export function randomIndex(bound: number, random: RandomSource): number {
	const index = Math.floor(random() * bound)
	// Guards against sources that return exactly 1
	return index >= bound ? bound - 1 : index
}

/**
 * Pick one element uniformly at random
 *
 * @returns undefined when items is empty
 */
export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
	if (items.length === 0) {
		return undefined
	}
	return items[randomIndex(items.length, random)]
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
	const result = [...items]
	for (let i = result.length - 1; i > 0; i--) {
		const j = randomIndex(i + 1, random)
		const tmp = result[i]!
		result[i] = result[j]!
		result[j] = tmp
	}
	return result
}
