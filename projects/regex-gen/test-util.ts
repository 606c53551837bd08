/**
 * Build a predicate that checks whether the whole input matches `expr`.
 */
export function fullMatch(expr: string): (input: string) => boolean {
  const re = new RegExp(`^(?:${expr})$`);
  return (input) => re.test(input);
}

/**
 * All strings over the alphabet up to the given length, shortest first.
 */
export function* allStrings(
  alphabet: string,
  maxLength: number
): Generator<string> {
  let current = [''];
  for (let length = 0; length <= maxLength; length++) {
    yield* current;
    current = current.flatMap((s) => [...alphabet].map((c) => s + c));
  }
}

/**
 * A small seeded generator so test inputs are the same on every run.
 *
 * @returns a function that returns integers in [0, max)
 */
export function seededRandom(seed: number): (max: number) => number {
  let state = seed >>> 0;
  return (max) => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    const r = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    return Math.floor(r * max);
  };
}
