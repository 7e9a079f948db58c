/**
 * Replaces every occurrence of each key with its value, entry by entry in
 * insertion order. Entries chain: a later entry sees the output of earlier ones,
 * so `{ a: 'b', b: 'c' }` turns "ab" into "cc".
 */
export function substituteCharacters(
  words: readonly string[],
  substitutions: ReadonlyMap<string, string> | undefined
): string[] {
  if (!substitutions || substitutions.size === 0) {
    return [...words];
  }

  return words.map((word) => {
    let substituted = word;
    for (const [from, to] of substitutions) {
      substituted = substituted.split(from).join(to);
    }
    return substituted;
  });
}
