/**
 * Hint builders for trivia and scramble rounds.
 */

const HIDDEN = "•";

export type RandomSource = () => number;

/** Characters of a word revealed at a given hint level (1 to 3). */
function revealedLength(length: number, level: number): number {
  // Short words ("The", "An") never give themselves away.
  if (length <= 3) return 1;
  if (level <= 1) return Math.max(1, Math.floor(length / 4));
  if (level === 2) return Math.max(1, Math.floor(length / 2));
  return Math.max(1, Math.floor((3 * length) / 4));
}

/**
 * Masks each word of the answer, revealing more of its start at each level.
 * @example buildTriviaHint("Mount Everest", 2) // "Mo••• Eve••••"
 */
export function buildTriviaHint(answer: string, level: number): string {
  return answer
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => {
      const chars = Array.from(word);
      const shown = revealedLength(chars.length, level);
      return chars.slice(0, shown).join("") + HIDDEN.repeat(chars.length - shown);
    })
    .join(" ");
}

/** Single-letter answers ("A", "7") cannot be hinted without giving them away. */
export function hasSingleCharacterAnswer(answers: readonly string[]): boolean {
  return answers.some((answer) => Array.from(answer.trim()).length === 1);
}

/**
 * Shuffles the letters of a word so the result differs from the input.
 * Falls back to the reversed word when shuffling keeps producing the original.
 */
export function scrambleWord(word: string, random: RandomSource = Math.random): string {
  if (word.length < 2) return word;

  const letters = Array.from(word);
  let scrambled = word;

  for (let attempt = 0; attempt < 10 && scrambled === word; attempt++) {
    for (let i = letters.length - 1; i > 0; i--) {
      const j = Math.floor(random() * (i + 1));
      [letters[i], letters[j]] = [letters[j], letters[i]];
    }
    scrambled = letters.join("");
  }

  return scrambled === word ? Array.from(word).reverse().join("") : scrambled;
}

/**
 * Reveals the first letter and the second to last one.
 * @example buildScrambleHint("cabbage") // "C _ _ _ _ G _"
 */
export function buildScrambleHint(word: string): string {
  const revealed = new Set([0, word.length > 2 ? word.length - 2 : 1]);
  return Array.from(word)
    .map((char, index) => (revealed.has(index) ? char.toUpperCase() : "_"))
    .join(" ");
}
