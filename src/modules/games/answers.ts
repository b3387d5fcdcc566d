/**
 * Answer checking for free-text rounds.
 *
 * Trivia answers are matched loosely: punctuation and case are ignored, a
 * contained answer ("new york" for "new york city") counts, and otherwise
 * a similarity ratio of at least 0.8 is accepted.
 */

const STRIPPED_CHARACTERS = /[.,!?:;"'’()[\]]/g;

export const DEFAULT_MATCH_THRESHOLD = 0.8;

export function normalizeAnswer(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(STRIPPED_CHARACTERS, "")
    .split(/\s+/)
    .filter(Boolean)
    .join(" ");
}

interface MatchBlock {
  aStart: number;
  bStart: number;
  size: number;
}

/** Longest common substring of a[aLo..aHi) and b[bLo..bHi); earliest wins ties. */
function longestMatch(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
): MatchBlock {
  let best: MatchBlock = { aStart: aLo, bStart: bLo, size: 0 };
  // lengths[j] holds the match length ending at a[i - 1], b[j - 1]
  let lengths = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const size = (lengths.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    lengths = next;
  }

  return best;
}

function countMatches(a: string, b: string): number {
  let total = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const block = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;

    total += block.size;
    if (aLo < block.aStart && bLo < block.bStart) {
      pending.push([aLo, block.aStart, bLo, block.bStart]);
    }
    const aAfter = block.aStart + block.size;
    const bAfter = block.bStart + block.size;
    if (aAfter < aHi && bAfter < bHi) {
      pending.push([aAfter, aHi, bAfter, bHi]);
    }
  }

  return total;
}

/**
 * Ratcliff/Obershelp similarity: twice the matched characters over the
 * combined length. 1 means identical, 0 means nothing in common.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * countMatches(a, b)) / total;
}

export function isFuzzyMatch(
  userAnswer: string,
  correctAnswer: string,
  threshold: number = DEFAULT_MATCH_THRESHOLD,
): boolean {
  const user = normalizeAnswer(userAnswer);
  const correct = normalizeAnswer(correctAnswer);
  if (!user || !correct) return false;
  if (user === correct) return true;

  if (user.length >= 3 && (correct.includes(user) || user.includes(correct))) {
    return true;
  }

  return similarityRatio(user, correct) >= threshold;
}

export function isCorrectAnswer(userAnswer: string, answers: readonly string[]): boolean {
  return answers.some((answer) => isFuzzyMatch(userAnswer, answer));
}

/** Scramble rounds need the exact word; only case and surrounding space are ignored. */
export function isScrambleMatch(userAnswer: string, word: string): boolean {
  return userAnswer.trim().toLowerCase() === word.trim().toLowerCase();
}
