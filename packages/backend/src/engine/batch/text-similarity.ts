import type { WorkRecord } from '../records/types.js';
import type { StringSimilarity } from './types.js';

// Accents on alphabetic scripts. Marks in Indic scripts are vowel signs and
// viramas, part of the spelling, and stay.
const DIACRITIC = /(\p{Script=Latin}|\p{Script=Greek}|\p{Script=Cyrillic})\p{M}+/gu;

/**
 * Fold a work name down to the words that describe the work: canonical
 * decomposition, accents removed, lower-cased, digits and punctuation
 * dropped. Chainage figures and road numbers disappear with the digits;
 * grouping already accounts for them.
 */
export function normalizeWorkName(text: string): string {
  return text
    .normalize('NFKD')
    .replace(DIACRITIC, '$1')
    .toLowerCase()
    .replace(/[^\p{L}\p{M}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function bigrams(text: string): Map<string, number> {
  const chars = Array.from(text);
  const counts = new Map<string, number>();
  for (let i = 0; i < chars.length - 1; i++) {
    const gram = chars[i] + chars[i + 1];
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/** Sørensen–Dice coefficient over character bigrams of the normalized names. */
export class BigramDiceSimilarity implements StringSimilarity {
  readonly id = 'bigram-dice';

  compare(a: string, b: string): number {
    const left = normalizeWorkName(a);
    const right = normalizeWorkName(b);
    if (left === right) return 1;
    if (Array.from(left).length < 2 || Array.from(right).length < 2) return 0;

    const leftGrams = bigrams(left);
    const rightGrams = bigrams(right);
    let shared = 0;
    let total = 0;
    for (const [gram, count] of leftGrams) {
      shared += Math.min(count, rightGrams.get(gram) ?? 0);
      total += count;
    }
    for (const count of rightGrams.values()) total += count;

    return (2 * shared) / total;
  }
}

/**
 * Similarity of two works by name: the better of the primary-name score and,
 * when both carry one, the local-script-name score.
 */
export function workNameSimilarity(a: WorkRecord, b: WorkRecord, strategy: StringSimilarity): number {
  const primary = strategy.compare(a.workName, b.workName);
  if (a.workNameLocal && b.workNameLocal) {
    return Math.max(primary, strategy.compare(a.workNameLocal, b.workNameLocal));
  }
  return primary;
}
