import { transliterate } from 'transliteration';
import { PatternMap } from '@streamvault/shared';

// merges single letters that were spaced apart, e.g. "K A R A O K E"
const SPACED_LETTERS = /(?<=\b[a-z])\s+(?=[a-z]\b)/gi;

// combining marks, as stacked in "zalgo" text
const COMBINING_MARKS = /[\p{Mn}\p{Me}]/gu;

export function stripMarks(text: string): string {
  return text.replace(COMBINING_MARKS, '');
}

export function compressSpacedLetters(text: string): string {
  return text.replace(SPACED_LETTERS, '');
}

/**
 * Renderings of `text` that undo common obfuscation: ASCII transliteration,
 * spaced-out letters, combining marks and styled (e.g. mathematical bold)
 * letters.
 */
export function normalizedVariants(text: string): string[] {
  const ascii = transliterate(text);
  const compatible = text.normalize('NFKC');
  return [
    text,
    ascii,
    compressSpacedLetters(ascii),
    stripMarks(text),
    compatible,
    compressSpacedLetters(compatible)
  ];
}

/**
 * Names of the rules in `patterns` that match any rendering of `text`.
 */
export function getPatternMatches(patterns: PatternMap, text: string): Set<string> {
  const haystacks = normalizedVariants(text);
  const matches = new Set<string>();
  for (const [name, pattern] of Object.entries(patterns)) {
    if (haystacks.some((haystack) => testPattern(pattern, haystack))) {
      matches.add(name);
    }
  }
  return matches;
}

function testPattern(pattern: RegExp, haystack: string): boolean {
  // global and sticky patterns carry state between calls
  pattern.lastIndex = 0;
  return pattern.test(haystack);
}
