import { ArchiveError } from './errors';

const INLINE_FLAGS = /^\(\?([a-zA-Z]+)\)/;

/**
 * Compiles a rule expression, translating a leading inline flag group such as
 * `(?i)` into RegExp flags.
 */
export function compilePattern(source: string): RegExp {
  const flags = new Set<string>();
  let pattern = source;
  let match = INLINE_FLAGS.exec(pattern);

  while (match) {
    for (const flag of match[1]) {
      switch (flag) {
        case 'i':
        case 'm':
        case 's':
          flags.add(flag);
          break;
        // \w, \W and \b are ASCII-only under any flags, so `(\W|^)term`
        // also matches right after a non-ASCII letter.
        case 'a':
        case 'u':
        case 'L':
          break;
        default:
          throw new ArchiveError(`Unsupported inline flag '${flag}'`, 'INVALID_PATTERN', { source });
      }
    }
    pattern = pattern.slice(match[0].length);
    match = INLINE_FLAGS.exec(pattern);
  }

  return new RegExp(pattern, [...flags].join(''));
}
