const WORD_CHARS = '\\p{L}\\p{N}_';
const WORD = `[${WORD_CHARS}]`;
const NON_WORD = `[^${WORD_CHARS}]`;
const AT_BOUNDARY = `(?:(?<=${WORD})(?!${WORD})|(?<!${WORD})(?=${WORD}))`;
const NOT_AT_BOUNDARY = `(?:(?<=${WORD})(?=${WORD})|(?<!${WORD})(?!${WORD}))`;

/**
 * Rewrites `\w`, `\W`, `\b` and `\B` so that letters and digits of any script
 * count as word characters. The result must be compiled with the `u` flag.
 * Inside a character class only `\w` is widened; `\b` there is a backspace.
 */
export function widenWordClasses(source: string): string {
  let out = '';
  let inClass = false;
  for (let i = 0; i < source.length; i += 1) {
    const char = source[i];
    if (char === '\\' && i + 1 < source.length) {
      const next = source[i + 1];
      i += 1;
      if (inClass) {
        out += next === 'w' ? WORD_CHARS : `\\${next}`;
      } else if (next === 'w') {
        out += WORD;
      } else if (next === 'W') {
        out += NON_WORD;
      } else if (next === 'b') {
        out += AT_BOUNDARY;
      } else if (next === 'B') {
        out += NOT_AT_BOUNDARY;
      } else {
        out += `\\${next}`;
      }
      continue;
    }
    if (char === '[' && !inClass) inClass = true;
    else if (char === ']' && inClass) inClass = false;
    out += char;
  }
  return out;
}
