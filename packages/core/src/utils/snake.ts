/**
 * Word splitting and snake_case derivation for table and enum type names.
 *
 * @example
 * ```typescript
 * getWords('HumanNAMEDJason'); // ['Human', 'NAMED', 'Jason']
 * toSnake('PotatoHumanAlien'); // 'potato_human_alien'
 * ```
 */

// Letters and digits of any script; underscores separate words
const WORD_SEPARATOR = /[^\p{L}\p{N}]+|_/u;
const STARTS_WITH_WORD_CHAR = /^[\p{L}\p{N}]/u;

// Applied in order, each on the output of the previous one
const CAMEL_BOUNDARY = /(?<=[a-z])(?=[A-Z])/;
const ACRONYM_BOUNDARY = /(?<=[A-Z])(?=[A-Z][a-z])/;
const DIGIT_BOUNDARY = /(?<=\d)(?=[A-Za-z])/;

/**
 * Lower-case the words of a string and join them with underscores
 */
export function toSnake(input: string): string {
  return getWords(input)
    .map((word) => word.toLowerCase())
    .join('_');
}

/**
 * Get the words of a string in the order they appear
 */
export function getWords(input: string): string[] {
  let words = input.split(WORD_SEPARATOR).filter((token) => STARTS_WITH_WORD_CHAR.test(token));
  words = splitWordsOnRegex(words, CAMEL_BOUNDARY);
  words = splitWordsOnRegex(words, ACRONYM_BOUNDARY);
  words = splitWordsOnRegex(words, DIGIT_BOUNDARY);
  return words;
}

/**
 * Split every word on a pattern, keeping the pieces in place of the original word.
 * Words the pattern does not split are kept as they are.
 */
export function splitWordsOnRegex(words: readonly string[], pattern: RegExp | string): string[] {
  const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
  return words.flatMap((word) => {
    const pieces = word.split(regex);
    return pieces.length > 1 ? pieces : [word];
  });
}
