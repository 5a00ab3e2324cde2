const NON_ALPHANUMERIC_PATTERN = /[^\p{L}\p{M}\p{N}]+/u;

export const MIN_TOKEN_LENGTH = 2;

/**
 * Lowercases and splits on runs of non-alphanumeric characters. Combining marks count as part of
 * a word. Tokens shorter than two characters are discarded; no stemming or Unicode normalisation
 * beyond case folding.
 */
export const tokenize = (text: string): string[] => {
  return text
    .toLowerCase()
    .split(NON_ALPHANUMERIC_PATTERN)
    .filter((token) => token.length >= MIN_TOKEN_LENGTH);
};
