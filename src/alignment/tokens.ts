const WHITESPACE_RE = /\s+/;

export const PLACEHOLDER_CHAR = "*";

export function splitSentence(sentence: string): string[] {
  return sentence.split(WHITESPACE_RE).filter(Boolean);
}

/**
 * Disfluent words are written in UPPERCASE in reference transcripts (Sclite convention).
 * A token is tagged when it has at least one cased letter and no lowercase one, so
 * `IT'S` and `RIGH-` are tagged while `--` and `42` are not.
 */
export function isDisfluentTagged(token: string): boolean {
  return token === token.toUpperCase() && token !== token.toLowerCase();
}

export function eraseDisfluencyTag(token: string): string {
  return token.toLowerCase();
}

export function displayWidth(token: string): number {
  return Array.from(token).length;
}

export function placeholderFor(token: string): string {
  return PLACEHOLDER_CHAR.repeat(displayWidth(token));
}

export function countDisfluentTokens(tokens: readonly string[]): number {
  return tokens.filter((token) => isDisfluentTagged(token)).length;
}
