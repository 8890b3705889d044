/**
 * Textual file header (first 3200 bytes): 40 cards of 80 columns,
 * EBCDIC in most legacy files, ASCII in newer ones.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

export const TEXT_HEADER_SIZE = 3200;
export const CARD_WIDTH = 80;

const REPLACEMENT_CHAR = '\uFFFD';

const EBCDIC_TO_UNICODE: readonly number[] = z
  .array(z.number().int().min(0).max(0xffff))
  .length(256)
  .parse(JSON.parse(readFileSync(new URL('../data/ebcdic-cp037.json', import.meta.url), 'utf-8')));

function isAsciiAlnum(b: number): boolean {
  return (b >= 0x30 && b <= 0x39) || (b >= 0x41 && b <= 0x5a) || (b >= 0x61 && b <= 0x7a);
}

const EBCDIC_SPACE = 0x40;

/**
 * EBCDIC letters and digits all sit above 0x80, so a block with more
 * high bytes than ASCII letters/digits is taken as EBCDIC. A block of
 * nothing but EBCDIC spaces is a blank EBCDIC header.
 */
export function looksLikeEbcdic(bytes: Uint8Array): boolean {
  let high = 0;
  let alnum = 0;
  let blank = bytes.length > 0;
  for (const b of bytes) {
    if (b !== EBCDIC_SPACE) blank = false;
    if (b >= 0x80) high++;
    else if (isAsciiAlnum(b)) alnum++;
  }
  return blank || high > alnum;
}

/** Decode to ASCII; bytes with no ASCII equivalent become U+FFFD. */
export function decodeTextHeader(bytes: Uint8Array): string {
  const ebcdic = looksLikeEbcdic(bytes);
  let text = '';
  for (const b of bytes) {
    const code = ebcdic ? EBCDIC_TO_UNICODE[b] : b;
    text += code < 0x80 ? String.fromCharCode(code) : REPLACEMENT_CHAR;
  }
  return text;
}

/** Split into 80-column cards, trailing blanks trimmed. */
export function wrapCards(text: string): string {
  const cards: string[] = [];
  for (let i = 0; i < text.length; i += CARD_WIDTH) {
    cards.push(text.slice(i, i + CARD_WIDTH).replace(/[\s\0]+$/, ''));
  }
  return cards.join('\n');
}
