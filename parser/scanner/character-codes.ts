/**
 * Character code constants and classification functions used by the tokenizer.
 * Offsets and codes are UTF-16 code units, as returned by `charCodeAt`.
 */

export const enum CharacterCodes {
  lineFeed = 0x0A,              // \n
  tab = 0x09,
  space = 0x20,

  hash = 0x23,                  // #
  closeParen = 0x29,            // )
  asterisk = 0x2A,              // *
  plus = 0x2B,                  // +
  minus = 0x2D,                 // -
  dot = 0x2E,                   // .

  _0 = 0x30,                    // 0
  _9 = 0x39,                    // 9

  greaterThan = 0x3E,           // >
}

/**
 * Check if character is a line feed. Carriage returns are plain text here.
 */
export function isLineFeed(ch: number): boolean {
  return ch === CharacterCodes.lineFeed;
}

/**
 * Check if character is a space or a tab
 */
export function isSpaceOrTab(ch: number): boolean {
  return ch === CharacterCodes.space || ch === CharacterCodes.tab;
}

/**
 * Check if character is an ASCII digit
 */
export function isDigit(ch: number): boolean {
  return ch >= CharacterCodes._0 && ch <= CharacterCodes._9;
}
