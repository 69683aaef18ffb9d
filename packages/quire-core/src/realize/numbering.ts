/**
 * Numbering patterns
 *
 * A pattern is a string of counting symbols (1 a A i I *) with arbitrary
 * prefixes and a suffix, e.g. "1.", "1.a)", "(i)". Numbers beyond the
 * pattern's symbols reuse the last symbol with its prefix.
 */

import { StyleError } from '../diag.js';
import { type FieldValue, NumberingFunc } from '../content/value.js';

type CountingSymbol = '1' | 'a' | 'A' | 'i' | 'I' | '*';

const SYMBOLS: ReadonlySet<string> = new Set(['1', 'a', 'A', 'i', 'I', '*']);

const FOOTNOTE_SYMBOLS = ['*', '†', '‡', '§', '¶', '‖'];

const ROMAN: ReadonlyArray<[number, string]> = [
  [1000, 'M'], [900, 'CM'], [500, 'D'], [400, 'CD'], [100, 'C'], [90, 'XC'],
  [50, 'L'], [40, 'XL'], [10, 'X'], [9, 'IX'], [5, 'V'], [4, 'IV'], [1, 'I'],
];

interface Piece {
  prefix: string;
  symbol: CountingSymbol;
}

export class NumberingPattern {
  private constructor(
    private readonly pieces: readonly Piece[],
    private readonly suffix: string
  ) {}

  static parse(pattern: string): NumberingPattern {
    const pieces: Piece[] = [];
    let buffer = '';
    for (const ch of pattern) {
      if (isSymbol(ch)) {
        pieces.push({ prefix: buffer, symbol: ch });
        buffer = '';
      } else {
        buffer += ch;
      }
    }
    if (pieces.length === 0) {
      throw new StyleError(`numbering pattern \`${pattern}\` contains no counting symbol`, null, [
        'use one of 1, a, A, i, I or *',
      ]);
    }
    return new NumberingPattern(pieces, buffer);
  }

  apply(numbers: readonly number[]): string {
    let out = '';
    const count = Math.max(numbers.length, 1);
    for (let i = 0; i < count; i++) {
      const n = numbers[i] ?? 0;
      const piece = this.pieces[i];
      if (piece) {
        out += piece.prefix + format(piece.symbol, n);
        continue;
      }
      const last = this.pieces[this.pieces.length - 1];
      out += (last.prefix.length > 0 ? last.prefix : this.suffix) + format(last.symbol, n);
    }
    return out + this.suffix;
  }
}

function isSymbol(ch: string): ch is CountingSymbol {
  return SYMBOLS.has(ch);
}

function format(symbol: CountingSymbol, n: number): string {
  if (n <= 0 && symbol !== '1') return String(n);
  switch (symbol) {
    case '1':
      return String(n);
    case 'a':
      return latin(n);
    case 'A':
      return latin(n).toUpperCase();
    case 'i':
      return roman(n).toLowerCase();
    case 'I':
      return roman(n);
    case '*': {
      const symbolText = FOOTNOTE_SYMBOLS[(n - 1) % FOOTNOTE_SYMBOLS.length];
      return symbolText.repeat(Math.floor((n - 1) / FOOTNOTE_SYMBOLS.length) + 1);
    }
  }
}

// Bijective base 26: 1 → a, 26 → z, 27 → aa
function latin(n: number): string {
  let out = '';
  let rest = n;
  while (rest > 0) {
    rest -= 1;
    out = String.fromCharCode(97 + (rest % 26)) + out;
    rest = Math.floor(rest / 26);
  }
  return out;
}

function roman(n: number): string {
  let out = '';
  let rest = n;
  for (const [value, letters] of ROMAN) {
    while (rest >= value) {
      out += letters;
      rest -= value;
    }
  }
  return out;
}

const patterns = new Map<string, NumberingPattern>();

/**
 * Apply a numbering (pattern string or function) to counter values
 */
export function applyNumbering(numbering: FieldValue, numbers: readonly number[]): string {
  if (numbering instanceof NumberingFunc) {
    return numbering.call(...numbers);
  }
  if (typeof numbering === 'string') {
    let pattern = patterns.get(numbering);
    if (!pattern) {
      pattern = NumberingPattern.parse(numbering);
      patterns.set(numbering, pattern);
    }
    return pattern.apply(numbers);
  }
  throw new StyleError('numbering must be a pattern string or a function');
}

export function isNumbering(value: FieldValue): boolean {
  return value instanceof NumberingFunc || (typeof value === 'string' && [...value].some(isSymbol));
}
