/**
 * Text cleaning tests
 */

import { describe, it, expect } from 'vitest';
import {
  cleanText,
  collapseWhitespace,
  decodeEscapes,
  decodeUnicodeEscapes,
  stripMarkdownEmphasis,
  EscapeDecodeError,
} from './text.js';

describe('decodeUnicodeEscapes', () => {
  it('should leave text without backslashes untouched', () => {
    expect(decodeUnicodeEscapes('Düğün salonu')).toBe('Düğün salonu');
  });

  it('should decode \\u escapes', () => {
    expect(decodeUnicodeEscapes('\\u00c7i\\u00e7ek')).toBe('Çiçek');
    expect(decodeUnicodeEscapes('Kar\\u0131')).toBe('Karı');
  });

  it('should decode surrogate pairs', () => {
    expect(decodeUnicodeEscapes('\\ud83d\\ude00')).toBe('😀');
  });

  it('should decode \\U escapes', () => {
    expect(decodeUnicodeEscapes('\\U0001F600')).toBe('😀');
  });

  it('should decode byte escapes as UTF-8', () => {
    expect(decodeUnicodeEscapes('\\xc3\\xa7ay')).toBe('çay');
  });

  it('should read escaped UTF-8 byte pairs written as \\u00XX', () => {
    expect(decodeUnicodeEscapes('\\u00c3\\u00a7ok g\\u00c3\\u00bczel')).toBe('çok güzel');
  });

  it('should mix \\u00XX and \\xNN escapes in one byte run', () => {
    expect(decodeUnicodeEscapes('\\u00c4\\x9f')).toBe('ğ');
  });

  it('should fall back to Latin-1 for invalid UTF-8 byte runs', () => {
    expect(decodeUnicodeEscapes('\\xe7ay')).toBe('çay');
  });

  it('should keep the original text when both strategies fail', () => {
    expect(decodeUnicodeEscapes('yarım \\ud83d')).toBe('yarım \\ud83d');
  });

  it('should decode simple escapes', () => {
    expect(decodeUnicodeEscapes('a\\nb\\tc')).toBe('a\nb\tc');
    expect(decodeUnicodeEscapes('\\"alıntı\\"')).toBe('"alıntı"');
  });

  it('should treat an escaped backslash as one character', () => {
    expect(decodeUnicodeEscapes('\\\\u0041')).toBe('\\u0041');
  });

  it('should leave unknown escapes alone', () => {
    expect(decodeUnicodeEscapes('C:\\dosya')).toBe('C:\\dosya');
  });
});

describe('decodeEscapes', () => {
  it('should throw EscapeDecodeError for invalid UTF-8 in utf8 mode', () => {
    expect(() => decodeEscapes('\\xff', 'utf8')).toThrow(EscapeDecodeError);
  });

  it('should keep \\u00XX as a code point in latin1 mode', () => {
    expect(decodeEscapes('\\u00c3\\u00a7', 'latin1')).toBe('Ã§');
  });

  it('should accept any byte in latin1 mode', () => {
    expect(decodeEscapes('\\xff', 'latin1')).toBe('ÿ');
  });

  it('should throw for out of range code points', () => {
    expect(() => decodeEscapes('\\U00110000', 'latin1')).toThrow(EscapeDecodeError);
  });
});

describe('stripMarkdownEmphasis', () => {
  it('should strip bold and italic asterisks', () => {
    expect(stripMarkdownEmphasis('**kalın** ve *eğik*')).toBe('kalın ve eğik');
  });

  it('should strip bold and italic underscores', () => {
    expect(stripMarkdownEmphasis('__kalın__ ve _eğik_')).toBe('kalın ve eğik');
  });

  it('should handle triple asterisks', () => {
    expect(stripMarkdownEmphasis('***önemli***')).toBe('önemli');
  });

  it('should not join across lines', () => {
    expect(stripMarkdownEmphasis('*a\nb*')).toBe('*a\nb*');
  });
});

describe('collapseWhitespace', () => {
  it('should collapse runs and trim', () => {
    expect(collapseWhitespace('  çok   boşluk \t\n var ')).toBe('çok boşluk var');
  });
});

describe('cleanText', () => {
  it('should return empty string for empty input', () => {
    expect(cleanText('')).toBe('');
    expect(cleanText(null)).toBe('');
    expect(cleanText(undefined)).toBe('');
  });

  it('should apply the full pipeline', () => {
    expect(cleanText('Merhaba **nas\\u0131ls\\u0131n\\u0131z**')).toBe('Merhaba nasılsınız');
  });

  it('should repair escaped UTF-8 mojibake', () => {
    expect(cleanText('\\u00c3\\u00a7ok g\\u00c3\\u00bczel')).toBe('çok güzel');
  });

  it('should turn decoded newlines into spaces', () => {
    expect(cleanText('Satır\\nyeni satır')).toBe('Satır yeni satır');
  });

  it('should reduce emphasis-only text to nothing', () => {
    expect(cleanText('****')).toBe('');
    expect(cleanText('   ')).toBe('');
  });

  it('should be idempotent', () => {
    const samples = [
      'Merhaba **nasılsınız**',
      '  Bütçemiz\\n 200 kişi için _uygun_ mu? ',
      '\\u00c7ok g\\u00fczel __mekan__',
      'yarım \\ud83d',
      'snake_case_isim',
    ];

    for (const sample of samples) {
      const once = cleanText(sample);
      expect(cleanText(once)).toBe(once);
    }
  });
});
