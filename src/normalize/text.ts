/**
 * Message text cleaning
 * Escape decoding, markdown emphasis stripping and whitespace collapsing
 */

/**
 * Raised by a decoding strategy that cannot produce well-formed text
 */
export class EscapeDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EscapeDecodeError';
  }
}

/**
 * How `\xNN` byte escapes are turned into characters
 */
export type ByteEscapeMode = 'utf8' | 'latin1';

const ESCAPE_PATTERN = /\\(?:u([0-9a-fA-F]{4})|U([0-9a-fA-F]{8})|x([0-9a-fA-F]{2})|([nrt"'\\/]))/g;

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
};

const MARKDOWN_EMPHASIS: RegExp[] = [
  /\*\*(.*?)\*\*/g, // bold
  /\*(.*?)\*/g,     // italic
  /__(.*?)__/g,     // bold underline
  /_(.*?)_/g,       // italic underline
];

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

function decodeBytes(bytes: number[], mode: ByteEscapeMode): string {
  if (mode === 'latin1') {
    return String.fromCharCode(...bytes);
  }
  try {
    return strictUtf8.decode(Uint8Array.from(bytes));
  } catch {
    throw new EscapeDecodeError('Byte escapes do not form valid UTF-8');
  }
}

function decodeCodePoint(hex: string): string {
  const codePoint = parseInt(hex, 16);
  if (codePoint > 0x10ffff) {
    throw new EscapeDecodeError(`Code point out of range: \\U${hex}`);
  }
  return String.fromCodePoint(codePoint);
}

/**
 * Decode literal backslash escape sequences with one strategy.
 * Consecutive `\xNN` escapes (and `\u00XX` in utf8 mode) are decoded
 * together as one byte run.
 * @throws EscapeDecodeError when the result would not be well-formed
 */
export function decodeEscapes(text: string, mode: ByteEscapeMode): string {
  let output = '';
  let pendingBytes: number[] = [];
  let lastIndex = 0;

  const flushBytes = () => {
    if (pendingBytes.length > 0) {
      output += decodeBytes(pendingBytes, mode);
      pendingBytes = [];
    }
  };

  for (const match of text.matchAll(ESCAPE_PATTERN)) {
    const index = match.index ?? 0;
    const [whole, utf16, codePoint, byte, simple] = match;

    if (index > lastIndex) {
      flushBytes();
      output += text.slice(lastIndex, index);
    }

    if (byte !== undefined) {
      pendingBytes.push(parseInt(byte, 16));
    } else if (mode === 'utf8' && utf16 !== undefined && parseInt(utf16, 16) <= 0xff) {
      // \u00XX up to 0xFF is a byte in utf8 mode
      pendingBytes.push(parseInt(utf16, 16));
    } else {
      flushBytes();
      if (utf16 !== undefined) {
        output += String.fromCharCode(parseInt(utf16, 16));
      } else if (codePoint !== undefined) {
        output += decodeCodePoint(codePoint);
      } else if (simple !== undefined) {
        output += SIMPLE_ESCAPES[simple] ?? simple;
      }
    }

    lastIndex = index + whole.length;
  }

  flushBytes();
  output += text.slice(lastIndex);

  if (LONE_SURROGATE.test(output)) {
    throw new EscapeDecodeError('Escapes leave an unpaired surrogate');
  }

  return output;
}

/**
 * Best-effort escape decoding: UTF-8 byte runs first, then Latin-1,
 * then the original text.
 */
export function decodeUnicodeEscapes(text: string): string {
  if (!text.includes('\\')) {
    return text;
  }

  for (const mode of ['utf8', 'latin1'] as const) {
    try {
      return decodeEscapes(text, mode);
    } catch (error) {
      if (!(error instanceof EscapeDecodeError)) {
        throw error;
      }
    }
  }

  return text;
}

/**
 * Replace bold/italic markdown delimiters with their inner content
 */
export function stripMarkdownEmphasis(text: string): string {
  return MARKDOWN_EMPHASIS.reduce((current, pattern) => current.replace(pattern, '$1'), text);
}

/**
 * Collapse whitespace runs to a single space and trim
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Clean raw message text for transcripts
 */
export function cleanText(text: string | null | undefined): string {
  if (!text) {
    return '';
  }

  return collapseWhitespace(stripMarkdownEmphasis(decodeUnicodeEscapes(text)));
}
