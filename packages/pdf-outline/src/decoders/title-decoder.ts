import type { PDFObject } from 'pdf-lib';

import { PDFHexString, PDFString } from 'pdf-lib';

const BYTE_ORDER_MARK = '\uFEFF';
const IDEOGRAPHIC_SPACE = /\u3000/g;
const REPLACEMENT_CHARACTER = /\uFFFD/g;
// Whitespace other than U+FEFF, which is only removed as a leading BOM
const EDGE_WHITESPACE = /^[^\S\uFEFF]+|[^\S\uFEFF]+$/g;

/**
 * TitleDecoder - Outline title decoding and normalization
 *
 * Outline titles arrive as raw string bytes. Producers write them as
 * UTF-16BE (with or without a byte-order mark) or as plain bytes that are
 * treated as UTF-8 here.
 * - UTF-16BE detection by BOM or by the presence of a NUL byte
 * - Undecodable UTF-8 sequences become `?`
 * - One leading BOM removed, full-width space folding, trimming
 */
export class TitleDecoder {
  /**
   * Decode and normalize a title.
   * Returns undefined for missing input or when nothing is left after trimming.
   */
  static decode(raw: Uint8Array | string | undefined): string | undefined {
    if (raw === undefined) return undefined;

    const text = typeof raw === 'string' ? raw : this.decodeBytes(raw);
    const normalized = this.normalize(text);

    return normalized.length > 0 ? normalized : undefined;
  }

  /**
   * Decode the bytes of a PDF string object.
   * Non-string objects (names, numbers, dictionaries) have no title.
   */
  static fromPdfObject(value: PDFObject | undefined): string | undefined {
    if (value instanceof PDFString || value instanceof PDFHexString) {
      return this.decode(value.asBytes());
    }
    return undefined;
  }

  /**
   * Turn raw bytes into text without normalizing it
   */
  static decodeBytes(bytes: Uint8Array): string {
    if (this.looksLikeUtf16(bytes)) {
      try {
        return new TextDecoder('utf-16be', {
          fatal: true,
          ignoreBOM: true,
        }).decode(bytes);
      } catch {
        return this.decodeUtf8(bytes);
      }
    }
    return this.decodeUtf8(bytes);
  }

  static looksLikeUtf16(bytes: Uint8Array): boolean {
    return (bytes[0] === 0xfe && bytes[1] === 0xff) || bytes.includes(0x00);
  }

  static decodeUtf8(bytes: Uint8Array): string {
    try {
      return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(
        bytes,
      );
    } catch {
      return this.decodeLossyUtf8(bytes);
    }
  }

  /**
   * Invalid sequences become `?`. Encoded U+FFFD characters (EF BF BD) are
   * kept, so the input is split around them before replacing.
   */
  private static decodeLossyUtf8(bytes: Uint8Array): string {
    const decoder = new TextDecoder('utf-8', { ignoreBOM: true });
    const lossy = (chunk: Uint8Array) =>
      decoder.decode(chunk).replace(REPLACEMENT_CHARACTER, '?');

    const parts: string[] = [];
    let start = 0;
    for (
      let index = bytes.indexOf(0xef);
      index !== -1;
      index = bytes.indexOf(0xef, index + 1)
    ) {
      if (bytes[index + 1] === 0xbf && bytes[index + 2] === 0xbd) {
        parts.push(lossy(bytes.subarray(start, index)));
        start = index + 3;
        index += 2;
      }
    }
    parts.push(lossy(bytes.subarray(start)));

    return parts.join('\uFFFD');
  }

  /**
   * Remove one leading U+FEFF
   */
  static stripByteOrderMark(text: string): string {
    return text.startsWith(BYTE_ORDER_MARK)
      ? text.slice(BYTE_ORDER_MARK.length)
      : text;
  }

  static normalize(text: string): string {
    return this.stripByteOrderMark(text)
      .replace(IDEOGRAPHIC_SPACE, ' ')
      .replace(EDGE_WHITESPACE, '');
  }
}
