import { PDFHexString, PDFName, PDFNumber, PDFString } from 'pdf-lib';
import { describe, expect, test } from 'vitest';

import { TitleDecoder } from './title-decoder';

const bytes = (...values: number[]) => Uint8Array.from(values);

describe('TitleDecoder', () => {
  describe('decode', () => {
    test('decodes UTF-16BE with a byte-order mark', () => {
      expect(TitleDecoder.decode(bytes(0xfe, 0xff, 0x00, 0x48, 0x00, 0x69))).toBe(
        'Hi',
      );
    });

    test('decodes UTF-16BE without a byte-order mark when a NUL byte is present', () => {
      expect(TitleDecoder.decode(bytes(0x00, 0x41, 0x00, 0x42))).toBe('AB');
    });

    test('decodes non-Latin UTF-16BE titles', () => {
      // "第1章"
      expect(
        TitleDecoder.decode(bytes(0xfe, 0xff, 0x7b, 0x2c, 0x00, 0x31, 0x7a, 0xe0)),
      ).toBe('第1章');
    });

    test('folds full-width spaces and trims the result', () => {
      // U+3000 "A" U+3000 "B" U+3000
      const raw = bytes(
        0xfe, 0xff, 0x30, 0x00, 0x00, 0x41, 0x30, 0x00, 0x00, 0x42, 0x30, 0x00,
      );

      expect(TitleDecoder.decode(raw)).toBe('A B');
    });

    test('falls back to UTF-8 when the UTF-16BE data has an odd length', () => {
      expect(TitleDecoder.decode(bytes(0x41, 0x00, 0x42))).toBe('A\u0000B');
    });

    test('decodes plain UTF-8 bytes', () => {
      expect(TitleDecoder.decode(new TextEncoder().encode('Überblick'))).toBe(
        'Überblick',
      );
    });

    test('replaces undecodable UTF-8 bytes with "?"', () => {
      expect(TitleDecoder.decode(bytes(0x43, 0x68, 0xff, 0x31))).toBe('Ch?1');
    });

    test('keeps an encoded replacement character next to invalid bytes', () => {
      expect(TitleDecoder.decode(bytes(0x41, 0xef, 0xbf, 0xbd, 0xff))).toBe(
        'A\uFFFD?',
      );
    });

    test('strips only one leading BOM from UTF-16BE bytes', () => {
      expect(
        TitleDecoder.decode(bytes(0xfe, 0xff, 0xfe, 0xff, 0x00, 0x41)),
      ).toBe('\uFEFFA');
    });

    test('strips only one leading BOM from UTF-8 bytes', () => {
      expect(
        TitleDecoder.decode(
          bytes(0xef, 0xbb, 0xbf, 0xef, 0xbb, 0xbf, 0x41),
        ),
      ).toBe('\uFEFFA');
    });

    test('keeps a trailing BOM character', () => {
      expect(TitleDecoder.decode('Intro\uFEFF ')).toBe('Intro\uFEFF');
    });

    test('strips a leading BOM character from text input', () => {
      expect(TitleDecoder.decode('\uFEFF1. Introduction')).toBe(
        '1. Introduction',
      );
    });

    test('normalizes string input without re-decoding it', () => {
      expect(TitleDecoder.decode('  第2章\u3000概要 ')).toBe('第2章 概要');
    });

    test('returns undefined for missing input', () => {
      expect(TitleDecoder.decode(undefined)).toBeUndefined();
    });

    test('returns undefined when only whitespace remains', () => {
      expect(TitleDecoder.decode('\u3000 \t')).toBeUndefined();
      expect(TitleDecoder.decode(bytes(0xfe, 0xff))).toBeUndefined();
      expect(TitleDecoder.decode(bytes())).toBeUndefined();
    });
  });

  describe('fromPdfObject', () => {
    test('reads hex strings written as UTF-16BE text', () => {
      expect(TitleDecoder.fromPdfObject(PDFHexString.fromText('Résumé'))).toBe(
        'Résumé',
      );
    });

    test('reads literal strings', () => {
      expect(TitleDecoder.fromPdfObject(PDFString.of('Plain title'))).toBe(
        'Plain title',
      );
    });

    test('ignores objects that are not strings', () => {
      expect(TitleDecoder.fromPdfObject(PDFName.of('Title'))).toBeUndefined();
      expect(TitleDecoder.fromPdfObject(PDFNumber.of(3))).toBeUndefined();
      expect(TitleDecoder.fromPdfObject(undefined)).toBeUndefined();
    });
  });

  describe('looksLikeUtf16', () => {
    test('detects a BOM or a NUL byte', () => {
      expect(TitleDecoder.looksLikeUtf16(bytes(0xfe, 0xff, 0x00, 0x41))).toBe(true);
      expect(TitleDecoder.looksLikeUtf16(bytes(0x41, 0x00))).toBe(true);
      expect(TitleDecoder.looksLikeUtf16(bytes(0x41, 0x42))).toBe(false);
    });
  });
});
