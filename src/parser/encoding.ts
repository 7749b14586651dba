import * as iconv from "iconv-lite";
import { TextDecoder, TextEncoder } from "util";
import { JsonLocaleError } from "../base";
import { TextValue } from "./text";

const UTF8 = "utf8";
const LONE_SURROGATE = /\p{Cs}/u;
const LOCALE_NAME = /^[a-z]{2,3}(_[a-z]{2})?$/i;
const PRINTABLE_ASCII = Array.from({ length: 0x5f }, (_, i) => String.fromCharCode(0x20 + i)).join("");

const LANGUAGES = new Intl.DisplayNames(["en"], { type: "language", fallback: "none" });
const REGIONS = new Intl.DisplayNames(["en"], { type: "region", fallback: "none" });

const normalizeCharset = (charset: string) => charset.toLowerCase().replace(/[^0-9a-z]/g, "");

/** `ll` or `ll_CC` naming a known language and region */
const isKnownLocaleName = (name: string) => {
  const [language, region] = name.split("_");
  if (LANGUAGES.of(language.toLowerCase()) === undefined) return false;
  return region === undefined || REGIONS.of(region.toUpperCase()) !== undefined;
};
/* printable ASCII must encode to itself */
const isAsciiCompatible = (charset: string) =>
  iconv.encode(PRINTABLE_ASCII, charset).equals(Buffer.from(PRINTABLE_ASCII));

/**
 * Maps a locale identifier to the charset its narrow strings use.
 *
 * @example "en_US.ISO-8859-1" -> "iso88591", "English_United States.1252" -> "cp1252", "C" -> "ascii"
 */
export const resolveLocaleCharset = (locale: string): string | undefined => {
  const at = locale.indexOf("@");
  const name = at < 0 ? locale : locale.slice(0, at);

  const dot = name.lastIndexOf(".");
  let charset: string;
  if (name === "C" || name === "POSIX") charset = "ascii";
  else if (dot >= 0) {
    const territory = name.slice(0, dot);
    if (LOCALE_NAME.test(territory) && !isKnownLocaleName(territory)) return undefined;
    charset = name.slice(dot + 1);
    if (/^[0-9]+$/.test(charset)) charset = "cp" + charset;
  } else if (LOCALE_NAME.test(name) && isKnownLocaleName(name)) return UTF8;
  else charset = name;

  charset = normalizeCharset(charset);
  if (charset === UTF8) return UTF8;
  return charset && iconv.encodingExists(charset) && isAsciiCompatible(charset) ? charset : undefined;
};

/** The locale named by the environment, as `setlocale(LC_ALL, "")` would pick it */
export const environmentLocale = (env: NodeJS.ProcessEnv = process.env) =>
  env.LC_ALL || env.LC_CTYPE || env.LANG || "C";

/**
 * Converts strings between UTF-8, wide (UTF-16 code units) and the multibyte charset of a locale.
 *
 * Returned byte arrays may be views of an internal buffer, valid until the next call.
 * Conversions return `undefined` when the input cannot be represented.
 */
export interface TextConverter {
  get charset(): string;
  setLocale(locale: string): void;

  utf8ToWide(utf8: Uint8Array, length?: number): string | undefined;
  wideToUtf8(wide: string): Uint8Array | undefined;
  utf8ToMultiByte(utf8: Uint8Array, length?: number): Uint8Array | undefined;
  multiByteToUtf8(multibyte: Uint8Array, length?: number): Uint8Array | undefined;
  /** Encodes one Unicode code point */
  codePointToUtf8(codePoint: number): Uint8Array;
}

export const createTextConverter = (locale?: string): TextConverter => {
  const _decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  const _encoder = new TextEncoder();
  const _codePoint = new Uint8Array(4);
  let _narrow = new Uint8Array(16);
  let _charset = UTF8;

  const _reserve = (size: number) => {
    if (size > _narrow.length) _narrow = new Uint8Array(Math.max(size, Math.ceil(_narrow.length * 1.2)));
  };

  const converter: TextConverter = {
    get charset() {
      return _charset;
    },
    setLocale(locale: string) {
      const charset = resolveLocaleCharset(locale);
      if (charset === undefined) throw new JsonLocaleError(locale);
      _charset = charset;
    },

    utf8ToWide(utf8, length = utf8.length) {
      if (length === 0) return "";
      try {
        return _decoder.decode(utf8.subarray(0, length));
      } catch (e) {
        return undefined;
      }
    },
    wideToUtf8(wide) {
      if (wide.length === 0) return _narrow.subarray(0, 0);
      if (LONE_SURROGATE.test(wide)) return undefined;
      _reserve(wide.length * 3);
      const { written } = _encoder.encodeInto(wide, _narrow);
      return _narrow.subarray(0, written);
    },
    utf8ToMultiByte(utf8, length = utf8.length) {
      if (length === 0) return _narrow.subarray(0, 0);
      if (_charset === UTF8) return utf8.subarray(0, length);
      const wide = converter.utf8ToWide(utf8, length);
      if (wide === undefined) return undefined;
      const multibyte = iconv.encode(wide, _charset);
      // unmappable characters come out as substitutes
      if (iconv.decode(multibyte, _charset) !== wide) return undefined;
      return multibyte;
    },
    multiByteToUtf8(multibyte, length = multibyte.length) {
      if (length === 0) return _narrow.subarray(0, 0);
      const source = Buffer.from(multibyte.buffer, multibyte.byteOffset, length);
      if (_charset === UTF8) return converter.utf8ToWide(source) === undefined ? undefined : source;
      const wide = iconv.decode(source, _charset);
      if (!iconv.encode(wide, _charset).equals(source)) return undefined;
      return converter.wideToUtf8(wide);
    },

    codePointToUtf8(codePoint) {
      if (codePoint < 0x80) {
        _codePoint[0] = codePoint;
        return _codePoint.subarray(0, 1);
      }
      if (codePoint < 0x800) {
        _codePoint[0] = 0xc0 | (codePoint >> 6);
        _codePoint[1] = 0x80 | (codePoint & 0x3f);
        return _codePoint.subarray(0, 2);
      }
      if (codePoint < 0x10000) {
        _codePoint[0] = 0xe0 | (codePoint >> 12);
        _codePoint[1] = 0x80 | ((codePoint >> 6) & 0x3f);
        _codePoint[2] = 0x80 | (codePoint & 0x3f);
        return _codePoint.subarray(0, 3);
      }
      _codePoint[0] = 0xf0 | (codePoint >> 18);
      _codePoint[1] = 0x80 | ((codePoint >> 12) & 0x3f);
      _codePoint[2] = 0x80 | ((codePoint >> 6) & 0x3f);
      _codePoint[3] = 0x80 | (codePoint & 0x3f);
      return _codePoint.subarray(0, 4);
    },
  };
  if (locale !== undefined) converter.setLocale(locale);
  return converter;
};

/** Narrow form of a text: UTF-8, or the locale charset when the text asks for it */
export const textToNarrow = (text: TextValue, converter: TextConverter): Uint8Array | undefined => {
  if (text.length === 0 || text.isAscii || !text.useLocale) return text.bytes.subarray(0, text.length);
  return converter.utf8ToMultiByte(text.bytes, text.length);
};

export const textToWide = (text: TextValue, converter: TextConverter): string | undefined =>
  converter.utf8ToWide(text.bytes, text.length);
