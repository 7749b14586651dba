import { JsonLocaleError, createTextConverter, environmentLocale, resolveLocaleCharset } from "../src/index";
import { textToNarrow, textToWide } from "../src/parser/encoding";
import { createTextValue, textAppend } from "../src/parser/text";
import { assertEq, catchError } from "./_util";

const bytes = (value: Uint8Array | undefined) => (value === undefined ? undefined : Array.from(value));

describe("encoding", () => {
  test("locale charset", () => {
    assertEq(resolveLocaleCharset("C"), "ascii");
    assertEq(resolveLocaleCharset("POSIX"), "ascii");
    assertEq(resolveLocaleCharset("en_US"), "utf8");
    assertEq(resolveLocaleCharset("en_US.UTF-8"), "utf8");
    assertEq(resolveLocaleCharset("de_DE.ISO-8859-1"), "iso88591");
    assertEq(resolveLocaleCharset("de_DE.ISO-8859-1@euro"), "iso88591");
    assertEq(resolveLocaleCharset("English_United States.1252"), "cp1252");
    assertEq(resolveLocaleCharset("zh_CN.GB18030"), "gb18030");
    assertEq(resolveLocaleCharset("latin1"), "latin1");
    assertEq(resolveLocaleCharset("xx_YY.NOPE-42"), undefined);
    assertEq(resolveLocaleCharset("Klingon"), undefined);
    assertEq(resolveLocaleCharset("de"), "utf8");
    assertEq(resolveLocaleCharset("gbk"), "gbk");
  });

  test("unknown language", () => {
    assertEq(resolveLocaleCharset("qq_ZZ"), undefined);
    assertEq(resolveLocaleCharset("qq"), undefined);
    assertEq(resolveLocaleCharset("qq_ZZ.UTF-8"), undefined);
    assertEq(resolveLocaleCharset("fr_FR"), "utf8");
    assertEq(resolveLocaleCharset("pt_br"), "utf8");
  });

  test("charsets that change ASCII", () => {
    assertEq(resolveLocaleCharset("utf16le"), undefined);
    assertEq(resolveLocaleCharset("en_US.UTF-16"), undefined);
    assertEq(resolveLocaleCharset("ucs2"), undefined);
    assertEq(resolveLocaleCharset("utf7"), undefined);
    assertEq(resolveLocaleCharset("ascii"), "ascii");
    assertEq(resolveLocaleCharset("en_US.ISO-8859-15"), "iso885915");
  });

  test("environment locale", () => {
    assertEq(environmentLocale({ LC_ALL: "de_DE.ISO-8859-1", LC_CTYPE: "C", LANG: "en_US" }), "de_DE.ISO-8859-1");
    assertEq(environmentLocale({ LC_ALL: "", LC_CTYPE: "C", LANG: "en_US" }), "C");
    assertEq(environmentLocale({ LANG: "en_US.UTF-8" }), "en_US.UTF-8");
    assertEq(environmentLocale({}), "C");
  });

  test("utf8 and wide", () => {
    const converter = createTextConverter();
    assertEq(converter.charset, "utf8");
    assertEq(converter.utf8ToWide(Buffer.from("héllo")), "héllo");
    assertEq(converter.utf8ToWide(Buffer.from("abc"), 2), "ab");
    assertEq(converter.utf8ToWide(Buffer.from("abc"), 0), "");
    assertEq(converter.utf8ToWide(Uint8Array.of(0x61, 0xff)), undefined);

    assertEq(bytes(converter.wideToUtf8("€")), [0xe2, 0x82, 0xac]);
    assertEq(bytes(converter.wideToUtf8("")), []);
    assertEq(converter.wideToUtf8("a\ud800b"), undefined);
    assertEq(bytes(converter.wideToUtf8("x".repeat(40))), Array.from(Buffer.from("x".repeat(40))));
  });

  test("code point", () => {
    const converter = createTextConverter();
    assertEq(bytes(converter.codePointToUtf8(0x41)), [0x41]);
    assertEq(bytes(converter.codePointToUtf8(0xe9)), [0xc3, 0xa9]);
    assertEq(bytes(converter.codePointToUtf8(0x20ac)), [0xe2, 0x82, 0xac]);
    assertEq(bytes(converter.codePointToUtf8(0x1f600)), [0xf0, 0x9f, 0x98, 0x80]);
  });

  test("multibyte", () => {
    const converter = createTextConverter("de_DE.ISO-8859-1");
    assertEq(converter.charset, "iso88591");
    assertEq(bytes(converter.utf8ToMultiByte(Buffer.from("é"))), [0xe9]);
    assertEq(bytes(converter.utf8ToMultiByte(Buffer.from(""))), []);
    assertEq(converter.utf8ToMultiByte(Buffer.from("中")), undefined);
    assertEq(converter.utf8ToMultiByte(Uint8Array.of(0xc3)), undefined);
    assertEq(bytes(converter.multiByteToUtf8(Uint8Array.of(0x63, 0xe9))), [0x63, 0xc3, 0xa9]);

    converter.setLocale("zh_CN.GB18030");
    assertEq(bytes(converter.utf8ToMultiByte(Buffer.from("中"))), [0xd6, 0xd0]);
    assertEq(bytes(converter.multiByteToUtf8(Uint8Array.of(0xd6, 0xd0))), Array.from(Buffer.from("中")));

    converter.setLocale("en_US.UTF-8");
    assertEq(bytes(converter.utf8ToMultiByte(Buffer.from("中"))), Array.from(Buffer.from("中")));
    assertEq(converter.multiByteToUtf8(Uint8Array.of(0xd6, 0xd0)), undefined);
  });

  test("unknown locale", () => {
    const converter = createTextConverter("de_DE.ISO-8859-1");
    const e = catchError(() => converter.setLocale("Klingon"));
    assertEq(e instanceof JsonLocaleError && e.message, "Locale 'Klingon' not found.");
    assertEq(e instanceof JsonLocaleError && e.locale, "Klingon");
    assertEq(converter.charset, "iso88591");
  });

  test("text", () => {
    const converter = createTextConverter("de_DE.ISO-8859-1");
    const text = createTextValue(4);
    textAppend(text, Buffer.from("é"));
    text.isAscii = false;

    assertEq(bytes(textToNarrow(text, converter)), [0xc3, 0xa9]);
    text.useLocale = true;
    assertEq(bytes(textToNarrow(text, converter)), [0xe9]);
    assertEq(textToWide(text, converter), "é");
  });
});
