import { JsonLocaleError, createJsonReader, narrow } from "../src/index";
import { assertEq, catchError } from "./_util";

const bytes = (value: Buffer | null | undefined) => (value ? Array.from(value) : value);

describe("locale", () => {
  test("narrow values", () => {
    const reader = createJsonReader({ locale: "de_DE.ISO-8859-1" });
    const values: unknown[] = [];
    reader.onPair(
      "né",
      narrow((value) => {
        values.push(bytes(value));
        values.push(bytes(reader.getCurrentElementPathNarrow()));
        values.push(bytes(reader.getCurrentElementNameNarrow()));
        values.push(reader.getCurrentElementName());
      }),
    );
    reader.onPair("ascii", narrow((value) => values.push(bytes(value))));
    reader.onPair(null, (value) => values.push(value));
    assertEq(reader.readBuffer('{"né":"José","ascii":"plain"}'), true);
    assertEq(values, [
      [0x4a, 0x6f, 0x73, 0xe9],
      [0x7b, 0x6e, 0xe9],
      [0x6e, 0xe9],
      "né",
      "José",
      Array.from(Buffer.from("plain")),
      "plain",
    ]);
  });

  test("multibyte charset", () => {
    const reader = createJsonReader();
    reader.useLocale(true, "zh_CN.GB18030");
    const values: unknown[] = [];
    reader.onArrayItem(null, narrow((value) => values.push(bytes(value))));
    assertEq(reader.readBuffer('["中文", "\\u4e2d"]'), true);
    assertEq(values, [
      [0xd6, 0xd0, 0xce, 0xc4],
      [0xd6, 0xd0],
    ]);
  });

  test("locale persists across reads", () => {
    const reader = createJsonReader();
    reader.useLocale(true, "de_DE.ISO-8859-1");
    const values: unknown[] = [];
    for (let i = 0; i < 2; ++i) {
      reader.onArrayItem(null, narrow((value) => values.push(bytes(value))));
      assertEq(reader.readBuffer('["é"]'), true);
    }
    reader.useLocale(false);
    reader.onArrayItem(null, narrow((value) => values.push(bytes(value))));
    assertEq(reader.readBuffer('["é"]'), true);
    assertEq(values, [[0xe9], [0xe9], [0xc3, 0xa9]]);
  });

  test("unconvertible value", () => {
    const reader = createJsonReader({ locale: "de_DE.ISO-8859-1" });
    const values: unknown[] = [];
    reader.onArrayItem(null, narrow((value) => values.push(bytes(value))));
    assertEq(reader.readBuffer('["中", "ok"]'), true);
    assertEq(values, [null, [0x6f, 0x6b]]);
  });

  test("environment locale", () => {
    const saved = process.env.LC_ALL;
    process.env.LC_ALL = "de_DE.ISO-8859-1";
    try {
      const reader = createJsonReader();
      reader.useLocale(true);
      const values: unknown[] = [];
      reader.onArrayItem(null, narrow((value) => values.push(bytes(value))));
      assertEq(reader.readBuffer('["é"]'), true);
      assertEq(values, [[0xe9]]);
    } finally {
      if (saved === undefined) delete process.env.LC_ALL;
      else process.env.LC_ALL = saved;
    }
  });

  test("unknown locale", () => {
    const reader = createJsonReader();
    const klingon = catchError(() => reader.useLocale(true, "Klingon"));
    assertEq(klingon instanceof JsonLocaleError, true);
    assertEq(klingon instanceof Error && klingon.message, "Locale 'Klingon' not found.");
    const nope = catchError(() => createJsonReader({ locale: "xx_YY.NOPE-42" }));
    assertEq(nope instanceof JsonLocaleError && nope.locale, "xx_YY.NOPE-42");
  });

  test("unknown language", () => {
    const reader = createJsonReader();
    const e = catchError(() => reader.useLocale(true, "qq_ZZ"));
    assertEq(e instanceof JsonLocaleError && e.message, "Locale 'qq_ZZ' not found.");
    reader.useLocale(true, "en_US");
    const values: unknown[] = [];
    reader.onArrayItem(null, narrow((value) => values.push(bytes(value))));
    assertEq(reader.readBuffer('["é"]'), true);
    assertEq(values, [[0xc3, 0xa9]]);
  });

  test("charset not ASCII-compatible", () => {
    const reader = createJsonReader({ locale: "de_DE.ISO-8859-1" });
    const e = catchError(() => reader.useLocale(true, "utf16le"));
    assertEq(e instanceof JsonLocaleError && e.locale, "utf16le");
    const values: unknown[] = [];
    reader.onPair("k", narrow((value) => values.push(bytes(value))));
    assertEq(reader.readBuffer('{"k":"Aé"}'), true);
    assertEq(values, [[0x41, 0xe9]]);
  });
});
