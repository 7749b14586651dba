import {
  CAPACITY_DEFAULT,
  createTextValue,
  textAppend,
  textClear,
  textCopy,
  textPush,
  textRelease,
  textReserve,
  textSetLength,
  textView,
} from "../src/parser/text";
import { assertEq } from "./_util";

const str = (bytes: Uint8Array) => Buffer.from(bytes).toString("utf8");

describe("text", () => {
  test("create", () => {
    const text = createTextValue();
    assertEq(text.bytes.length, CAPACITY_DEFAULT);
    assertEq(text.length, 0);
    assertEq(text.isAscii, true);
    assertEq(text.isQuoted, false);
    assertEq(text.useLocale, false);
    assertEq(createTextValue(0).bytes.length, 1);
  });

  test("push", () => {
    const text = createTextValue(4);
    for (const c of Buffer.from("abcd")) textPush(text, c);
    assertEq(str(textView(text)), "abcd");
    assertEq(text.bytes.length, 5);
    assertEq(text.bytes[4], 0);
    assertEq(text.isAscii, true);

    textPush(text, 0xc3);
    textPush(text, 0xa9);
    assertEq(str(textView(text)), "abcdé");
    assertEq(text.isAscii, false);
  });

  test("reserve", () => {
    const text = createTextValue(10);
    textAppend(text, Buffer.from("0123456789"));
    textReserve(text, 100);
    assertEq(text.bytes.length > 100, true);
    assertEq(str(textView(text)), "0123456789");

    const capacity = text.bytes.length;
    textReserve(text, 3);
    assertEq(text.bytes.length, capacity);
  });

  test("set length", () => {
    const text = createTextValue(8);
    textAppend(text, Buffer.from("{users[{id"));
    textSetLength(text, 7);
    assertEq(str(textView(text)), "{users[");
    assertEq(text.bytes[7], 0);
  });

  test("append", () => {
    const text = createTextValue(8);
    text.isQuoted = true;
    textAppend(text, Buffer.from("xx{ab}xx"), 2, 6);
    textAppend(text, Buffer.from("é"));
    assertEq(str(textView(text)), "{ab}é");
    assertEq(text.isAscii, true);
    assertEq(text.isQuoted, true);
  });

  test("copy", () => {
    const text = createTextValue(8);
    textAppend(text, Buffer.from("old"));
    text.isQuoted = true;

    textCopy(text, Buffer.from("naïve"), 0, 6, true);
    assertEq(str(textView(text)), "naïve");
    assertEq(text.isAscii, false);
    assertEq(text.isQuoted, false);

    textCopy(text, Buffer.from("naïve"), 0, 2, true);
    assertEq(str(textView(text)), "na");
    assertEq(text.isAscii, true);

    textCopy(text, Buffer.from("naïve"));
    assertEq(text.length, 6);
    assertEq(text.isAscii, true);
  });

  test("clear and release", () => {
    const text = createTextValue(2);
    textAppend(text, Buffer.from("ü".repeat(20)));
    text.isAscii = false;
    text.isQuoted = true;
    text.useLocale = true;

    textClear(text);
    assertEq(text.length, 0);
    assertEq(text.isAscii, true);
    assertEq(text.isQuoted, false);
    assertEq(text.bytes.length > 2, true);

    textRelease(text, 2);
    assertEq(text.bytes.length, 2);
    assertEq(text.length, 0);
    assertEq(text.useLocale, true);
  });
});
