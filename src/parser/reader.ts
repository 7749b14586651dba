import type { Logger } from "pino";
import {
  EOF,
  JsonCancelError,
  JsonChar,
  JsonEventKind,
  JsonInputError,
  JsonReaderError,
  JsonSyntaxError,
} from "../base";
import { JsonReaderOption, checkProgressStep, resolveReaderOption } from "../config";
import { logger as packageLogger } from "../logger";
import { createTextConverter, environmentLocale, textToNarrow } from "./encoding";
import { Err_Eof, JsonProgressCallback, createJsonInput } from "./input";
import {
  JsonElement,
  JsonPublisher,
  JsonValueCallback,
  JsonVoidCallback,
  createJsonPublisher,
  wide,
} from "./publisher";
import {
  TextValue,
  createTextValue,
  textAppend,
  textClear,
  textCopy,
  textPush,
  textRelease,
  textSetLength,
} from "./text";

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const MINUS = 0x2d;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;

const LITERAL_TRUE = Buffer.from("true");
const LITERAL_FALSE = Buffer.from("false");
const LITERAL_NULL = Buffer.from("null");

const isDigit = (c: JsonChar) => c >= 0x30 && c <= 0x39;
/* digits, '.', '+', '-', 'e', 'E' */
const isNumericCharacter = (c: JsonChar) =>
  isDigit(c) || c === 0x2e || c === 0x2b || c === MINUS || c === 0x65 || c === 0x45;

const Err_Unexpected = "Unexpected character";
const Err_ControlCharacter = "Control character not allowed in string";
const Err_ContentAfterEnd = "Unexpected content after the root value";
const Err_Busy = "A read is already in progress.";

let _readerCount = 0;

/** Value of the current array item; `value` is `null` for JSON `null` and containers */
type ArrayItem = { value: TextValue | null; isValue: boolean };

type StructuralEventKind = Exclude<JsonEventKind, "arrayItem" | "pair">;
type ValueEventKind = Extract<JsonEventKind, "arrayItem" | "pair">;

/**
 * # Event-driven JSON reader
 *
 * Reads UTF-8 JSON from a file or a buffer in one pass and calls the callbacks subscribed to its elements.
 *
 * ## elements
 * An element is subscribed by its name or by its path (a name containing `{` or `[` is a path),
 * or with `null` for every element.
 * Paths append, from the root, every ancestor's name and the `{` or `[` it opens, without quotes:
 * `{users[{id` is the key `id` of the objects in the array `users` of the root object.
 * Object and array paths end with their own bracket (`{users[`).
 *
 * ## order of notification
 * The callback subscribed by name is called first, then the one subscribed by path, then the one for all elements.
 *
 * ## lifetime
 * Subscriptions are dropped at the end of every read.
 */
export interface JsonReader {
  readFile(path: string): boolean;
  readBuffer(buffer: Uint8Array | string): boolean;
  /** The unique paths of all objects, arrays and pairs */
  getPathsFromFile(path: string): Set<string> | undefined;
  getPathsFromBuffer(buffer: Uint8Array | string): Set<string> | undefined;

  subscribe(kind: StructuralEventKind, element: JsonElement, callback: JsonVoidCallback): void;
  subscribe(kind: ValueEventKind, element: JsonElement, callback: JsonValueCallback): void;
  unsubscribe(kind?: JsonEventKind): void;

  onObjectBegin(element: JsonElement, callback: () => void): void;
  onObjectEnd(element: JsonElement, callback: () => void): void;
  onArrayBegin(element: JsonElement, callback: () => void): void;
  onArrayEnd(element: JsonElement, callback: () => void): void;
  /** A plain function receives the value as a string; use `narrow()` for bytes */
  onArrayItem(element: JsonElement, callback: ((value: string | null) => void) | JsonValueCallback): void;
  onPair(element: JsonElement, callback: ((value: string | null) => void) | JsonValueCallback): void;

  getCurrentElementPath(): string;
  getCurrentElementPathNarrow(): Buffer | undefined;
  getCurrentElementName(): string;
  getCurrentElementNameNarrow(): Buffer | undefined;
  /** Tells `123` from `"123"`, which are both delivered as `123` */
  isValueQuoted(): boolean;
  isPathAscii(): boolean;
  /** Whether the current array item is a string, number, boolean or null */
  isArrayItemValue(): boolean;

  /**
   * Narrow values in the charset of `locale` (for example `zh_CN.GB18030`) instead of UTF-8.
   * Without `locale`, the locale of the environment is used.
   */
  useLocale(enabled: boolean, locale?: string): void;
  /** Reports the progress of file reads every `step` percent; a step of 0 turns it off */
  onProgress(step: number, callback: JsonProgressCallback): void;
  /** Aborts the current read, or the next one when called outside a read */
  cancel(): void;

  get errorDescription(): string;
  get lastError(): Error | undefined;
}

export const createJsonReader = (option?: JsonReaderOption): JsonReader => {
  const _config = resolveReaderOption(option);
  const _log: Logger = (_config.logger ?? packageLogger).child({ reader: ++_readerCount });

  const _converter = createTextConverter();
  const _input = createJsonInput(_converter, _config.chunkSize);
  const _publishers: Record<JsonEventKind, JsonPublisher> = {
    objectBegin: createJsonPublisher(_converter, _log),
    objectEnd: createJsonPublisher(_converter, _log),
    arrayBegin: createJsonPublisher(_converter, _log),
    arrayEnd: createJsonPublisher(_converter, _log),
    arrayItem: createJsonPublisher(_converter, _log),
    pair: createJsonPublisher(_converter, _log),
  };
  let _currentPublisher: JsonPublisher | undefined;

  const _elemName = createTextValue(_config.initialCapacity);
  const _elemValue = createTextValue(_config.initialCapacity);
  const _path = createTextValue(_config.initialCapacity);
  const _currentElemName = createTextValue(_config.initialCapacity);
  const _texts = [_elemName, _elemValue, _path, _currentElemName];
  const _arrayItem: ArrayItem = { value: null, isValue: false };

  let _progressStep = 0;
  let _progressCallback: JsonProgressCallback | undefined;
  let _cancelled = false;
  let _reading = false;
  let _errDescription = "";
  let _lastError: Error | undefined;

  function _unexpected(c: JsonChar): never {
    if (c === EOF) throw new JsonSyntaxError(Err_Eof, EOF);
    throw new JsonSyntaxError(Err_Unexpected, c);
  }

  const _notify = (
    publisher: JsonPublisher,
    namePos: number,
    nameLen: number,
    pathLen: number,
    value: TextValue | null = null,
  ) => {
    textSetLength(_path, pathLen);
    _currentPublisher = publisher;
    publisher.notify(_path, namePos, nameLen, pathLen, value);
    if (_cancelled) throw new JsonCancelError();
  };

  /** Appends the pending element name to the path */
  const _updateCurrentPath = (pathLen: number) => {
    if (_elemName.length === 0) return pathLen;
    textSetLength(_path, pathLen);
    textAppend(_path, _elemName.bytes, 0, _elemName.length);
    _path.isAscii = _path.isAscii && _elemName.isAscii;
    return _path.length;
  };

  const _parseString = (text: TextValue) => {
    textClear(text);
    text.isQuoted = true;
    _input.seekToNextQuote();
    for (;;) {
      const c = _input.nextChar(true);
      if (c === QUOTE) return;
      if (c === BACKSLASH) _input.readEscapeSequence(text);
      else if (c === EOF) throw new JsonSyntaxError(Err_Eof, EOF);
      else if (c < 0x20) throw new JsonSyntaxError(Err_ControlCharacter, c);
      else textPush(text, c);
    }
  };
  const _parseNumber = (text: TextValue) => {
    textClear(text);
    for (let c = _input.currentChar(); isNumericCharacter(c); c = _input.nextChar(true)) textPush(text, c);
    _input.previous();
  };
  const _parseLiteral = (text: TextValue, literal: Uint8Array) => {
    for (let i = 1; i < literal.length; ++i) {
      const c = _input.nextChar(true);
      if (c !== literal[i]) _unexpected(c);
    }
    textCopy(text, literal);
  };

  const _parseObject = (pathLen: number, namePos: number, nameLen: number) => {
    textSetLength(_path, pathLen);
    textPush(_path, OPEN_BRACE);
    ++pathLen;
    _notify(_publishers.objectBegin, namePos, nameLen, pathLen);

    for (let c = _input.nextChar(); c !== CLOSE_BRACE; c = _input.nextChar()) {
      if (c !== QUOTE) _unexpected(c);
      _parseString(_elemName);
      _input.nextChar();
      _parseValue(pathLen);
    }
    textClear(_elemName);
    textClear(_elemValue);
    _notify(_publishers.objectEnd, namePos, nameLen, pathLen);
  };
  const _parseArray = (pathLen: number, namePos: number, nameLen: number) => {
    textSetLength(_path, pathLen);
    textPush(_path, OPEN_BRACKET);
    ++pathLen;
    _notify(_publishers.arrayBegin, namePos, nameLen, pathLen);

    for (let c = _input.nextChar(); c !== CLOSE_BRACKET; c = _input.nextChar()) {
      textClear(_elemName);
      textClear(_elemValue);
      _arrayItem.value = null;
      _arrayItem.isValue = false;
      _parseValue(pathLen, _arrayItem);
      _notify(_publishers.arrayItem, namePos, nameLen, pathLen, _arrayItem.value);
    }
    textClear(_elemName);
    textClear(_elemValue);
    _arrayItem.value = null;
    _arrayItem.isValue = false;
    _notify(_publishers.arrayEnd, namePos, nameLen, pathLen);
  };
  const _parseValue = (pathLen: number, arrayItem?: ArrayItem) => {
    if (_cancelled) throw new JsonCancelError();
    const namePos = pathLen;
    const nameLen = _elemName.length;
    const isPathAscii = _path.isAscii;
    let value: TextValue | null = _elemValue;

    pathLen = _updateCurrentPath(pathLen);
    const c = _input.currentChar();

    if (c === OPEN_BRACE) _parseObject(pathLen, namePos, nameLen);
    else if (c === OPEN_BRACKET) _parseArray(pathLen, namePos, nameLen);
    else {
      if (c === QUOTE) _parseString(_elemValue);
      else if (isDigit(c) || c === MINUS) _parseNumber(_elemValue);
      else if (c === LITERAL_TRUE[0]) _parseLiteral(_elemValue, LITERAL_TRUE);
      else if (c === LITERAL_FALSE[0]) _parseLiteral(_elemValue, LITERAL_FALSE);
      else if (c === LITERAL_NULL[0]) {
        _parseLiteral(_elemValue, LITERAL_NULL);
        textClear(_elemValue);
        value = null;
      } else _unexpected(c);

      if (arrayItem === undefined) _notify(_publishers.pair, namePos, nameLen, pathLen, value);
      else {
        arrayItem.value = value;
        arrayItem.isValue = true;
      }
    }
    _path.isAscii = isPathAscii;
  };

  const _clear = () => {
    _input.release();
    for (const text of _texts) textRelease(text, _config.initialCapacity);
    for (const publisher of Object.values(_publishers)) publisher.unsubscribe();
    _currentPublisher = undefined;
    _arrayItem.value = null;
    _arrayItem.isValue = false;
    _cancelled = false;
  };

  const _describe = (e: unknown) => {
    let description = e instanceof Error ? e.message : String(e);
    if (!(e instanceof JsonCancelError)) {
      if (_input.position > 0) description += ` Byte Position: ${_input.position}.`;
      if (_path.length > 0) description += ` JSON path: '${_path.bytes.toString("utf8", 0, _path.length)}'.`;
    }
    return description;
  };

  const _read = (source: "file" | "buffer", open: () => void, paths?: Set<string>): boolean => {
    if (_reading) {
      _lastError = new JsonInputError(Err_Busy);
      _errDescription = _lastError.message;
      return false;
    }
    _reading = true;
    const start = Date.now();
    let succeeded = true;
    try {
      for (const text of _texts) textClear(text);
      _input.setProgress(_progressStep, _progressCallback);
      open();

      if (paths) {
        const collect = () => {
          paths.add(reader.getCurrentElementPath());
        };
        reader.onObjectBegin(null, collect);
        reader.onArrayBegin(null, collect);
        reader.onPair(null, collect);
      }
      _log.debug({ source, size: _input.size }, "read started");

      if (_input.nextChar() !== EOF) {
        _parseValue(0);
        const c = _input.nextChar();
        if (c !== EOF) throw new JsonSyntaxError(Err_ContentAfterEnd, c);
      }
      _input.endProgress();
      _errDescription = "";
      _lastError = undefined;
    } catch (e) {
      succeeded = false;
      _lastError = e instanceof Error ? e : new JsonReaderError(String(e));
      _errDescription = _describe(e);
    } finally {
      const position = _input.position;
      _clear();
      _reading = false;
      if (succeeded) _log.debug({ source, position, ms: Date.now() - start }, "read finished");
      else _log.debug({ source, position, error: _errDescription }, "read failed");
    }
    return succeeded;
  };

  const _toBytes = (buffer: Uint8Array | string) => (typeof buffer === "string" ? Buffer.from(buffer, "utf8") : buffer);
  const _valueCallback = (callback: ((value: string | null) => void) | JsonValueCallback) =>
    typeof callback === "function" ? wide(callback) : callback;

  const reader: JsonReader = {
    readFile(path: string) {
      return _read("file", () => _input.openFile(path));
    },
    readBuffer(buffer: Uint8Array | string) {
      return _read("buffer", () => _input.setBuffer(_toBytes(buffer)));
    },
    getPathsFromFile(path: string) {
      const paths = new Set<string>();
      return _read("file", () => _input.openFile(path), paths) ? paths : undefined;
    },
    getPathsFromBuffer(buffer: Uint8Array | string) {
      const paths = new Set<string>();
      return _read("buffer", () => _input.setBuffer(_toBytes(buffer)), paths) ? paths : undefined;
    },

    subscribe(kind: JsonEventKind, element: JsonElement, callback: JsonVoidCallback | JsonValueCallback) {
      _publishers[kind].subscribe(element, callback);
    },
    unsubscribe(kind?: JsonEventKind) {
      if (kind !== undefined) _publishers[kind].unsubscribe();
      else for (const publisher of Object.values(_publishers)) publisher.unsubscribe();
    },

    onObjectBegin(element: JsonElement, callback: () => void) {
      _publishers.objectBegin.subscribe(element, { shape: "none", fn: callback });
    },
    onObjectEnd(element: JsonElement, callback: () => void) {
      _publishers.objectEnd.subscribe(element, { shape: "none", fn: callback });
    },
    onArrayBegin(element: JsonElement, callback: () => void) {
      _publishers.arrayBegin.subscribe(element, { shape: "none", fn: callback });
    },
    onArrayEnd(element: JsonElement, callback: () => void) {
      _publishers.arrayEnd.subscribe(element, { shape: "none", fn: callback });
    },
    onArrayItem(element: JsonElement, callback: ((value: string | null) => void) | JsonValueCallback) {
      _publishers.arrayItem.subscribe(element, _valueCallback(callback));
    },
    onPair(element: JsonElement, callback: ((value: string | null) => void) | JsonValueCallback) {
      _publishers.pair.subscribe(element, _valueCallback(callback));
    },

    getCurrentElementPath() {
      return _path.bytes.toString("utf8", 0, _path.length);
    },
    getCurrentElementPathNarrow() {
      const bytes = textToNarrow(_path, _converter);
      return bytes && Buffer.from(bytes);
    },
    getCurrentElementName() {
      if (!_currentPublisher) return "";
      _currentPublisher.getCurrentElementName(_currentElemName);
      return _currentElemName.bytes.toString("utf8", 0, _currentElemName.length);
    },
    getCurrentElementNameNarrow() {
      if (!_currentPublisher) return Buffer.alloc(0);
      _currentPublisher.getCurrentElementName(_currentElemName);
      const bytes = textToNarrow(_currentElemName, _converter);
      return bytes && Buffer.from(bytes);
    },
    isValueQuoted() {
      return _elemValue.isQuoted;
    },
    isPathAscii() {
      return _path.isAscii;
    },
    isArrayItemValue() {
      return _arrayItem.isValue;
    },

    useLocale(enabled: boolean, locale?: string) {
      if (enabled || locale !== undefined) _converter.setLocale(locale ?? environmentLocale());
      for (const text of _texts) text.useLocale = enabled;
    },
    onProgress(step: number, callback: JsonProgressCallback) {
      _progressStep = checkProgressStep(step);
      _progressCallback = _progressStep > 0 ? callback : undefined;
    },
    cancel() {
      _cancelled = true;
    },

    get errorDescription() {
      return _errDescription;
    },
    get lastError() {
      return _lastError;
    },
  };
  if (_config.locale !== undefined) reader.useLocale(true, _config.locale);
  return reader;
};
