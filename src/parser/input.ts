import * as fs from "fs";
import { EOF, JsonChar, JsonInputError, JsonSyntaxError } from "../base";
import { TextConverter } from "./encoding";
import { TextValue, textAppend, textPush } from "./text";

export const FILE_CHUNK_SIZE = 1048576;

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const LETTER_U = 0x75;
const REPLACEMENT_CHARACTER = 0xfffd;

/* <SP>, <CR>, <LF>, <TAB>, ':', ',', <NUL> */
const isSkippable = (c: JsonChar) =>
  c === 0x20 || c === 0x0d || c === 0x0a || c === 0x09 || c === 0x3a || c === 0x2c || c === 0x00;
const isHighSurrogate = (unit: number) => unit >= 0xd800 && unit <= 0xdbff;
const isLowSurrogate = (unit: number) => unit >= 0xdc00 && unit <= 0xdfff;

const ESCAPE_TABLE: (number | undefined)[] = [];
ESCAPE_TABLE[0x22] = 0x22; // "
ESCAPE_TABLE[0x5c] = 0x5c; // \
ESCAPE_TABLE[0x2f] = 0x2f; // /
ESCAPE_TABLE[0x62] = 0x08; // b
ESCAPE_TABLE[0x66] = 0x0c; // f
ESCAPE_TABLE[0x6e] = 0x0a; // n
ESCAPE_TABLE[0x72] = 0x0d; // r
ESCAPE_TABLE[0x74] = 0x09; // t

export const Err_Eof = "Unexpected end of input.";
const Err_BadEscape = "Invalid escape sequence";
const Err_BadHexDigit = "Invalid hex digit";
const Err_OpenFile = "Cannot open file.";
const Err_ReadFile = "Cannot read file.";
const Err_SetBuffer = "Cannot set buffer.";

export type JsonProgressCallback = (percent: number) => void;

/**
 * The JSON source, a file read in chunks or an in-memory buffer.
 */
export interface JsonInput {
  /** the byte count of the source, once opened */
  get size(): number;
  /** absolute count of consumed bytes */
  get position(): number;
  /** true once the source signaled its end */
  get isEOF(): boolean;

  openFile(path: string): void;
  setBuffer(buffer: Uint8Array): void;
  /** Closes the file and drops the chunk */
  release(): void;

  /**
   * Returns the next byte.
   * Unless `verbatim`, spaces, line breaks, tabs, ':', ',' and NUL are skipped.
   */
  nextChar(verbatim?: boolean): JsonChar;
  currentChar(): JsonChar;
  /** Pushes back the current character; the next `nextChar` returns it again */
  previous(): void;
  seekToNextQuote(): void;
  /** Decodes the escape sequence after a backslash into `text` */
  readEscapeSequence(text: TextValue): void;

  /** Reports file read progress every `step` percent; a step of 0 disables it */
  setProgress(step: number, callback?: JsonProgressCallback): void;
  endProgress(): void;
}

export const createJsonInput = (converter: TextConverter, chunkSize = FILE_CHUNK_SIZE): JsonInput => {
  let _chunk: Uint8Array = new Uint8Array(0);
  let _len = 0;
  let _idx = -1;
  let _position = 0;
  let _size = 0;
  let _current: JsonChar = EOF;
  let _replay = false;
  let _ended = false;
  let _fd: number | undefined;

  let _progressStep = 0;
  let _progressCallback: JsonProgressCallback | undefined;
  let _nextMark = Infinity;

  const _scheduleProgress = (percent: number) => {
    const next = (Math.floor(percent / _progressStep) + 1) * _progressStep;
    _nextMark = next >= 100 ? Infinity : Math.ceil((next * _size) / 100);
  };
  const _reportProgress = () => {
    const percent = Math.floor((_position * 100) / _size);
    // 100 is left to endProgress, which only runs on success
    if (percent >= 100) {
      _nextMark = Infinity;
      return;
    }
    _scheduleProgress(percent);
    _progressCallback?.(percent);
  };

  const _fill = () => {
    _idx = 0;
    _len = 0;
    if (_ended) throw new JsonSyntaxError(Err_Eof, EOF);
    if (_fd !== undefined) {
      try {
        _len = fs.readSync(_fd, _chunk, 0, _chunk.length, null);
      } catch (e) {
        throw new JsonInputError(`${Err_ReadFile} ${e instanceof Error ? e.message : String(e)}`);
      }
    }
  };

  const _hex = (c: JsonChar) => {
    if (c >= 0x30 && c <= 0x39) return c - 0x30;
    if (c >= 0x61 && c <= 0x66) return c - 0x61 + 10;
    if (c >= 0x41 && c <= 0x46) return c - 0x41 + 10;
    if (c === EOF) throw new JsonSyntaxError(Err_Eof, EOF);
    throw new JsonSyntaxError(Err_BadHexDigit, c);
  };
  const _readHex4 = () => {
    let unit = 0;
    for (let i = 0; i < 4; ++i) unit = (unit << 4) | _hex(input.nextChar(true));
    return unit;
  };
  const _appendCodePoint = (text: TextValue, codePoint: number) => {
    const utf8 = converter.codePointToUtf8(codePoint);
    textAppend(text, utf8);
    if (codePoint > 0x7f) text.isAscii = false;
  };

  const _readUnicode = (text: TextValue): void => {
    let unit = _readHex4();
    while (isHighSurrogate(unit)) {
      const c = input.nextChar(true);
      if (c !== BACKSLASH) {
        _appendCodePoint(text, REPLACEMENT_CHARACTER);
        input.previous();
        return;
      }
      const c2 = input.nextChar(true);
      if (c2 !== LETTER_U) {
        _appendCodePoint(text, REPLACEMENT_CHARACTER);
        return _readEscape(text, c2);
      }
      const low = _readHex4();
      if (isLowSurrogate(low)) return _appendCodePoint(text, 0x10000 + ((unit - 0xd800) << 10) + (low - 0xdc00));
      _appendCodePoint(text, REPLACEMENT_CHARACTER);
      unit = low;
    }
    _appendCodePoint(text, isLowSurrogate(unit) ? REPLACEMENT_CHARACTER : unit);
  };
  const _readEscape = (text: TextValue, c: JsonChar): void => {
    if (c === LETTER_U) return _readUnicode(text);
    if (c === EOF) throw new JsonSyntaxError(Err_Eof, EOF);
    const byte = ESCAPE_TABLE[c];
    if (byte === undefined) throw new JsonSyntaxError(Err_BadEscape, c);
    textPush(text, byte);
  };

  const input: JsonInput = {
    get size() {
      return _size;
    },
    get position() {
      return _position;
    },
    get isEOF() {
      return _ended;
    },

    openFile(path: string) {
      try {
        _fd = fs.openSync(path, "r");
        _size = fs.fstatSync(_fd).size;
      } catch (e) {
        if (_fd !== undefined) fs.closeSync(_fd);
        _fd = undefined;
        throw new JsonInputError(Err_OpenFile);
      }
      _chunk = Buffer.allocUnsafe(chunkSize);
      _len = 0;
      _idx = -1;
      if (_progressStep > 0) _scheduleProgress(0);
    },
    setBuffer(buffer: Uint8Array) {
      if (!(buffer instanceof Uint8Array)) throw new JsonInputError(Err_SetBuffer);
      _chunk = buffer;
      _len = _size = buffer.length;
      _idx = -1;
    },
    release() {
      if (_fd !== undefined) {
        const fd = _fd;
        _fd = undefined;
        fs.closeSync(fd);
      }
      _chunk = new Uint8Array(0);
      _len = _size = _position = 0;
      _idx = -1;
      _current = EOF;
      _replay = _ended = false;
      _progressStep = 0;
      _progressCallback = undefined;
      _nextMark = Infinity;
    },

    nextChar(verbatim = false) {
      let c: JsonChar;
      do {
        if (_replay) {
          _replay = false;
          c = _current;
        } else {
          if (++_idx >= _len) {
            _fill();
            if (_len === 0) {
              _ended = true;
              return (_current = EOF);
            }
          }
          c = _current = _chunk[_idx];
          if (++_position >= _nextMark) _reportProgress();
        }
      } while (!verbatim && isSkippable(c));
      return c;
    },
    currentChar() {
      return _current;
    },
    previous() {
      _replay = true;
    },
    seekToNextQuote() {
      while (_current !== QUOTE) if (input.nextChar(true) === EOF) throw new JsonSyntaxError(Err_Eof, EOF);
    },
    readEscapeSequence(text: TextValue) {
      _readEscape(text, input.nextChar(true));
    },

    setProgress(step: number, callback?: JsonProgressCallback) {
      _progressStep = callback ? step : 0;
      _progressCallback = callback;
      _nextMark = Infinity;
    },
    endProgress() {
      if (_progressStep > 0 && _fd !== undefined) _progressCallback?.(100);
    },
  };
  return input;
};
