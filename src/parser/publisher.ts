import type { Logger } from "pino";
import { TextConverter, textToNarrow, textToWide } from "./encoding";
import { TextValue, createTextValue, textCopy } from "./text";

/**
 * # Callback shapes
 * - `none`: structural events (object/array begin and end), no argument
 * - `narrow`: the value as bytes, UTF-8 or in the locale charset when locale mode is on
 * - `wide`: the value as a string
 *
 * Value callbacks receive `null` for a JSON `null`, an object or an array.
 */
export type JsonVoidCallback = { shape: "none"; fn: () => void };
export type JsonNarrowCallback = { shape: "narrow"; fn: (value: Buffer | null) => void };
export type JsonWideCallback = { shape: "wide"; fn: (value: string | null) => void };
export type JsonValueCallback = JsonNarrowCallback | JsonWideCallback;
export type JsonCallback = JsonVoidCallback | JsonValueCallback;

export const narrow = (fn: (value: Buffer | null) => void): JsonNarrowCallback => ({ shape: "narrow", fn });
export const wide = (fn: (value: string | null) => void): JsonWideCallback => ({ shape: "wide", fn });

/** An element's name or path, as a string or UTF-8 bytes; `null` stands for all elements */
export type JsonElement = string | Uint8Array | null;

/* keys compare byte by byte, so they are kept as one char per UTF-8 byte */
const toKey = (element: string | Uint8Array) =>
  (typeof element === "string" ? Buffer.from(element, "utf8") : Buffer.from(element)).toString("latin1");
const isPathKey = (key: string) => key.includes("{") || key.includes("[");

/**
 * Subscribers of one event kind, looked up by element name, by path, or for all elements.
 */
export interface JsonPublisher {
  subscribe(element: JsonElement, callback: JsonCallback): void;
  unsubscribe(): void;
  /**
   * Calls the callbacks of the element whose name is `path[namePos, namePos + nameLen)` and whose path is
   * `path[0, pathLen)`: the one subscribed by name, then by path, then the one for all elements.
   */
  notify(path: TextValue, namePos: number, nameLen: number, pathLen: number, value: TextValue | null): void;
  /** Copies the name of the element being notified */
  getCurrentElementName(dest: TextValue): void;
}

export const createJsonPublisher = (converter: TextConverter, logger?: Logger): JsonPublisher => {
  const _byName = new Map<string, JsonCallback>();
  const _byPath = new Map<string, JsonCallback>();
  let _all: JsonCallback | undefined;

  let _path: TextValue = createTextValue(1);
  let _namePos = 0;
  let _nameLen = 0;

  const _unconvertible = () => {
    logger?.warn(
      { charset: converter.charset, path: _path.bytes.toString("utf8", 0, _path.length) },
      "value cannot be converted",
    );
    return null;
  };
  const _invoke = (callback: JsonCallback, value: TextValue | null) => {
    if (callback.shape === "none") return callback.fn();
    if (value === null) return callback.fn(null);
    if (callback.shape === "narrow") {
      const bytes = textToNarrow(value, converter);
      return callback.fn(bytes === undefined ? _unconvertible() : Buffer.from(bytes));
    }
    const str = textToWide(value, converter);
    callback.fn(str === undefined ? _unconvertible() : str);
  };

  return {
    subscribe(element: JsonElement, callback: JsonCallback) {
      if (element === null) {
        _all = callback;
        return;
      }
      const key = toKey(element);
      (isPathKey(key) ? _byPath : _byName).set(key, callback);
    },
    unsubscribe() {
      _byName.clear();
      _byPath.clear();
      _all = undefined;
    },

    notify(path: TextValue, namePos: number, nameLen: number, pathLen: number, value: TextValue | null) {
      _path = path;
      _namePos = namePos;
      _nameLen = nameLen;

      if (_byName.size !== 0) {
        const callback = _byName.get(path.bytes.toString("latin1", namePos, namePos + nameLen));
        if (callback) _invoke(callback, value);
      }
      if (pathLen > 0 && _byPath.size !== 0) {
        const callback = _byPath.get(path.bytes.toString("latin1", 0, pathLen));
        if (callback) _invoke(callback, value);
      }
      if (_all) _invoke(_all, value);
    },
    getCurrentElementName(dest: TextValue) {
      textCopy(dest, _path.bytes, _namePos, _namePos + _nameLen, true);
    },
  };
};
