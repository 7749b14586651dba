export const CAPACITY_DEFAULT = 1024;
export const RESIZE_FACTOR = 1.2;

/**
 * Growable UTF-8 string.
 *
 * `bytes.length` is the capacity; the byte at `length` is always 0.
 */
export type TextValue = {
  bytes: Buffer;
  length: number;
  /** every byte is <= 0x7F */
  isAscii: boolean;
  /** the JSON source wrapped the value in double quotes */
  isQuoted: boolean;
  /** narrow delivery uses the locale charset */
  useLocale: boolean;
};

export const createTextValue = (capacity = CAPACITY_DEFAULT): TextValue => ({
  bytes: Buffer.alloc(Math.max(capacity, 1)),
  length: 0,
  isAscii: true,
  isQuoted: false,
  useLocale: false,
});

/** Makes room for `needed` bytes plus the terminator. Never shrinks. */
export const textReserve = (text: TextValue, needed: number) => {
  let capacity = text.bytes.length;
  if (needed < capacity) return;
  while (capacity <= needed) capacity = Math.ceil(capacity * RESIZE_FACTOR);
  const bytes = Buffer.alloc(capacity);
  text.bytes.copy(bytes, 0, 0, text.length);
  text.bytes = bytes;
};

export const textSetLength = (text: TextValue, length: number) => {
  textReserve(text, length);
  text.length = length;
  text.bytes[length] = 0;
};

export const textPush = (text: TextValue, byte: number) => {
  textReserve(text, text.length + 1);
  text.bytes[text.length++] = byte;
  text.bytes[text.length] = 0;
  if (byte > 0x7f) text.isAscii = false;
};

/** Appends raw bytes at `length` without touching the flags */
export const textAppend = (text: TextValue, src: Uint8Array, start = 0, end = src.length) => {
  const n = end - start;
  textReserve(text, text.length + n);
  text.bytes.set(src.subarray(start, end), text.length);
  text.length += n;
  text.bytes[text.length] = 0;
};

export const textCopy = (text: TextValue, src: Uint8Array, start = 0, end = src.length, checkEncoding = false) => {
  text.length = 0;
  textAppend(text, src, start, end);
  text.isAscii = true;
  if (checkEncoding)
    for (let i = start; i < end; ++i)
      if (src[i] > 0x7f) {
        text.isAscii = false;
        break;
      }
  text.isQuoted = false;
};

export const textClear = (text: TextValue) => {
  text.length = 0;
  text.bytes[0] = 0;
  text.isAscii = true;
  text.isQuoted = false;
};

/** Drops the grown storage */
export const textRelease = (text: TextValue, capacity = CAPACITY_DEFAULT) => {
  if (text.bytes.length !== capacity) text.bytes = Buffer.alloc(Math.max(capacity, 1));
  textClear(text);
};

/** A view of the content; only valid until the text changes */
export const textView = (text: TextValue) => text.bytes.subarray(0, text.length);
