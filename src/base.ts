export const EOF = -1;

/** A byte read from the input, or `EOF` */
export type JsonChar = number;

export type JsonEventKind = "objectBegin" | "objectEnd" | "arrayBegin" | "arrayEnd" | "arrayItem" | "pair";

const formatChar = (c: JsonChar) => {
  if (c === EOF) return "EOF";
  if (c >= 0x20 && c < 0x7f) return `'${String.fromCharCode(c)}'`;
  return `0x${c.toString(16).toUpperCase().padStart(2, "0")}`;
};

export class JsonReaderError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = "JsonReaderError";
  }
}

/** Structural or lexical defect of the input */
export class JsonSyntaxError extends JsonReaderError {
  character: JsonChar;

  constructor(baseMsg: string, character: JsonChar) {
    super(character === EOF ? baseMsg : `${baseMsg} ${formatChar(character)}.`);
    this.name = "JsonSyntaxError";
    this.character = character;
  }
}

/** The source cannot be opened, read or set */
export class JsonInputError extends JsonReaderError {
  constructor(msg: string) {
    super(msg);
    this.name = "JsonInputError";
  }
}

export class JsonConfigError extends JsonReaderError {
  constructor(msg: string) {
    super(msg);
    this.name = "JsonConfigError";
  }
}

export class JsonLocaleError extends JsonConfigError {
  locale: string;

  constructor(locale: string) {
    super(`Locale '${locale}' not found.`);
    this.name = "JsonLocaleError";
    this.locale = locale;
  }
}

/** Raised when the caller cancels a read; not a defect of the data */
export class JsonCancelError extends JsonReaderError {
  constructor() {
    super("Read cancelled.");
    this.name = "JsonCancelError";
  }
}
