export * from "./base";
export { JsonReaderOption, resolveReaderOption } from "./config";
export { logger } from "./logger";
export { TextConverter, createTextConverter, environmentLocale, resolveLocaleCharset } from "./parser/encoding";
export { FILE_CHUNK_SIZE, JsonInput, JsonProgressCallback, createJsonInput } from "./parser/input";
export {
  JsonCallback,
  JsonElement,
  JsonNarrowCallback,
  JsonPublisher,
  JsonValueCallback,
  JsonVoidCallback,
  JsonWideCallback,
  createJsonPublisher,
  narrow,
  wide,
} from "./parser/publisher";
export { JsonReader, createJsonReader } from "./parser/reader";
export { CAPACITY_DEFAULT, RESIZE_FACTOR, TextValue, createTextValue } from "./parser/text";
