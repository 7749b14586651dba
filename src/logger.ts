import pino from "pino";
import { environmentConfig } from "./config";

export const logger = pino({
  name: "json-event-reader",
  level: environmentConfig().logLevel,
});

export default logger;
