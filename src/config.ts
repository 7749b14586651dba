import type { Logger } from "pino";
import { z } from "zod";
import { JsonConfigError } from "./base";
import { FILE_CHUNK_SIZE } from "./parser/input";
import { CAPACITY_DEFAULT } from "./parser/text";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const readerOptionSchema = z
  .object({
    /** bytes read from a file per refill */
    chunkSize: z.number().int().positive().default(FILE_CHUNK_SIZE),
    /** initial capacity of the name, value and path buffers */
    initialCapacity: z.number().int().positive().default(CAPACITY_DEFAULT),
    /** enables locale delivery of narrow strings with this locale */
    locale: z.string().optional(),
  })
  .strict();

const progressStepSchema = z.number().int().min(0).max(100);

const environmentSchema = z.object({
  JSON_READER_LOG_LEVEL: z.enum(LOG_LEVELS).catch("silent"),
});

export type JsonReaderOption = z.input<typeof readerOptionSchema> & {
  /** parent of the reader's logger; defaults to the package logger */
  logger?: Logger;
};
export type JsonReaderConfig = z.output<typeof readerOptionSchema> & { logger?: Logger };

const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join(".") || "option"}: ${issue.message}`).join("; ");

export const resolveReaderOption = (option: JsonReaderOption = {}): JsonReaderConfig => {
  const { logger, ...rest } = option;
  const result = readerOptionSchema.safeParse(rest);
  if (!result.success) throw new JsonConfigError(`Invalid reader option - ${formatIssues(result.error)}`);
  return { ...result.data, logger };
};

export const checkProgressStep = (step: number) => {
  const result = progressStepSchema.safeParse(step);
  if (!result.success) throw new JsonConfigError(`Invalid progress step - ${formatIssues(result.error)}`);
  return result.data;
};

export const environmentConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const parsed = environmentSchema.parse(env);
  return { logLevel: parsed.JSON_READER_LOG_LEVEL };
};
