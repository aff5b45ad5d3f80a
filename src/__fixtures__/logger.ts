import pino from "pino";
import { z } from "zod";
import type { Logger } from "../utils/logger.js";

const recordSchema = z
  .object({
    level: z.number(),
    msg: z.string().optional(),
  })
  .passthrough();

export type LogRecord = z.infer<typeof recordSchema>;

export const LEVEL = { trace: 10, debug: 20, info: 30, warn: 40, error: 50, fatal: 60 } as const;

/** A pino logger writing parsed records into memory */
export function captureLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = pino(
    { level: "trace" },
    {
      write(line: string) {
        records.push(recordSchema.parse(JSON.parse(line)));
      },
    },
  );
  return { logger, records };
}

export function messagesAt(records: LogRecord[], level: number): Array<string | undefined> {
  return records.filter((record) => record.level === level).map((record) => record.msg);
}
