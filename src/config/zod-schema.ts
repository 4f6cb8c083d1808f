import { z } from "zod";
import { ALLOWED_LOG_LEVELS } from "../logging/levels.js";

const LoggingLevelSchema = z.enum(ALLOWED_LOG_LEVELS);

export const OutputFormatSchema = z.union([z.literal("text"), z.literal("json")]);

export const GridcheckSchema = z
  .object({
    logging: z
      .object({
        level: LoggingLevelSchema.optional(),
        file: z.string().min(1).optional(),
        maxFileBytes: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    output: z
      .object({
        format: OutputFormatSchema.optional(),
        color: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
