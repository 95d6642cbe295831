import { z } from "zod";

import { ValidationError } from "../../../errors.js";
import type { LongTermMemoryType, ShortTermMemoryType } from "../../../memory/types.js";

const LongTermTypeSchema = z.enum(["fact", "preference", "skill", "other"]);
const ShortTermTypeSchema = z.enum(["context", "event", "state", "other"]);

export function parseLongTermType(value: string | undefined): LongTermMemoryType | undefined {
  return parseEnum(LongTermTypeSchema, value);
}

export function parseShortTermType(value: string | undefined): ShortTermMemoryType | undefined {
  return parseEnum(ShortTermTypeSchema, value);
}

function parseEnum<T extends [string, ...string[]]>(
  schema: z.ZodEnum<T>,
  value: string | undefined,
): T[number] | undefined {
  if (value === undefined) return undefined;
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Unknown memory type: ${value} (expected ${schema.options.join(", ")})`, {
      memoryType: value,
    });
  }
  return result.data;
}
