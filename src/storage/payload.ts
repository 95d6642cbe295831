import { z } from "zod";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type Metadata = Record<string, unknown>;

/** Version tag written into every stored metadata bag. */
export const PAYLOAD_VERSION = 1;
const VERSION_KEY = "payloadVersion";

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const MetadataSchema = z.record(z.unknown());

export function encodeValue(value: JsonValue): string {
  return JSON.stringify(value);
}

export function decodeValue(raw: string): JsonValue {
  // Rows written by other tools may hold plain text rather than JSON.
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }
  const result = JsonValueSchema.safeParse(parsed);
  return result.success ? result.data : raw;
}

export function encodeMetadata(metadata: Metadata | undefined): string {
  return JSON.stringify({ ...(metadata ?? {}), [VERSION_KEY]: PAYLOAD_VERSION });
}

export function decodeMetadata(raw: string | null): Metadata {
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  const result = MetadataSchema.safeParse(parsed);
  if (!result.success) return {};
  const { [VERSION_KEY]: _version, ...rest } = result.data;
  return rest;
}
