import { describe, expect, it } from "vitest";

import {
  decodeMetadata,
  decodeValue,
  encodeMetadata,
  encodeValue,
  PAYLOAD_VERSION,
} from "../../../src/storage/payload.js";

describe("payload encoding", () => {
  it("stores values as JSON text", () => {
    expect(encodeValue({ topic: "hiking", days: [1, 2] })).toBe('{"topic":"hiking","days":[1,2]}');
    expect(decodeValue('{"topic":"hiking","days":[1,2]}')).toEqual({ topic: "hiking", days: [1, 2] });
    expect(decodeValue('"plain"')).toBe("plain");
    expect(decodeValue("null")).toBeNull();
  });

  it("falls back to the raw text when a stored value is not JSON", () => {
    expect(decodeValue("written by hand")).toBe("written by hand");
  });

  it("tags metadata with the payload version and strips it on read", () => {
    const encoded = encodeMetadata({ source: "cli" });
    expect(JSON.parse(encoded)).toEqual({ source: "cli", payloadVersion: PAYLOAD_VERSION });
    expect(decodeMetadata(encoded)).toEqual({ source: "cli" });
  });

  it("encodes missing metadata as an empty bag", () => {
    expect(decodeMetadata(encodeMetadata(undefined))).toEqual({});
  });

  it("reads null, broken or non-object metadata as empty", () => {
    expect(decodeMetadata(null)).toEqual({});
    expect(decodeMetadata("{not json")).toEqual({});
    expect(decodeMetadata("[1,2]")).toEqual({});
  });
});
