import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";

import { OutputFormatter } from "../../../src/cli/output-formatter.js";

describe("OutputFormatter", () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it("prints aligned tables", () => {
    const out = new OutputFormatter({ noColor: true });

    out.table(
      [
        { key: "pets", uses: 12 },
        { key: "favorite_color", uses: 3 },
      ],
      [
        { key: "key", header: "Key" },
        { key: "uses", header: "Uses", align: "right" },
      ],
    );

    expect(logSpy.mock.calls.map((call) => call[0])).toEqual([
      "Key             Uses",
      "--------------  ----",
      "pets              12",
      "favorite_color     3",
    ]);
  });

  it("truncates cells to a fixed column width", () => {
    const out = new OutputFormatter({ noColor: true });
    out.table([{ value: "abcdefgh" }], [{ key: "value", header: "Val", width: 4 }]);
    expect(logSpy.mock.calls.map((call) => call[0])).toEqual(["Val ", "----", "abcd"]);
  });

  it("stays silent in quiet mode except for JSON", () => {
    const out = new OutputFormatter({ quiet: true, noColor: true });

    out.header("Sessions");
    out.keyValue("User", "u-1");
    out.table([{ a: 1 }], [{ key: "a", header: "A" }]);
    out.json({ ok: true });

    expect(logSpy.mock.calls).toEqual([['{\n  "ok": true\n}']]);
  });

  it("renders missing timestamps as never", () => {
    const out = new OutputFormatter({ noColor: true });
    expect(out.formatTime(null)).toBe("never");
    expect(out.formatTime(0)).toBe("1970-01-01T00:00:00.000Z");
  });
});
