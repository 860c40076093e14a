import { describe, it, expect, vi, afterEach } from "vitest";
import { colorize, printLines, printOrder } from "../src/lib/render.js";

function captureLog(): string[] {
  const lines: string[] = [];
  vi.spyOn(console, "log").mockImplementation((...parts: unknown[]) => {
    lines.push(parts.map(String).join(" "));
  });
  return lines;
}

describe("render", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("printOrder", () => {
    it("should print the order as a number", () => {
      const lines = captureLog();
      printOrder(7);
      printOrder(7, { quiet: true });
      expect(lines).toEqual(["7", "7"]);
    });

    it("should print none without an order unless quiet", () => {
      const lines = captureLog();
      printOrder(undefined, { quiet: false });
      printOrder(undefined, { quiet: true });
      expect(lines).toEqual(["none"]);
    });

    it("should print compact JSON, null for no order", () => {
      const lines = captureLog();
      printOrder(3, { json: true });
      printOrder(undefined, { json: true, quiet: true });
      expect(lines).toEqual(['{"order":3}', '{"order":null}']);
    });
  });

  it("should print one line per entry", () => {
    const lines = captureLog();
    printLines(["a.cs", "b/c.cs"]);
    expect(lines).toEqual(["a.cs", "b/c.cs"]);
  });

  describe("colorize", () => {
    it("should leave text alone off a TTY", () => {
      const stream = Object.assign(Object.create(process.stdout), { isTTY: false });
      expect(colorize("none", "yellow", stream)).toBe("none");
    });

    it("should wrap text in ANSI codes on a TTY", () => {
      const stream = Object.assign(Object.create(process.stdout), { isTTY: true });
      expect(colorize("boom", "red", stream)).toBe("\x1b[31mboom\x1b[0m");
    });
  });
});
