import { describe, it, expect } from "vitest";
import { MarkerError } from "../../errors.js";
import { applyMarkedBlock, splitLines, DEFAULT_MARKERS, type MarkerPair } from "../marked-block.js";

const markers: MarkerPair = { begin: "BEGIN", end: "END" };

function countLines(content: string, marker: string): number {
  return content.split("\n").filter((l) => l.includes(marker)).length;
}

describe("splitLines", () => {
  it("keeps line terminators", () => {
    expect(splitLines("a\nb\n")).toEqual(["a\n", "b\n"]);
  });

  it("keeps a final unterminated line", () => {
    expect(splitLines("a\nb")).toEqual(["a\n", "b"]);
  });

  it("returns no lines for empty input", () => {
    expect(splitLines("")).toEqual([]);
  });

  it("keeps blank lines", () => {
    expect(splitLines("\n\nx\n")).toEqual(["\n", "\n", "x\n"]);
  });
});

describe("applyMarkedBlock", () => {
  it("replaces the body of an existing section", () => {
    const out = applyMarkedBlock("a\nBEGIN\nold\nEND\nb\n", "new", { markers });
    expect(out).toBe("a\nBEGIN\nnew\nEND\nb\n");
  });

  it("appends a section when none exists", () => {
    const out = applyMarkedBlock("a\nb\n", "new", { markers });
    expect(out).toBe("a\nb\nBEGIN\nnew\nEND\n");
  });

  it("creates a bare section from empty input", () => {
    expect(applyMarkedBlock("", "new", { markers })).toBe("BEGIN\nnew\nEND\n");
  });

  it("starts the section on its own line when input lacks a final newline", () => {
    expect(applyMarkedBlock("a\nb", "new", { markers })).toBe("a\nb\nBEGIN\nnew\nEND\n");
  });

  it("does not double a trailing newline already in the block", () => {
    expect(applyMarkedBlock("", "x\ny\n", { markers })).toBe("BEGIN\nx\ny\nEND\n");
  });

  it("replaces a multi-line body and keeps surrounding content in order", () => {
    const input = "one\ntwo\nBEGIN\nl1\nl2\nl3\nEND\nthree\nfour\n";
    const out = applyMarkedBlock(input, "fresh", { markers });
    expect(out).toBe("one\ntwo\nBEGIN\nfresh\nEND\nthree\nfour\n");
  });

  it("handles an empty existing section", () => {
    expect(applyMarkedBlock("BEGIN\nEND\n", "body", { markers })).toBe("BEGIN\nbody\nEND\n");
  });

  it("keeps marker lines verbatim, including surrounding text", () => {
    const out = applyMarkedBlock("# BEGIN here\nold\n# END here\n", "new", { markers });
    expect(out).toBe("# BEGIN here\nnew\n# END here\n");
  });

  it("keeps an end marker at end of input without adding a newline", () => {
    expect(applyMarkedBlock("BEGIN\nold\nEND", "new", { markers })).toBe("BEGIN\nnew\nEND");
  });

  it("is idempotent", () => {
    const inputs = ["", "a\nb\n", "a\nBEGIN\nold\nEND\nb\n", "tail without newline"];
    for (const input of inputs) {
      const once = applyMarkedBlock(input, "body\nmore", { markers });
      const twice = applyMarkedBlock(once, "body\nmore", { markers });
      expect(twice).toBe(once);
      expect(countLines(twice, "BEGIN")).toBe(1);
      expect(countLines(twice, "END")).toBe(1);
    }
  });

  it("uses the default markers when none are given", () => {
    const out = applyMarkedBlock("keep\n", "generated");
    expect(out).toBe(`keep\n${DEFAULT_MARKERS.begin}\ngenerated\n${DEFAULT_MARKERS.end}\n`);
  });

  describe("malformed markers", () => {
    it("rejects a section that is never closed", () => {
      expect(() => applyMarkedBlock("a\nBEGIN\nold\n", "new", { markers })).toThrow(MarkerError);
      expect(() => applyMarkedBlock("a\nBEGIN\nold\n", "new", { markers, source: "f.txt" })).toThrow(
        "f.txt:2: generated section is never closed",
      );
    });

    it("rejects a begin marker inside an open section", () => {
      expect(() => applyMarkedBlock("BEGIN\nBEGIN\nEND\n", "new", { markers, source: "f" })).toThrow(
        "f:2: begin marker inside the section opened at line 1",
      );
    });

    it("rejects an end marker without a begin marker", () => {
      expect(() => applyMarkedBlock("a\nEND\n", "new", { markers, source: "f" })).toThrow(
        "f:2: end marker without a matching begin marker",
      );
    });

    it("rejects a second complete section", () => {
      const input = "BEGIN\nx\nEND\nmid\nBEGIN\ny\nEND\n";
      expect(() => applyMarkedBlock(input, "new", { markers, source: "f" })).toThrow(
        "f:5: second generated section found (first one opened at line 1)",
      );
    });

    it("rejects a replacement block that contains a marker", () => {
      expect(() => applyMarkedBlock("a\n", "# keep BEGIN style lines\nx", { markers, source: "f" })).toThrow(
        "replacement block for f contains a marker at line 1",
      );
      expect(() => applyMarkedBlock("a\n", "x\nEND", { markers })).toThrow(MarkerError);
    });

    it("rejects a block with a default marker before touching existing content", () => {
      const input = `a\n${DEFAULT_MARKERS.begin}\nold\n${DEFAULT_MARKERS.end}\n`;
      expect(() => applyMarkedBlock(input, `x\n${DEFAULT_MARKERS.begin}\n`)).toThrow(
        "replacement block for input contains a marker at line 2",
      );
    });

    it("reports the offending line", () => {
      let caught: unknown;
      try {
        applyMarkedBlock("a\nb\nEND\n", "new", { markers });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(MarkerError);
      expect(caught).toMatchObject({ line: 3 });
    });
  });
});
