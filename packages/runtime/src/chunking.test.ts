import { describe, it, expect } from "vitest";
import { chunkText } from "./chunking.js";

describe("chunkText", () => {
  it("breaks after spaces when one is close enough", () => {
    expect(chunkText("the quick brown fox jumps", 10)).toEqual(["the quick ", "brown fox ", "jumps"]);
  });

  it("cuts hard when there is no space", () => {
    expect(chunkText("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("always reassembles to the input", () => {
    const text = "Tomorrow in Paris: Partly cloudy, 18°C (high 20°C, low 15°C).";
    const chunks = chunkText(text);
    expect(chunks).toEqual(["Tomorrow in Paris: Partly cloudy, 18°C (high ", "20°C, low 15°C)."]);
    expect(chunks.join("")).toBe(text);
  });

  it("returns nothing for empty text", () => {
    expect(chunkText("")).toEqual([]);
  });

  it("rejects a size below 1", () => {
    expect(() => chunkText("abc", 0)).toThrow(RangeError);
  });
});
