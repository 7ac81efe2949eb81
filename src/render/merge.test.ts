import { describe, expect, it } from "vitest";
import { frame } from "./frame.js";
import { mergeBoxes } from "./merge.js";

describe("mergeBoxes", () => {
  const short = frame("a");
  const tall = frame(["b", "c"]);

  it("joins rows with a gutter and fills the shorter box", () => {
    expect(mergeBoxes(short, tall)).toBe("┌─┐  ┌─┐\n│a│  │b│\n└─┘  │c│\n     └─┘");
  });

  it("fills the addition when it is shorter", () => {
    expect(mergeBoxes(tall, short)).toBe("┌─┐  ┌─┐\n│b│  │a│\n│c│  └─┘\n└─┘     ");
  });

  it("keeps the taller line count and the combined width", () => {
    const wide = frame("wider content", { padding: 1 });
    const merged = mergeBoxes(wide, tall).split("\n");

    expect(merged).toHaveLength(5);
    for (const line of merged) {
      expect(Array.from(line)).toHaveLength(17 + 2 + 3);
    }
  });

  it("merges merged output again", () => {
    const twice = mergeBoxes(mergeBoxes(short, short), short);
    expect(twice.split("\n")[1]).toBe("│a│  │a│  │a│");
  });
});
