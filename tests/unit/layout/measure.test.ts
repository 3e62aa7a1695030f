import { describe, expect, it } from "vitest";
import { estimateNodeSize, labelLines } from "../../../src/layout/measure.js";

describe("labelLines", () => {
  it("splits on line breaks and decodes entities", () => {
    expect(labelLines("One<br/>Two &amp; Three")).toEqual(["One", "Two & Three"]);
  });

  it("falls back to a placeholder line for empty labels", () => {
    expect(labelLines("")).toEqual(["X"]);
  });
});

describe("estimateNodeSize", () => {
  it("keeps the default size for short labels", () => {
    expect(estimateNodeSize("A", 120, 60)).toEqual({ width: 120, height: 60 });
  });

  it("grows with the longest line and the line count, up to a cap", () => {
    expect(estimateNodeSize("Longer label node", 120, 60)).toEqual({ width: 156, height: 60 });
    expect(estimateNodeSize("x".repeat(40), 120, 60).width).toBe(280);
    expect(estimateNodeSize("a<br>b<br>c", 120, 60).height).toBe(82);
  });
});
