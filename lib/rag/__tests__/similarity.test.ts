import { describe, expect, it } from "vitest";
import { cosine, dot, norm, normalize } from "../similarity";

describe("vector math", () => {
  it("computes dot products and norms", () => {
    expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(norm([3, 4])).toBe(5);
  });

  it("normalizes to unit length", () => {
    expect(normalize([3, 4])).toEqual([0.6, 0.8]);
  });

  it("leaves a zero vector unchanged", () => {
    const zero = [0, 0, 0];
    const out = normalize(zero);
    expect(out).toEqual([0, 0, 0]);
    expect(out).not.toBe(zero);
  });

  it("scores cosine similarity and treats zero vectors as unrelated", () => {
    expect(cosine([1, 0], [2, 0])).toBe(1);
    expect(cosine([1, 0], [0, 5])).toBe(0);
    expect(cosine([1, 0], [-1, 0])).toBe(-1);
    expect(cosine([0, 0], [1, 1])).toBe(0);
  });
});
