import { describe, expect, it } from "vitest";
import { promoteTo3d, toCartesian, toPolar } from "../index.js";

const PRECISION = 9;

function expectClose(actual: ArrayLike<number>, expected: number[]): void {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((value, i) => {
    expect(actual[i]).toBeCloseTo(value, PRECISION);
  });
}

describe("toCartesian", () => {
  it("maps the zero vector to the origin", () => {
    expect(toCartesian([0, 0])).toEqual([0, 0]);
  });

  it("converts a 2D polar vector", () => {
    expectClose(toCartesian([Math.SQRT2, 45]), [1, 1]);
    expectClose(toCartesian([2, 90]), [0, 2]);
    expectClose(toCartesian([3, 180]), [-3, 0]);
  });

  it("reads (r, azimuth, inclination) in the math convention", () => {
    expectClose(toCartesian([2, 90, 0]), [0, 0, 2]);
    expectClose(toCartesian([2, 90, 90]), [0, 2, 0]);
  });

  it("reads (r, inclination, azimuth) in the physics convention", () => {
    expectClose(toCartesian([2, 90, 0], true), [2, 0, 0]);
    expectClose(toCartesian([2, 0, 90], true), [0, 0, 2]);
  });

  it("ignores the convention flag for 2D vectors", () => {
    expectClose(toCartesian([2, 90], true), [0, 2]);
  });

  it("returns an empty vector for invalid input", () => {
    expect(toCartesian([1, 2, 3, 4, 5])).toEqual([]);
    expect(toCartesian("ab")).toEqual([]);
    expect(toCartesian(undefined)).toEqual([]);
  });

  it("does not mutate its input", () => {
    const input = [1, 30];
    const result = toCartesian(input);
    expect(input).toEqual([1, 30]);
    expect(result).not.toBe(input);
  });
});

describe("toPolar", () => {
  it("gives (sqrt(2), 45) for (1, 1)", () => {
    expect(toPolar([1, 1])).toEqual([Math.SQRT2, expect.closeTo(45, PRECISION)]);
  });

  it("puts the origin at -90 degrees", () => {
    expect(toPolar([0, 0])).toEqual([0, -90]);
  });

  it("handles points on the y-axis", () => {
    expect(toPolar([0, 5])).toEqual([5, 90]);
    expect(toPolar([0, -3])).toEqual([3, -90]);
  });

  it("keeps angles within [-90, 90]", () => {
    expect(toPolar([-1, 1])).toEqual([Math.SQRT2, expect.closeTo(-45, PRECISION)]);
  });

  it("returns (r, azimuth, inclination) in the math convention", () => {
    expectClose(toPolar([1, 0, 1]), [Math.SQRT2, 0, 45]);
  });

  it("returns (r, inclination, azimuth) in the physics convention", () => {
    expectClose(toPolar([1, 0, 1], true), [Math.SQRT2, 45, 0]);
  });

  it("gives a zero inclination on the z-axis", () => {
    expect(toPolar([0, 0, 1])).toEqual([1, -90, 0]);
    expect(toPolar([0, 0, 1], true)).toEqual([1, 0, -90]);
  });

  it("gives a NaN inclination at the 3D origin", () => {
    expect(toPolar([0, 0, 0])).toEqual([0, -90, NaN]);
  });

  it("returns an empty vector for invalid input", () => {
    expect(toPolar([1])).toEqual([]);
    expect(toPolar("abc")).toEqual([]);
    expect(toPolar({ x: 1, y: 2 })).toEqual([]);
  });
});

describe("round trips", () => {
  const planar: Array<[number, number]> = [
    [3, 4],
    [1, -2],
    [2, 0],
    [0, 5],
    [0, -5],
  ];

  const spatial: Array<[number, number, number]> = [
    [1, 2, 3],
    [2, -1, 0.5],
    [0.5, 0, -2],
  ];

  it.each(planar)("recovers (%d, %d)", (x, y) => {
    expectClose(toCartesian(toPolar([x, y])), [x, y]);
  });

  it.each(spatial)("recovers (%d, %d, %d) in both conventions", (x, y, z) => {
    expectClose(toCartesian(toPolar([x, y, z])), [x, y, z]);
    expectClose(toCartesian(toPolar([x, y, z], true), true), [x, y, z]);
  });

  it("reflects vectors with negative x through the origin", () => {
    expectClose(toCartesian(toPolar([-3, 4])), [3, -4]);
  });
});

describe("promoteTo3d", () => {
  it("adds a zero z component to a 2D vector", () => {
    expect(promoteTo3d([1, 2])).toEqual([1, 2, 0]);
    expect(promoteTo3d(Float64Array.of(1, 2))).toEqual([1, 2, 0]);
  });

  it("copies a 3D vector", () => {
    const input = [1, 2, 3];
    const result = promoteTo3d(input);
    expect(result).toEqual([1, 2, 3]);
    expect(result).not.toBe(input);
  });

  it("returns undefined for invalid input", () => {
    expect(promoteTo3d([1])).toBeUndefined();
    expect(promoteTo3d("ab")).toBeUndefined();
  });
});
