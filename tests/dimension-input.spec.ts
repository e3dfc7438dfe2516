import { describe, expect, it } from "vitest";
import { DomainError, ParseError, parseDimension, parseDimensionPair } from "../modules/magnet/dimension-input";

const capture = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return null;
};

describe("parseDimension", () => {
  it("accepts decimal and exponent forms", () => {
    expect(parseDimension("diameter", "12")).toBe(12);
    expect(parseDimension("diameter", " 12.5 ")).toBe(12.5);
    expect(parseDimension("diameter", ".5")).toBe(0.5);
    expect(parseDimension("diameter", "3.")).toBe(3);
    expect(parseDimension("height", "1e1")).toBe(10);
    expect(parseDimension("height", "+3")).toBe(3);
  });

  it("raises ParseError on non-numeric text", () => {
    for (const raw of ["abc", "", "   ", "12mm", "0x10", "Infinity", "1,5", "."]) {
      expect(() => parseDimension("diameter", raw)).toThrow(ParseError);
    }
    expect(capture(() => parseDimension("height", "abc"))).toMatchObject({
      name: "ParseError",
      field: "height",
      raw: "abc",
    });
  });

  it("raises DomainError on zero, negative or overflowing values", () => {
    for (const raw of ["0", "-5", "-0.001", "1e999"]) {
      expect(() => parseDimension("diameter", raw)).toThrow(DomainError);
    }
    expect(capture(() => parseDimension("height", "-2"))).toMatchObject({
      name: "DomainError",
      field: "height",
      value: -2,
    });
  });
});

describe("parseDimensionPair", () => {
  it("returns both dimensions", () => {
    expect(parseDimensionPair("20", "10")).toEqual({ diameter_mm: 20, height_mm: 10 });
  });

  it("reports the diameter first when both fail to parse", () => {
    expect(capture(() => parseDimensionPair("x", "y"))).toMatchObject({ field: "diameter" });
  });

  it("parses both fields before checking range", () => {
    const err = capture(() => parseDimensionPair("-1", "abc"));
    expect(err).toBeInstanceOf(ParseError);
    expect(err).toMatchObject({ field: "height" });
  });

  it("flags a non-positive height", () => {
    const err = capture(() => parseDimensionPair("20", "0"));
    expect(err).toBeInstanceOf(DomainError);
    expect(err).toMatchObject({ field: "height", value: 0 });
  });
});
