import { describe, expect, it } from "vitest";
import {
  UnknownGradeError,
  hasGrade,
  listGradeEntries,
  listGrades,
  lookupGrade,
} from "../shared/magnet-grades";
import { MagnetGradeEntry } from "../shared/magnet-schema";

const DATASHEET_BR: Record<string, number> = {
  N35: 1.23,
  N38: 1.26,
  N40: 1.29,
  N42: 1.32,
  N45: 1.35,
  N48: 1.38,
  N50: 1.43,
  N52: 1.48,
  N55: 1.5,
};

describe("magnet grade table", () => {
  it("returns the datasheet Br for every grade", () => {
    for (const [grade, br] of Object.entries(DATASHEET_BR)) {
      expect(lookupGrade(grade)).toBe(br);
    }
  });

  it("lists grades in ascending order", () => {
    expect(listGrades()).toEqual(["N35", "N38", "N40", "N42", "N45", "N48", "N50", "N52", "N55"]);
  });

  it("pairs each listed grade with its Br", () => {
    const entries = listGradeEntries();
    expect(entries).toHaveLength(9);
    expect(entries[0]).toEqual({ grade: "N35", br_T: 1.23 });
    expect(entries[8]).toEqual({ grade: "N55", br_T: 1.5 });
    for (const entry of entries) {
      expect(MagnetGradeEntry.safeParse(entry).success).toBe(true);
    }
  });

  it("hands out copies so callers cannot mutate the table", () => {
    const entries = listGradeEntries();
    entries[0].br_T = 99;
    entries.pop();
    expect(lookupGrade("N35")).toBe(1.23);
    expect(listGrades()).toHaveLength(9);
  });

  it("rejects unknown grades with UnknownGradeError", () => {
    expect(() => lookupGrade("Z99")).toThrow(UnknownGradeError);
    const caught = (() => {
      try {
        lookupGrade("N60");
      } catch (err) {
        return err;
      }
      return null;
    })();
    expect(caught).toBeInstanceOf(UnknownGradeError);
    expect(caught).toMatchObject({
      name: "UnknownGradeError",
      grade: "N60",
      message: "Unknown magnet grade: N60",
    });
  });

  it("is case-sensitive", () => {
    expect(hasGrade("N52")).toBe(true);
    expect(hasGrade("n52")).toBe(false);
    expect(() => lookupGrade("n52")).toThrow(UnknownGradeError);
  });
});
