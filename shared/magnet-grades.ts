import { MagnetGradeEntry, type TMagnetGradeEntry } from "./magnet-schema";

/**
 * Residual flux density Br (tesla) per sintered NdFeB grade.
 * Approximations of manufacturer datasheet values.
 */
const GRADE_SEED: ReadonlyArray<TMagnetGradeEntry> = [
  { grade: "N35", br_T: 1.23 },
  { grade: "N38", br_T: 1.26 },
  { grade: "N40", br_T: 1.29 },
  { grade: "N42", br_T: 1.32 },
  { grade: "N45", br_T: 1.35 },
  { grade: "N48", br_T: 1.38 },
  { grade: "N50", br_T: 1.43 },
  { grade: "N52", br_T: 1.48 },
  { grade: "N55", br_T: 1.5 },
];

export class UnknownGradeError extends Error {
  grade: string;
  constructor(grade: string) {
    super(`Unknown magnet grade: ${grade}`);
    this.grade = grade;
    this.name = "UnknownGradeError";
  }
}

const buildGradeTable = (seed: ReadonlyArray<TMagnetGradeEntry>): ReadonlyMap<string, number> => {
  const table = new Map<string, number>();
  for (const raw of seed) {
    const entry = MagnetGradeEntry.parse(raw);
    if (table.has(entry.grade)) {
      throw new Error(`Duplicate magnet grade: ${entry.grade}`);
    }
    table.set(entry.grade, entry.br_T);
  }
  return table;
};

const GRADE_TABLE = buildGradeTable(GRADE_SEED);

const SORTED_ENTRIES: ReadonlyArray<Readonly<TMagnetGradeEntry>> = Object.freeze(
  Array.from(GRADE_TABLE, ([grade, br_T]) => Object.freeze({ grade, br_T })).sort((a, b) =>
    a.grade < b.grade ? -1 : a.grade > b.grade ? 1 : 0,
  ),
);

// Case-sensitive; callers normalize.
export const hasGrade = (grade: string): boolean => GRADE_TABLE.has(grade);

export const lookupGrade = (grade: string): number => {
  const br = GRADE_TABLE.get(grade);
  if (br === undefined) {
    throw new UnknownGradeError(grade);
  }
  return br;
};

export const listGrades = (): string[] => SORTED_ENTRIES.map((entry) => entry.grade);

export const listGradeEntries = (): TMagnetGradeEntry[] =>
  SORTED_ENTRIES.map((entry) => ({ grade: entry.grade, br_T: entry.br_T }));
