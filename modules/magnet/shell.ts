/**
 * Interactive pull-force session.
 *
 * Prompt order per round: diameter, height, grade list, grade, result, repeat.
 * A bad diameter or height restarts the pair; a bad grade re-asks the grade
 * only and cannot fall back to the dimensions.
 */

import { hasGrade, listGradeEntries } from "../../shared/magnet-grades";
import type { TMagnetSpec, TPullForceEstimate } from "../../shared/magnet-schema";
import { DomainError, ParseError, parseDimensionPair, type DimensionPair } from "./dimension-input";
import type { LineSource } from "./line-source";
import { estimateMagnet } from "./pull-force";

export const SHELL_TEXT = {
  banner: "Magnet pull force estimator (cylindrical NdFeB on flat steel)",
  diameterPrompt: "Enter magnet diameter (mm): ",
  heightPrompt: "Enter magnet height (mm): ",
  parseError: "Invalid input: diameter and height must be numbers. Please try again.",
  domainError: "Invalid input: diameter and height must be greater than zero. Please try again.",
  gradesHeader: "Available grades:",
  gradePrompt: "Enter magnet grade (e.g. N52): ",
  repeatPrompt: "Calculate another magnet? (y/n): ",
  goodbye: "Goodbye.",
} as const;

export const FORCE_DECIMALS = 2;

export type MagnetShellEnd = "declined" | "end-of-input";

export interface MagnetShellSummary {
  estimates: number;
  endedBy: MagnetShellEnd;
}

export interface MagnetShellOptions {
  lines: LineSource;
  print?: (line: string) => void;
}

// Thrown internally to unwind out of any prompt when input runs dry.
class EndOfInput extends Error {
  constructor() {
    super("end of input");
    this.name = "EndOfInput";
  }
}

export const formatGradeLine = (grade: string, br_T: number): string =>
  `  ${grade.padEnd(4)} Br = ${br_T.toFixed(2)} T`;

export const unknownGradeMessage = (grade: string): string =>
  `Unknown grade "${grade}". Choose one of the grades listed above.`;

export function formatEstimate(spec: TMagnetSpec, estimate: TPullForceEstimate): string[] {
  return [
    `Magnet: ${spec.diameter_mm} mm diameter x ${spec.height_mm} mm height, grade ${spec.grade}`,
    `Estimated pull force: ${estimate.force_kg.toFixed(FORCE_DECIMALS)} kg (${estimate.force_N.toFixed(FORCE_DECIMALS)} N)`,
  ];
}

export async function runMagnetShell(options: MagnetShellOptions): Promise<MagnetShellSummary> {
  const { lines } = options;
  const print = options.print ?? ((line: string) => console.log(line));

  const ask = async (prompt: string): Promise<string> => {
    const answer = await lines.ask(prompt);
    if (answer === null) throw new EndOfInput();
    return answer;
  };

  const collectDimensions = async (): Promise<DimensionPair> => {
    for (;;) {
      const rawDiameter = await ask(SHELL_TEXT.diameterPrompt);
      const rawHeight = await ask(SHELL_TEXT.heightPrompt);
      try {
        return parseDimensionPair(rawDiameter, rawHeight);
      } catch (err) {
        if (err instanceof ParseError) {
          print(SHELL_TEXT.parseError);
        } else if (err instanceof DomainError) {
          print(SHELL_TEXT.domainError);
        } else {
          throw err;
        }
      }
    }
  };

  const displayGrades = (): void => {
    print(SHELL_TEXT.gradesHeader);
    for (const entry of listGradeEntries()) {
      print(formatGradeLine(entry.grade, entry.br_T));
    }
  };

  const collectGrade = async (): Promise<string> => {
    for (;;) {
      const grade = (await ask(SHELL_TEXT.gradePrompt)).trim().toUpperCase();
      if (hasGrade(grade)) return grade;
      print(unknownGradeMessage(grade));
    }
  };

  let estimates = 0;
  print(SHELL_TEXT.banner);
  try {
    for (;;) {
      const dimensions = await collectDimensions();
      displayGrades();
      const grade = await collectGrade();

      const spec: TMagnetSpec = { ...dimensions, grade };
      const estimate = estimateMagnet(spec);
      estimates += 1;
      for (const line of formatEstimate(spec, estimate)) print(line);

      const again = (await ask(SHELL_TEXT.repeatPrompt)).trim().toLowerCase();
      if (again !== "y") {
        print(SHELL_TEXT.goodbye);
        return { estimates, endedBy: "declined" };
      }
    }
  } catch (err) {
    if (err instanceof EndOfInput) {
      print("");
      print(SHELL_TEXT.goodbye);
      return { estimates, endedBy: "end-of-input" };
    }
    throw err;
  }
}
