import { Command } from "commander";
import { Conflict, PuzzleGrid, findConflicts, isSolvedGrid } from "@nineset/core";
import { readPuzzle } from "../input.js";

export interface CheckRun {
  conflicts: Conflict[];
  exitCode: number;
  output: string;
}

function describeConflict(conflict: Conflict): string {
  const cells = conflict.cells.map(([r, c]) => `r${r}c${c}`).join(", ");
  return `  ${conflict.digit} repeated in ${conflict.unit} ${conflict.unitIndex}: ${cells}`;
}

/** Count givens and list clashing digits. Exits 2 when there are conflicts. */
export function runCheck(puzzle: PuzzleGrid): CheckRun {
  const givens = puzzle.flat().filter((v) => v !== 0).length;
  const conflicts = findConflicts(puzzle);

  const lines = [`Givens: ${givens}`];
  if (conflicts.length === 0) {
    lines.push(isSolvedGrid(puzzle) ? "Complete and valid" : "No conflicts");
  } else {
    lines.push(`Conflicts: ${conflicts.length}`, ...conflicts.map(describeConflict));
  }

  return { conflicts, exitCode: conflicts.length === 0 ? 0 : 2, output: lines.join("\n") };
}

export function registerCheckCommand(program: Command): void {
  program
    .command("check")
    .description("Validate a puzzle and list conflicting givens without solving it")
    .argument("[puzzle]", "81 cells: 1-9 for givens, . or 0 for blanks (default: stdin)")
    .option("-f, --file <path>", "Read the puzzle from a text or .json file")
    .action(async (puzzle: string | undefined, opts: { file?: string }) => {
      const grid = await readPuzzle({ puzzle, file: opts.file });
      const run = runCheck(grid);
      console.log(run.output);
      process.exitCode = run.exitCode;
    });
}
