import { Command } from "commander";
import { registerCheckCommand } from "./commands/check.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerSolveCommand } from "./commands/solve.js";

export function createProgram(): Command {
  const program = new Command();
  program
    .name("nineset")
    .description("nineset - Solve 9x9 sudoku puzzles by deduction and search")
    .version("0.1.0", "-v, --version");

  registerSolveCommand(program);
  registerCheckCommand(program);
  registerConfigCommand(program);
  return program;
}
