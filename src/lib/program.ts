/**
 * Command-line options for the interactive prompt
 */

import { Command, InvalidArgumentError } from "commander";

export interface PromptOptions {
  goal: number;
  fraction: boolean;
}

export function parseGoal(value: string): number {
  const goal = Number(value);
  if (value.trim() === "" || !Number.isSafeInteger(goal) || goal < 0) {
    throw new InvalidArgumentError("Goal must be a non-negative integer.");
  }
  return goal;
}

/** Defaults come from the environment; --fraction / --no-fraction override either way */
export function createProgram(
  defaults: PromptOptions,
  onRun: (options: PromptOptions) => void,
): Command {
  return new Command()
    .name("win-prob")
    .description("Probability of winning a race to <goal> points, as a cubic in (p - 1/2)")
    .version("0.1.0")
    .option("-g, --goal <n>", "Points needed to win the race", parseGoal, defaults.goal)
    .option("--fraction", "Also print the exact rational form", defaults.fraction)
    .option("--no-fraction", "Print only the decimal form")
    .action((options: PromptOptions) => {
      onRun(options);
    });
}
