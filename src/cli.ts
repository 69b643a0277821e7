/**
 * Interactive win probability prompt
 *
 *   $ npm run cli -- --goal 2
 *   > 1 0
 *   [ 1-0 ] 0.7500 + 1.0000 (p - 1/2) - 1.0000 (p - 1/2)^2 + 0.0000 (p - 1/2)^3
 *   > w
 *   [ 2-0 ] 1.0000 + 0.0000 (p - 1/2) + 0.0000 (p - 1/2)^2 + 0.0000 (p - 1/2)^3
 */

import { createInterface } from "node:readline";
import { WinProbabilitySolver } from "./compute/solver.ts";
import { ConfigError, getConfig } from "./config.ts";
import { createProgram, type PromptOptions } from "./lib/program.ts";
import { formatReport, Scoreboard } from "./lib/scoreboard.ts";

function run({ goal, fraction }: PromptOptions): void {
  const scoreboard = new Scoreboard(new WinProbabilitySolver(), goal);
  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: "> " });

  rl.on("line", (line) => {
    for (const out of formatReport(scoreboard.apply(line), fraction)) {
      console.log(out);
    }
    rl.prompt();
  });
  rl.on("SIGINT", () => rl.close());
  rl.prompt();
}

let defaults: PromptOptions;
try {
  const config = getConfig();
  defaults = { goal: config.WIN_PROB_GOAL, fraction: config.WIN_PROB_FRACTION };
} catch (error) {
  if (!(error instanceof ConfigError)) throw error;
  console.error(error.message);
  process.exit(1);
}

createProgram(defaults, run).parse();
