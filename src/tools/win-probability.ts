import { z } from "zod";
import { OutOfRangeError } from "../compute/errors.ts";
import { Rational } from "../compute/rational.ts";
import type { WinProbabilitySolver } from "../compute/solver.ts";

/** The slice of the per-request tool context these tools use */
export interface ToolContext {
  log: {
    debug(message: string): void;
  };
}

export type OutputFormat = "exact" | "decimal" | "both";

/** Largest race a single request may ask for; work grows with goal^2 */
export const MAX_GOAL = 200;

/**
 * Race win probability as a cubic in (p - 1/2), expanded around a fair point
 */
export function createWinProbabilityTool(solver: WinProbabilitySolver, defaultGoal: number) {
  return {
    name: "win_probability",
    description: `Probability that a contestant at score win-lose reaches goal points first,
when each point is won independently with probability p.

Returns a cubic in (p - 1/2) with exact rational coefficients (terms of degree 4+
are dropped), optionally as decimals and evaluated at a given p.`,

    parameters: z.object({
      win: z.number().int().min(0).describe("Points won so far"),
      lose: z.number().int().min(0).describe("Points lost so far"),
      goal: z
        .number()
        .int()
        .min(0)
        .max(MAX_GOAL)
        .default(defaultGoal)
        .describe("Points needed to win the race"),
      format: z
        .enum(["exact", "decimal", "both"])
        .default("both")
        .describe("exact (rational coefficients), decimal (4 places) or both"),
      p: z
        .number()
        .min(0)
        .max(1)
        .optional()
        .describe("Evaluate the approximation at this point probability"),
    }),

    execute: async (
      args: { win: number; lose: number; goal?: number; format?: OutputFormat; p?: number },
      { log }: ToolContext,
    ): Promise<string> => {
      const goal = args.goal ?? defaultGoal;
      const format = args.format ?? "both";
      log.debug(`win_probability ${args.win}-${args.lose} to ${goal}`);

      try {
        const exact = solver.solve(args.win, args.lose, goal);
        const display = exact.toDisplay();

        const lines = [`**Win probability** [${args.win}-${args.lose}], race to ${goal}`];
        if (format !== "decimal") lines.push(`- Exact: ${exact.render()}`);
        if (format !== "exact") lines.push(`- Decimal: ${display.render()}`);
        if (args.p !== undefined) {
          const approx = Rational.fromNumber(display.evaluate(args.p)).toFixed(4);
          lines.push(`- At p = ${args.p}: ${approx}`);
        }
        return lines.join("\n");
      } catch (error) {
        if (error instanceof OutOfRangeError) {
          return `**Error:** ${error.message}`;
        }
        throw error;
      }
    },
  };
}

export function createMemoStatsTool(solver: WinProbabilitySolver) {
  return {
    name: "memo_stats",
    description: "Size and hit rate of the solver's memo table",
    parameters: z.object({}),
    execute: async (): Promise<string> => {
      const stats = solver.stats();
      return [
        `**Memo Table**`,
        `- States: ${stats.size}`,
        `- Hits: ${stats.hits}`,
        `- Misses: ${stats.misses}`,
        `- Hit rate: ${(stats.hitRate * 100).toFixed(1)}%`,
      ].join("\n");
    },
  };
}
