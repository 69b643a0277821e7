export {
  createMemoStatsTool,
  createWinProbabilityTool,
  MAX_GOAL,
  type OutputFormat,
  type ToolContext,
} from "./win-probability.ts";
