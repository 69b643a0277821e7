import { FastMCP } from "fastmcp";
import { WinProbabilitySolver } from "./compute/solver.ts";
import { getConfig } from "./config.ts";
import { createMemoStatsTool, createWinProbabilityTool } from "./tools/index.ts";

const config = getConfig();

// One memo table for the life of the server
const solver = new WinProbabilitySolver();

const server = new FastMCP({
  name: "Win Probability MCP",
  version: "0.1.0",
});

// Register tools
server.addTool(createWinProbabilityTool(solver, config.WIN_PROB_GOAL));
server.addTool(createMemoStatsTool(solver));

// Start server (stdio for local MCP agents)
server.start({ transportType: "stdio" }).catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
