import { readFileSync } from "node:fs";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { executeCommand } from "./cli.js";

const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

const server = new McpServer({
  name: "nutrigraph",
  version: pkg.version,
});

server.registerTool(
  "nutrigraph",
  {
    title: "Nutrigraph",
    description:
      "Nutrition tracking with composable recipes. Pass any nutrigraph command string. " +
      'Run with command "help" for full usage reference. ' +
      "Returns JSON. Edits to foods and recipes recalculate every dependent recipe and day. " +
      'Examples: "food list --query oats", "log recipe 3 --servings 2", "day get 2024-05-01", "component add 4 2"',
    inputSchema: {
      command: z.string().describe("The nutrigraph CLI command to run, e.g. 'recipe get 3'"),
    },
  },
  async ({ command }) => {
    const argv = command.match(/(?:[^\s"']+|"[^"]*"|'[^']*')/g)?.map((s) => s.replace(/^["']|["']$/g, "")) ?? [];
    const result = await executeCommand(argv);

    const text = result.exitCode === 0
      ? result.stdout
      : result.stderr || `Command failed with exit code ${result.exitCode}`;

    return {
      content: [{ type: "text", text }],
      isError: result.exitCode !== 0,
    };
  }
);

const transport = new StdioServerTransport();
await server.connect(transport);
