import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { getCodeownersRules, getFileOwner, getFileOwners, groupPathsByOwners } from "./app";
import type { OwnersDeps } from "./app";

export const SERVER_NAME = "github-codeowners";
export const SERVER_VERSION = "0.3.0";

const repoShape = {
  owner: z.string().min(1).describe("Repository owner"),
  repo: z.string().min(1).describe("Repository name"),
  branch: z.string().min(1).optional().describe("Branch name (default: the repository's default branch)"),
  sources: z
    .array(z.string().min(1))
    .optional()
    .describe("Nested CODEOWNERS files (e.g. src/CODEOWNERS) merged after the root file, scoped to their directory")
};

function ok(result: Record<string, unknown>): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }], structuredContent: result };
}

export function createServer(deps: OwnersDeps): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: "This MCP server exposes ownership information for files contained in GitHub repositories." }
  );

  async function run(tool: string, fn: () => Promise<Record<string, unknown>>): Promise<CallToolResult> {
    try {
      return ok(await fn());
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      deps.logger.error(`Tool ${tool} failed: ${message}`);
      return { isError: true, content: [{ type: "text", text: message }] };
    }
  }

  server.registerTool(
    "get_file_owners",
    {
      title: "Resolve file owners",
      description:
        "Resolves the CODEOWNERS owners of one or more paths. Team owners are expanded into individual members unless expandTeams is false. Each result names the winning rule and any diagnostics.",
      inputSchema: {
        ...repoShape,
        paths: z.array(z.string()).min(1).describe("Repository-relative file or directory paths (directories end with /)"),
        expandTeams: z.boolean().optional().describe("Expand @org/team owners into members (default: true)")
      }
    },
    (args, extra) => run("get_file_owners", () => getFileOwners(deps, args, extra.signal))
  );

  server.registerTool(
    "get_file_owner",
    {
      title: "Get file owner",
      description:
        "Returns the owners of the specified file as declared in the repository's CODEOWNERS file. Fails when the file is unowned and does not exist.",
      inputSchema: {
        ...repoShape,
        path: z.string().min(1).describe("File path")
      }
    },
    (args, extra) => run("get_file_owner", async () => ({ owners: await getFileOwner(deps, args, extra.signal) }))
  );

  server.registerTool(
    "group_paths_by_owners",
    {
      title: "Group paths by owners",
      description: "Splits a list of paths into buckets that share the same set of resolved owners.",
      inputSchema: {
        ...repoShape,
        paths: z.array(z.string()).min(1).describe("Repository-relative paths"),
        exclude: z.array(z.string()).optional().describe("Glob patterns of paths to leave out"),
        includeUnowned: z.boolean().optional().describe("Keep a bucket for unowned paths (default: true)"),
        unownedKey: z.string().min(1).optional().describe("Key of the unowned bucket (default: __UNOWNED__)")
      }
    },
    (args, extra) => run("group_paths_by_owners", () => groupPathsByOwners(deps, args, extra.signal))
  );

  server.registerTool(
    "get_codeowners_rules",
    {
      title: "List CODEOWNERS rules",
      description: "Lists the parsed CODEOWNERS rules in precedence order together with malformed-line diagnostics.",
      inputSchema: repoShape
    },
    (args, extra) => run("get_codeowners_rules", () => getCodeownersRules(deps, args, extra.signal))
  );

  return server;
}
