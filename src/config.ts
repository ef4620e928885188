import { z } from "zod";
import { OwnersError } from "./types";
import type { ServerConfig } from "./types";

export function parseBool(v: string) {
  return ["1", "true", "yes", "on"].includes(String(v).trim().toLowerCase());
}

const ConfigSchema = z.object({
  githubToken: z.string().min(1).optional(),
  debug: z.boolean(),
  cacheTtlSecs: z.coerce.number().int().min(0),
  transport: z.enum(["stdio", "sse", "streamable-http"]),
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  maxTeamDepth: z.coerce.number().int().min(1),
  logFormat: z.enum(["text", "json"])
});

export type CliArgs = {
  help: boolean;
  overrides: Partial<Record<Exclude<keyof ServerConfig, "debug">, string>> & { debug?: boolean };
};

const FLAGS: Record<string, Exclude<keyof ServerConfig, "debug">> = {
  "--token": "githubToken",
  "--cache-ttl": "cacheTtlSecs",
  "--transport": "transport",
  "--host": "host",
  "--port": "port",
  "--max-depth": "maxTeamDepth",
  "--log-format": "logFormat"
};

function takeArg(argv: string[], i: number, name: string): string {
  const v = argv[i + 1];
  if (!v) throw new OwnersError(`Missing value for ${name}`);
  return v;
}

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { help: false, overrides: {} };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    const key = FLAGS[a];
    if (a === "-h" || a === "--help") out.help = true;
    else if (a === "--debug") out.overrides.debug = true;
    else if (key) out.overrides[key] = takeArg(argv, i++, a);
    else throw new OwnersError(`Unknown arg: ${a}`);
  }
  return out;
}

/** Environment first, command-line flags on top. */
export function loadConfig(env: NodeJS.ProcessEnv, overrides: CliArgs["overrides"] = {}): ServerConfig {
  const raw = {
    githubToken: overrides.githubToken ?? (env.GITHUB_TOKEN || env.GH_TOKEN || undefined),
    debug: overrides.debug ?? parseBool(env.DEBUG ?? "false"),
    cacheTtlSecs: overrides.cacheTtlSecs ?? env.CACHE_TTL_SECS ?? "300",
    transport: overrides.transport ?? env.TRANSPORT ?? "stdio",
    host: overrides.host ?? env.HOST ?? "127.0.0.1",
    port: overrides.port ?? env.PORT ?? "8000",
    maxTeamDepth: overrides.maxTeamDepth ?? env.MAX_TEAM_DEPTH ?? "10",
    logFormat: overrides.logFormat ?? env.LOG_FORMAT ?? "text"
  };

  const res = ConfigSchema.safeParse(raw);
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new OwnersError(`Invalid configuration: ${issues}`);
  }
  return res.data;
}

export function printHelp(write: (s: string) => void) {
  write(
    [
      "mcp-github-owners",
      "",
      "MCP server answering CODEOWNERS questions about GitHub repositories.",
      "",
      "Usage:",
      "  mcp-github-owners [options]",
      "",
      "Options (environment variable in brackets):",
      "  --token <token>               GitHub token [GITHUB_TOKEN, GH_TOKEN]",
      "  --transport <kind>            stdio|sse|streamable-http (default: stdio) [TRANSPORT]",
      "  --host <host>                 (default: 127.0.0.1) [HOST]",
      "  --port <n>                    (default: 8000) [PORT]",
      "  --cache-ttl <secs>            GitHub response cache TTL, 0 disables (default: 300) [CACHE_TTL_SECS]",
      "  --max-depth <n>               Maximum nested team depth (default: 10) [MAX_TEAM_DEPTH]",
      "  --log-format <fmt>            text|json (default: text) [LOG_FORMAT]",
      "  --debug                       Verbose logging [DEBUG]",
      "  -h, --help                    Show this help",
      ""
    ].join("\n")
  );
}
