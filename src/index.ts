import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerContent } from "./routes/content.js";
import { registerDigest } from "./routes/digest.js";
import { registerProgress } from "./routes/progress.js";
import { registerSources } from "./routes/sources.js";
import type { ToolHost } from "./routes/tooling.js";
import { envOr } from "./services/config.js";
import { bootstrapOpenSearch } from "./services/os-bootstrap.js";
import { createRuntime } from "./services/runtime.js";

function bootstrapEnabled(): boolean {
  const v = envOr("COACH_BOOTSTRAP_OS", "").toLowerCase();
  return v === "1" || v === "true";
}

async function main() {
  const server = new McpServer({ name: "learning-coach-digest", version: "0.1.0" });
  const runtime = await createRuntime();

  const host: ToolHost = {
    tool(name, description, shape, handler) {
      server.tool(name, description, shape, (args) => handler(args));
    }
  };

  registerProgress(host, runtime);
  registerDigest(host, runtime);
  registerContent(host, runtime);
  registerSources(host, runtime);

  // Optionally bootstrap OpenSearch if enabled (best-effort; do not crash MCP)
  if (bootstrapEnabled()) {
    try {
      await bootstrapOpenSearch(runtime.embedder.dim > 0 ? { expectedDim: runtime.embedder.dim } : {});
    } catch (err) {
      console.error("bootstrapOpenSearch failed (continuing to serve MCP):", err);
    }
  }

  const { StdioServerTransport } = await import("@modelcontextprotocol/sdk/server/stdio.js");
  await server.connect(new StdioServerTransport());
}

main().catch((err) => {
  console.error("Learning coach MCP server failed to start:", err);
  process.exit(1);
});
