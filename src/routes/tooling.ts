// src/routes/tooling.ts
// Shared plumbing for MCP tool registration: input validation and JSON text results.

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z, type ZodRawShape } from "zod";
import { DigestError, toErrorMessage } from "../domain/errors.js";

/** The part of McpServer the routes use; tests register against a fake. */
export interface ToolHost {
  tool(
    name: string,
    description: string,
    shape: ZodRawShape,
    handler: (args: unknown) => Promise<CallToolResult>
  ): void;
}

export function jsonResult(payload: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(payload) }] };
}

export function errorPayload(err: unknown): Record<string, unknown> {
  return err instanceof DigestError
    ? { success: false, error: err.message, code: err.code }
    : { success: false, error: toErrorMessage(err) };
}

/**
 * Register a tool whose arguments are parsed with the same shape that is
 * advertised to clients. Thrown errors become { success: false } payloads.
 */
export function defineTool<S extends ZodRawShape>(
  host: ToolHost,
  name: string,
  description: string,
  shape: S,
  run: (args: z.infer<z.ZodObject<S>>) => Promise<unknown>
): void {
  const schema = z.object(shape);
  host.tool(name, description, shape, async (raw) => {
    const parsed = schema.safeParse(raw ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
      return jsonResult({ success: false, error: `Invalid arguments for ${name}: ${issues}`, code: "INVALID_REQUEST" });
    }
    try {
      return jsonResult(await run(parsed.data));
    } catch (err) {
      console.warn(`[${name}] failed: ${toErrorMessage(err)}`);
      return jsonResult(errorPayload(err));
    }
  });
}
