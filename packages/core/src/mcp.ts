/**
 * MCP (Model Context Protocol) response utilities.
 * Helpers for building consistent tool responses from Results.
 */

import type { Result } from "./result.js";

/**
 * MCP text content block.
 */
export type TextContent = {
  type: "text";
  text: string;
};

/**
 * MCP tool response structure.
 * Type aliases, not interfaces: responses must stay assignable to the SDK
 * result type, which carries an index signature.
 */
export type ToolResponse<T = unknown> = {
  content: TextContent[];
  structuredContent?: T;
};

/**
 * Create an error response from a message.
 */
export function errorResponse(message: string): ToolResponse<{ success: false; error: string }> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
  };
}

/**
 * Convert a Result to a tool response with structured data.
 * On success the formatter supplies the text and the structured content;
 * on error an error response is returned.
 */
export function resultToStructuredResponse<T, E extends string | Error, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | { success: false; error: string }> {
  if (result.ok) {
    const { text, data } = formatter(result.value);
    return {
      content: [{ type: "text", text }],
      structuredContent: { success: true, ...data },
    };
  }
  const message = result.error instanceof Error ? result.error.message : String(result.error);
  return errorResponse(message);
}
