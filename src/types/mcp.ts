// src/types/mcp.ts

/**
 * Standard response format for MCP tools
 */
export type McpToolResponse = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};
