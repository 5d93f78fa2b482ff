/**
 * Readonly, frozen return types for MCP primitives.
 */

export interface McpTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Readonly<Record<string, unknown>>;
  /** Configured name of the server that provides the tool */
  readonly serverName: string;
}

export interface McpContent {
  readonly type: string;
  readonly text?: string;
  readonly data?: string;
  readonly mimeType?: string;
  readonly uri?: string;
}

export interface McpToolResult {
  readonly content: readonly McpContent[];
  readonly isError: boolean;
  readonly structuredContent?: Readonly<Record<string, unknown>>;
}

export interface McpServerInfo {
  readonly name: string;
  readonly version: string;
}
