/**
 * MCP server definition: how to launch a server speaking MCP over stdio.
 */

export interface McpServerStdio {
  executablePath: string
  arguments?: string[]
  environmentVariables?: Record<string, string>
}

export interface McpServer {
  name: string
  stdio: McpServerStdio
}
