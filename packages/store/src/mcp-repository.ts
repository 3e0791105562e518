import type { FileSystem, McpServer } from '@projectkit/core'
import { validateMcpServer } from '@projectkit/core'

import type { RepositoryCodec } from './fs-repository.js'
import { FsRepository } from './fs-repository.js'

export const mcpServerCodec: RepositoryCodec<McpServer> = {
  kind: 'mcp-server',
  identify: (server) => server.name,
  encode: (server) => server,
  decode: validateMcpServer,
}

/** MCP servers; names are not checked for uniqueness */
export class McpServerRepository extends FsRepository<McpServer> {
  constructor(fs: FileSystem) {
    super(fs, mcpServerCodec)
  }

  async addMcpServer(server: McpServer): Promise<void> {
    await this.withWriteLock(() => this.insert(server))
  }
}
