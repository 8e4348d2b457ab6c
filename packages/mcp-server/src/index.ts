export { createFeatureMcpServer, serveStdio, SERVER_NAME, type ServeOptions } from './server'
export {
  handleToolCall,
  formatFeature,
  formatFetchNext,
  toolCatalog,
  UnknownToolError,
  type ToolResult,
} from './tools'
export { mcpInputSchemas } from './schemas'
