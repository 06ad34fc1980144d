// This file defines JSON-RPC and MCP protocol payload types shared by the transport and the message processor.

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result?: unknown;
  error?: JsonRpcError;
}

// One decoded inbound envelope; only `request` expects a correlated reply.
export type InboundMessage =
  | { kind: 'request'; id: JsonRpcId; method: string; payload: Record<string, unknown> }
  | { kind: 'notification'; method: string; payload: Record<string, unknown> }
  | { kind: 'response'; id: JsonRpcId; payload: Record<string, unknown> };

// One encoded outbound reply plus the id it answers, so pairing strategies other than FIFO can route it.
export interface ProcessedReply {
  id: JsonRpcId;
  body: string;
}

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface McpResource {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}
