// This module centralizes server identity values so protocol metadata and routes stay in sync.

export const MCP_SERVER_NAME = 'calendar-mcp';
export const MCP_SERVER_VERSION = '0.1.0';
export const MCP_PROTOCOL_VERSION = '2025-03-26';

// Header used to echo the session identifier on every /mcp response.
export const MCP_SESSION_HEADER = 'mcp-session-id';
