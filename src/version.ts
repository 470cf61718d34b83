// Server identity, shared by the MCP handshake and outbound HTTP requests.
// Keep SERVER_VERSION in step with package.json.
export const SERVER_NAME = "terminal-server";
export const SERVER_VERSION = "0.1.0";
