export const SERVER_NAME = 'mcp-localdb'
export const SERVER_VERSION = '0.1.0'
