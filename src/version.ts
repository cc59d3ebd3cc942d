export const SERVER_NAME = 'kube-inspector-mcp';
export const VERSION = '0.1.0';
