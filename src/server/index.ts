export { createServer } from './server.js';
export type { ServerConfig } from './server.js';
