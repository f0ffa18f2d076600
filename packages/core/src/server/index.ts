export { ConciergeServer, type ConciergeServerOptions } from './concierge-server.js';
