// HTTP transport used by the exchange clients
export * from './client.js';

export * from './types.js';

// Export pure functional core functions
export * from './core/http-utils.js';
export * from './core/types.js';
