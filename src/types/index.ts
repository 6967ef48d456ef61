export * from './media.js';
export * from './lastfm.js';
export * from './actions.js';
export * from './status.js';
export * from './config.js';
