export * from './lobby.js';
export * from './ws.js';
