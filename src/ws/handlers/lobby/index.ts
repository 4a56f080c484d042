export { handleJoinLobby } from './joinLobby.js';
export { handleLeaveLobby } from './leaveLobby.js';
export { handleHostUpdate } from './hostUpdate.js';
