import { randomInt } from 'crypto';

export const LOBBY_ID_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const LOBBY_ID_LENGTH = 6;
const MAX_ATTEMPTS = 1000;

export class LobbyIdExhaustedError extends Error {
  constructor(attempts: number) {
    super(`Could not find a free lobby id after ${attempts} attempts`);
    this.name = 'LobbyIdExhaustedError';
  }
}

/** Returns an index in [0, max). */
export type RandomIndex = (max: number) => number;

const defaultRandomIndex: RandomIndex = (max) => randomInt(max);

/**
 * Draws 6-character codes from A-Z0-9 until one is not in `existing`.
 * Not a security token; the store re-checks uniqueness under its lock.
 */
export function generateLobbyId(
  existing: { has(id: string): boolean },
  randomIndex: RandomIndex = defaultRandomIndex,
): string {
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    let candidate = '';
    for (let i = 0; i < LOBBY_ID_LENGTH; i++) {
      candidate += LOBBY_ID_ALPHABET[randomIndex(LOBBY_ID_ALPHABET.length)];
    }
    if (!existing.has(candidate)) return candidate;
  }
  throw new LobbyIdExhaustedError(MAX_ATTEMPTS);
}

export function normalizeLobbyId(id: string): string {
  return id.trim().toUpperCase();
}
