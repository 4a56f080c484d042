import { describe, expect, it } from 'vitest';
import {
  generateLobbyId,
  LobbyIdExhaustedError,
  normalizeLobbyId,
} from '../src/ws/utils/sessionId.js';
import { sequence } from './helpers.js';

describe('generateLobbyId', () => {
  it('produces six uppercase letters or digits', () => {
    for (let i = 0; i < 50; i++) {
      expect(generateLobbyId(new Set())).toMatch(/^[A-Z0-9]{6}$/);
    }
  });

  it('maps random indices onto the alphabet', () => {
    expect(generateLobbyId(new Set(), sequence([0, 25, 26, 35, 1, 27]))).toBe('AZ09B1');
  });

  it('draws again when the candidate is taken', () => {
    const random = sequence([0, 0, 0, 0, 0, 0, 1, 1, 1, 1, 1, 1]);
    expect(generateLobbyId(new Set(['AAAAAA']), random)).toBe('BBBBBB');
  });

  it('gives up after a bounded number of attempts', () => {
    expect(() => generateLobbyId(new Set(['AAAAAA']), () => 0)).toThrow(LobbyIdExhaustedError);
  });
});

describe('normalizeLobbyId', () => {
  it('trims and uppercases', () => {
    expect(normalizeLobbyId('  ab12cd ')).toBe('AB12CD');
  });
});
