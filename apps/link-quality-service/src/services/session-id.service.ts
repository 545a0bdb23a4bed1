/**
 * Session identifier generators
 */
import crypto from 'crypto';
import type { SessionIdGenerator } from '../types/index.js';

export const SESSION_ID_ALPHABET = 'abcdefghijklmnopqrstuvwxyz';
export const SESSION_ID_LENGTH = 4;

/**
 * Random lowercase identifiers backed by the crypto RNG
 */
export class RandomSessionIdGenerator implements SessionIdGenerator {
  private readonly length: number;

  constructor(length: number = SESSION_ID_LENGTH) {
    this.length = length;
  }

  next(): string {
    let id = '';
    for (let i = 0; i < this.length; i++) {
      id += SESSION_ID_ALPHABET[crypto.randomInt(SESSION_ID_ALPHABET.length)];
    }
    return id;
  }
}

/**
 * Replays a fixed list of identifiers in order, wrapping around at the end
 */
export class SequenceSessionIdGenerator implements SessionIdGenerator {
  private readonly ids: string[];
  private index: number = 0;

  constructor(ids: string[]) {
    if (ids.length === 0) {
      throw new Error('SequenceSessionIdGenerator requires at least one id');
    }
    this.ids = [...ids];
  }

  next(): string {
    const id = this.ids[this.index];
    this.index = (this.index + 1) % this.ids.length;
    return id;
  }
}
