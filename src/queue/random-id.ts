import crypto from 'crypto';
import { IdGenerator } from '../types';

const LETTERS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';

export const DEFAULT_ID_LENGTH = 15;

/**
 * Random alphabetic identifier for batch request entries. Collisions are not
 * checked; 52^15 is large enough for batches of ten.
 */
export function randomId(length: number = DEFAULT_ID_LENGTH): string {
  let id = '';
  for (let i = 0; i < length; i++) {
    id += LETTERS[crypto.randomInt(LETTERS.length)];
  }
  return id;
}

export const defaultIdGenerator: IdGenerator = () => randomId();
