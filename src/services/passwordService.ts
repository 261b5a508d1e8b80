import crypto from 'node:crypto';
import { ConfigurationError } from '../errors';

const SALT_BYTES = 16;
const KEY_LENGTH = 64;
const BLOCK_SIZE = 8;
const SCHEME = 'scrypt';

export const DEFAULT_HASH_COST = 16_384;
export const MAX_HASH_COST = 2 ** 20;

export function isValidHashCost(cost: number): boolean {
  return (
    Number.isSafeInteger(cost) &&
    cost >= 2 &&
    cost <= MAX_HASH_COST &&
    Number.isInteger(Math.log2(cost))
  );
}

function scrypt(password: string, salt: string, cost: number): Buffer {
  return crypto.scryptSync(password, salt, KEY_LENGTH, {
    N: cost,
    r: BLOCK_SIZE,
    p: 1,
    maxmem: 256 * cost * BLOCK_SIZE
  });
}

export function hashPassword(password: string, cost: number = DEFAULT_HASH_COST): string {
  const salt = crypto.randomBytes(SALT_BYTES).toString('hex');
  const hash = scrypt(password, salt, cost).toString('hex');
  return `${SCHEME}:${cost}:${salt}:${hash}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [scheme, costText, salt, hash, ...rest] = stored.split(':');
  const cost = Number(costText);
  if (
    scheme !== SCHEME ||
    rest.length > 0 ||
    !isValidHashCost(cost) ||
    !salt ||
    !hash ||
    !/^[0-9a-f]+$/.test(hash) ||
    hash.length !== KEY_LENGTH * 2
  ) {
    throw new ConfigurationError('MalformedHash', 'Stored password hash is malformed');
  }
  const expected = Buffer.from(hash, 'hex');
  const candidate = scrypt(password, salt, cost);
  return crypto.timingSafeEqual(expected, candidate);
}

export class PasswordService {
  constructor(private readonly cost: number = DEFAULT_HASH_COST) {}

  hash(password: string): string {
    return hashPassword(password, this.cost);
  }

  verify(password: string, stored: string): boolean {
    return verifyPassword(password, stored);
  }
}
