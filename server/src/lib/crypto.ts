import crypto from 'crypto';
import { configurationError } from './gateway-errors';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;
const SALT_LENGTH = 32;
const ITERATIONS = 100000;
const KEY_LENGTH = 32;

interface SealedSecret {
  salt: Buffer;
  iv: Buffer;
  authTag: Buffer;
  ciphertext: Buffer;
}

function deriveKey(passphrase: string, salt: Buffer): Buffer {
  return crypto.pbkdf2Sync(passphrase, salt, ITERATIONS, KEY_LENGTH, 'sha256');
}

function requireKey(encryptionKey: string | undefined): string {
  if (!encryptionKey) {
    throw configurationError('ENCRYPTION_KEY is not set');
  }
  return encryptionKey;
}

// salt:iv:authTag:ciphertext, each part base64
function serialize(sealed: SealedSecret): string {
  return [sealed.salt, sealed.iv, sealed.authTag, sealed.ciphertext]
    .map(part => part.toString('base64'))
    .join(':');
}

function parse(stored: string): SealedSecret {
  const parts = stored.split(':');
  if (parts.length !== 4) {
    throw configurationError('Invalid encrypted data format');
  }

  const [salt, iv, authTag, ciphertext] = parts.map(part => Buffer.from(part, 'base64'));
  return { salt, iv, authTag, ciphertext };
}

/**
 * Encrypts an account secret for the account store. A fresh salt and IV are
 * drawn per call, so equal secrets never produce equal output.
 */
export function encryptSecret(secret: string, encryptionKey: string | undefined = process.env.ENCRYPTION_KEY): string {
  const passphrase = requireKey(encryptionKey);
  const salt = crypto.randomBytes(SALT_LENGTH);
  const iv = crypto.randomBytes(IV_LENGTH);

  const cipher = crypto.createCipheriv(ALGORITHM, deriveKey(passphrase, salt), iv);
  const ciphertext = Buffer.concat([cipher.update(secret, 'utf8'), cipher.final()]);

  return serialize({ salt, iv, authTag: cipher.getAuthTag(), ciphertext });
}

export function decryptSecret(stored: string, encryptionKey: string | undefined = process.env.ENCRYPTION_KEY): string {
  const passphrase = requireKey(encryptionKey);
  const sealed = parse(stored);

  try {
    const decipher = crypto.createDecipheriv(ALGORITHM, deriveKey(passphrase, sealed.salt), sealed.iv);
    decipher.setAuthTag(sealed.authTag);
    return Buffer.concat([decipher.update(sealed.ciphertext), decipher.final()]).toString('utf8');
  } catch {
    // Wrong key and tampered data look the same here
    throw configurationError('Failed to decrypt account secret');
  }
}
