/**
 * Request envelope for the IESS cloud
 *
 * - Login password: RSA PKCS#1 v1.5 with the vendor public key, base64
 * - Every request body: JSON, AES-128-CBC (key = IV), base64, sent as text/plain
 */

import crypto from 'node:crypto';
import { AES_KEY, PUBKEY_PEM } from './constants';

const ALGORITHM = 'aes-128-cbc';

export function rsaEncrypt(plaintext: string, publicKeyPem: string = PUBKEY_PEM): string {
  const encrypted = crypto.publicEncrypt(
    { key: publicKeyPem, padding: crypto.constants.RSA_PKCS1_PADDING },
    Buffer.from(plaintext, 'utf8'),
  );
  return encrypted.toString('base64');
}

export function aesEncrypt(payload: Record<string, unknown> | string, keyText: string = AES_KEY): string {
  const plaintext = typeof payload === 'string' ? payload : JSON.stringify(payload);
  const key = Buffer.from(keyText, 'utf8');

  // PKCS#7 padding is the cipher default
  const cipher = crypto.createCipheriv(ALGORITHM, key, key);
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

  return encrypted.toString('base64');
}

export function aesDecrypt(ciphertextB64: string, keyText: string = AES_KEY): string {
  const key = Buffer.from(keyText, 'utf8');
  const decipher = crypto.createDecipheriv(ALGORITHM, key, key);
  const decrypted = Buffer.concat([
    decipher.update(Buffer.from(ciphertextB64, 'base64')),
    decipher.final(),
  ]);

  return decrypted.toString('utf8');
}
