import crypto from 'node:crypto';
import { z } from 'zod';
import type { AppConfig } from './config.js';

type KeyConfig = Pick<AppConfig, 'SECRETS_KEY'>;

const encryptedPayloadSchema = z.object({
  v: z.literal(1),
  alg: z.literal('aes-256-gcm'),
  iv: z.string(),
  tag: z.string(),
  data: z.string()
});

export type EncryptedPayloadV1 = z.infer<typeof encryptedPayloadSchema>;

function deriveKey(config: KeyConfig): Buffer {
  if (!config.SECRETS_KEY) {
    throw new Error('SECRETS_KEY not configured');
  }

  // Either base64-encoded 32 bytes, or a passphrase.
  const raw = config.SECRETS_KEY.trim();
  const buf = Buffer.from(raw, 'base64');
  if (buf.length === 32) return buf;

  return crypto.scryptSync(raw, 'vault-bootstrap:v1', 32);
}

export function encryptString(config: KeyConfig, plaintext: string): EncryptedPayloadV1 {
  const key = deriveKey(config);
  const iv = crypto.randomBytes(12);
  const cipher = crypto.createCipheriv('aes-256-gcm', key, iv);

  const ciphertext = Buffer.concat([cipher.update(Buffer.from(plaintext, 'utf8')), cipher.final()]);

  return {
    v: 1,
    alg: 'aes-256-gcm',
    iv: iv.toString('base64'),
    tag: cipher.getAuthTag().toString('base64'),
    data: ciphertext.toString('base64')
  };
}

export function decryptString(config: KeyConfig, payload: EncryptedPayloadV1): string {
  const key = deriveKey(config);

  const decipher = crypto.createDecipheriv('aes-256-gcm', key, Buffer.from(payload.iv, 'base64'));
  decipher.setAuthTag(Buffer.from(payload.tag, 'base64'));

  const plaintext = Buffer.concat([decipher.update(Buffer.from(payload.data, 'base64')), decipher.final()]);
  return plaintext.toString('utf8');
}

export function isEncryptedPayload(value: unknown): value is EncryptedPayloadV1 {
  return encryptedPayloadSchema.safeParse(value).success;
}
