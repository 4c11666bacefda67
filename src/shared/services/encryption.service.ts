import crypto from 'crypto';
import { envConfig } from '@/config/env';

const SECRET_PREFIX = 'enc:';
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const MASK = '******';

const key = crypto.createHash('sha256').update(envConfig.ENCRYPTION_KEY).digest();

export const isEncrypted = (value: string): boolean => value.startsWith(SECRET_PREFIX);

export const encryptValue = (value: string): string => {
  if (isEncrypted(value)) {
    return value;
  }
  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv('aes-256-gcm', key, iv);
  const encrypted = Buffer.concat([cipher.update(value, 'utf8'), cipher.final()]);
  const authTag = cipher.getAuthTag();
  return `${SECRET_PREFIX}${Buffer.concat([iv, authTag, encrypted]).toString('base64')}`;
};

export const decryptValue = (value: string): string => {
  if (!isEncrypted(value)) {
    return value;
  }
  const payload = Buffer.from(value.slice(SECRET_PREFIX.length), 'base64');
  const iv = payload.subarray(0, IV_LENGTH);
  const tag = payload.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
  const ciphertext = payload.subarray(IV_LENGTH + TAG_LENGTH);
  const decipher = crypto.createDecipheriv('aes-256-gcm', key, iv);
  decipher.setAuthTag(tag);
  return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
};

export const maskValue = (value: string): string => (value.length > 0 ? MASK : value);
