import { z } from 'zod';
import { InvalidSendKeyError } from '../core/errors.js';

export const DEFAULT_API_BASE = 'https://sctapi.ftqq.com';

const sendKeySchema = z
  .string()
  .trim()
  .min(1, 'send key is empty')
  .regex(/^[^\s/]*$/, 'send key contains whitespace or "/"');

// Server酱³ keys embed the account uid: sctp{uid}t...
const SC3_KEY = /^sctp(\d+)t/;

export const maskSendKey = (sendKey: string): string => `${sendKey.slice(0, 4)}***`;

export const validateSendKey = (sendKey: string): string => {
  const parsed = sendKeySchema.safeParse(sendKey);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((i) => i.message).join('; ');
    throw new InvalidSendKeyError(`Invalid send key: ${reason}`);
  }
  return parsed.data;
};

export const resolveEndpoint = (sendKey: string): string => {
  const sc3 = SC3_KEY.exec(sendKey);
  if (sc3) return `https://${sc3[1]}.push.ft07.com/send/${sendKey}.send`;
  return `${DEFAULT_API_BASE}/${sendKey}.send`;
};

/** Replace every occurrence of the key in free text (error messages, URLs). */
export const redactSendKey = (text: string, sendKey: string): string =>
  text.split(sendKey).join(maskSendKey(sendKey));
