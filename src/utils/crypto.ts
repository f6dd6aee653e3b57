import crypto from 'crypto';

export const sha256Hex = (value: string | Buffer): string =>
  crypto.createHash('sha256').update(value).digest('hex');

export const sha256Digest = (value: string | Buffer): Buffer => crypto.createHash('sha256').update(value).digest();

export const md5Hex = (value: string | Buffer): string => crypto.createHash('md5').update(value).digest('hex');

export const hmacSha256Hex = (key: string | Buffer, value: string | Buffer): string =>
  crypto.createHmac('sha256', key).update(value).digest('hex');

/** Constant-time string comparison; unequal lengths compare false. */
export const safeEqual = (a: string, b: string): boolean => {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) {
    return false;
  }
  return crypto.timingSafeEqual(left, right);
};
