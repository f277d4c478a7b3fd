import crypto from 'crypto';

/** LINE signs the raw request body: base64(HMAC-SHA256(channelSecret, body)). */
export function computeSignature(body: Buffer | string, channelSecret: string): string {
  return crypto.createHmac('sha256', channelSecret).update(body).digest('base64');
}

export function verifySignature(body: Buffer | string, signature: string, channelSecret: string): boolean {
  const expected = Buffer.from(computeSignature(body, channelSecret));
  const received = Buffer.from(signature);
  if (expected.length !== received.length) {
    return false;
  }
  return crypto.timingSafeEqual(expected, received);
}
