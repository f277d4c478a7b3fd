import { describe, it, expect } from 'vitest';
import crypto from 'crypto';
import { computeSignature, verifySignature } from './signature.js';

const SECRET = 'test-secret';
const BODY = '{"events":[]}';

describe('LINE signature', () => {
  it('should compute a base64 HMAC-SHA256 of the body', () => {
    const expected = crypto.createHmac('sha256', SECRET).update(BODY).digest('base64');

    expect(computeSignature(BODY, SECRET)).toBe(expected);
  });

  it('should accept a matching signature', () => {
    expect(verifySignature(Buffer.from(BODY), computeSignature(BODY, SECRET), SECRET)).toBe(true);
  });

  it('should reject a signature made with another secret', () => {
    expect(verifySignature(BODY, computeSignature(BODY, 'other-secret'), SECRET)).toBe(false);
  });

  it('should reject a signature of a different length', () => {
    expect(verifySignature(BODY, 'short', SECRET)).toBe(false);
  });
});
