import { createHmac } from 'node:crypto';
import { verifyWebhookSignature } from './webhook-signature';

describe('verifyWebhookSignature', () => {
  const body = Buffer.from('{"ref":"refs/heads/main"}');
  const digest = createHmac('sha256', 'test-secret').update(body).digest('hex');

  it('accepts the HMAC of the raw body', () => {
    expect(verifyWebhookSignature(body, `sha256=${digest}`, 'test-secret')).toBe(true);
  });

  it('rejects another secret or another body', () => {
    expect(verifyWebhookSignature(body, `sha256=${digest}`, 'other-secret')).toBe(false);
    expect(verifyWebhookSignature(Buffer.from('{}'), `sha256=${digest}`, 'test-secret')).toBe(false);
  });

  it('rejects missing, unprefixed and truncated signatures', () => {
    expect(verifyWebhookSignature(body, undefined, 'test-secret')).toBe(false);
    expect(verifyWebhookSignature(body, digest, 'test-secret')).toBe(false);
    expect(verifyWebhookSignature(body, `sha256=${digest.slice(0, 10)}`, 'test-secret')).toBe(false);
    expect(verifyWebhookSignature(undefined, `sha256=${digest}`, 'test-secret')).toBe(false);
  });
});
