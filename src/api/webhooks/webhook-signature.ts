import { createHmac, timingSafeEqual } from 'node:crypto';
import { createParamDecorator, ExecutionContext, RawBodyRequest } from '@nestjs/common';
import type { Request } from 'express';

const PREFIX = 'sha256=';

/** X-Hub-Signature-256 check: "sha256=" + hex HMAC-SHA256 of the raw request body. */
export function verifyWebhookSignature(
  rawBody: Buffer | undefined,
  header: string | undefined,
  secret: string,
): boolean {
  if (!rawBody || !header?.startsWith(PREFIX)) return false;
  const expected = createHmac('sha256', secret).update(rawBody).digest();
  const received = Buffer.from(header.slice(PREFIX.length), 'hex');
  return received.length === expected.length && timingSafeEqual(received, expected);
}

/** Raw request body; requires NestFactory.create(..., { rawBody: true }). */
export const RawBody = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Buffer | undefined =>
    ctx.switchToHttp().getRequest<RawBodyRequest<Request>>().rawBody,
);
