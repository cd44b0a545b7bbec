/**
 * Controller for the newsletter signup endpoint.
 *
 * Validates the submitted address and hands it to a SignupSink. The response body is
 * always `{ ok: boolean, error?: string }` so the client script can read it without
 * inspecting status codes.
 */

import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import type { SignupSink } from './store.js';

export type SubscribeErrorCode = 'method_not_allowed' | 'invalid_email' | 'storage_unavailable';

export type SubscribeResult = { ok: true } | { ok: false; error: SubscribeErrorCode };

/**
 * The part of an express request the controller reads
 */
export interface SubscribeRequest {
  body?: unknown;
}

/**
 * The part of an express response the controller writes
 */
export interface JsonResponder {
  status(code: number): JsonResponder;
  json(body: SubscribeResult): unknown;
}

const emailSchema = z.string().trim().email();

const subscribeBodySchema = z.object({
  email: emailSchema,
});

/**
 * Extract a storable email address from a request body, or null when invalid
 */
export function parseSignupEmail(body: unknown): string | null {
  const result = subscribeBodySchema.safeParse(body);
  if (!result.success) {
    return null;
  }
  return result.data.email.replace(/[\r\n]/g, '');
}

export class SubscribeController {
  constructor(private readonly sink: SignupSink) {}

  /**
   * POST /subscribe
   *
   * Accepts `email` from a urlencoded or JSON body. Any other field is ignored:
   * the signup is always stored locally.
   */
  subscribe = async (req: SubscribeRequest, res: JsonResponder): Promise<void> => {
    const email = parseSignupEmail(req.body);
    if (email === null) {
      res.status(400).json({ ok: false, error: 'invalid_email' });
      return;
    }

    try {
      await this.sink.append(email);
    } catch (error) {
      getLogger().error(
        `Failed to store signup: ${error instanceof Error ? error.message : String(error)}`
      );
      res.status(500).json({ ok: false, error: 'storage_unavailable' });
      return;
    }

    getLogger().debug('Stored newsletter signup');
    res.status(200).json({ ok: true });
  };

  /**
   * Any method other than POST on /subscribe
   */
  methodNotAllowed = (_req: SubscribeRequest, res: JsonResponder): void => {
    res.status(405).json({ ok: false, error: 'method_not_allowed' });
  };
}
