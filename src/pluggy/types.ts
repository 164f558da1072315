/**
 * Pluggy API response schemas.
 *
 * Responses are parsed with these right after JSON decoding; extra fields
 * are ignored, missing or empty required fields fail the parse.
 */

import { z } from 'zod';

export const AuthResponseSchema = z.object({
  apiKey: z.string().min(1),
});

export const ConnectTokenResponseSchema = z.object({
  accessToken: z.string().min(1),
});

/** Anything that can hand out a connect token for a user id. */
export interface ConnectTokenIssuer {
  createConnectToken(clientUserId?: string): Promise<string>;
}
