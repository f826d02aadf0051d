import { IntegerSchema } from '@ledgerline/core';
import { z } from 'zod';

/**
 * Credentials of the key/secret exchanges. `nonce` resumes a key that has already signed requests.
 */
export const SignedCredentialsSchema = z.object({
  apiKey: z.string().min(1, 'apiKey is required'),
  secret: z.string().min(1, 'secret is required'),
  nonce: IntegerSchema.pipe(
    z.number().int().nonnegative().refine(Number.isSafeInteger, 'nonce must be a safe integer')
  ).optional(),
});

export type SignedCredentials = z.infer<typeof SignedCredentialsSchema>;
