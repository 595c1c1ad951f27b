import {z} from 'zod';

export const CredentialSchema = z
  .object({
    bearer_value: z.string().min(1),
    issued_at: z.date(),
    expires_at: z.date(),
    scope: z.string().min(1)
  })
  .strict()
  .refine(value => value.expires_at.getTime() > value.issued_at.getTime(), {
    message: 'expires_at must be after issued_at',
    path: ['expires_at']
  });

export type Credential = Readonly<z.infer<typeof CredentialSchema>>;

export const createCredential = (input: z.input<typeof CredentialSchema>): Credential =>
  Object.freeze(CredentialSchema.parse(input));

export const remainingLifetimeMs = ({credential, now}: {credential: Credential; now: Date}) =>
  credential.expires_at.getTime() - now.getTime();
