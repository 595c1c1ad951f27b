import {z} from 'zod';

import {createCredential, type Credential} from './credential';
import {TokenAcquisitionError} from './errors';
import type {AcquireCredential} from './tokenCache';

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>;

export const DEFAULT_TOKEN_SCOPE = 'all-apis';

export const buildDefaultTokenEndpoint = (accountId: string) =>
  `https://accounts.azuredatabricks.net/oidc/accounts/${encodeURIComponent(accountId)}/v1/token`;

export const ClientCredentialsConfigSchema = z
  .object({
    account_id: z.string().trim().min(1),
    client_id: z.string().trim().min(1),
    client_secret: z.string().min(1),
    scope: z.string().trim().min(1).default(DEFAULT_TOKEN_SCOPE),
    token_endpoint: z.string().url().optional(),
    timeout_ms: z.number().int().min(100).max(60_000).default(10_000)
  })
  .strict();

export type ClientCredentialsConfig = z.input<typeof ClientCredentialsConfigSchema>;

const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.number().int().positive(),
    token_type: z.string().optional()
  })
  .passthrough();

const encodeBasicAuth = ({clientId, clientSecret}: {clientId: string; clientSecret: string}) =>
  `Basic ${Buffer.from(`${clientId}:${clientSecret}`, 'utf8').toString('base64')}`;

const mapFetchError = ({error, timeoutMs}: {error: unknown; timeoutMs: number}) => {
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new TokenAcquisitionError({
      code: 'token_request_timeout',
      message: `Token request timed out after ${timeoutMs}ms`
    });
  }

  return new TokenAcquisitionError({
    code: 'token_request_failed',
    message: error instanceof Error ? `Token request failed: ${error.message}` : 'Token request failed'
  });
};

export const createClientCredentialsAcquirer = ({
  config,
  fetchImpl = fetch
}: {
  config: ClientCredentialsConfig;
  fetchImpl?: FetchLike;
}): AcquireCredential => {
  const parsedConfig = ClientCredentialsConfigSchema.parse(config);
  const tokenEndpoint = parsedConfig.token_endpoint ?? buildDefaultTokenEndpoint(parsedConfig.account_id);
  const authorization = encodeBasicAuth({
    clientId: parsedConfig.client_id,
    clientSecret: parsedConfig.client_secret
  });

  return async ({now}): Promise<Credential> => {
    let response: Response;
    try {
      response = await fetchImpl(tokenEndpoint, {
        method: 'POST',
        headers: {
          accept: 'application/json',
          authorization,
          'content-type': 'application/x-www-form-urlencoded'
        },
        body: new URLSearchParams({
          grant_type: 'client_credentials',
          scope: parsedConfig.scope
        }).toString(),
        redirect: 'manual',
        signal: AbortSignal.timeout(parsedConfig.timeout_ms)
      });
    } catch (error) {
      throw mapFetchError({error, timeoutMs: parsedConfig.timeout_ms});
    }

    if (!response.ok) {
      throw new TokenAcquisitionError({
        code: 'token_endpoint_rejected',
        message: `Token endpoint responded with status ${response.status}`,
        statusCode: response.status
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new TokenAcquisitionError({
        code: 'token_response_invalid',
        message: 'Token endpoint response is not valid JSON'
      });
    }

    const parsedBody = TokenResponseSchema.safeParse(body);
    if (!parsedBody.success) {
      throw new TokenAcquisitionError({
        code: 'token_response_invalid',
        message: 'Token endpoint response is missing access_token or expires_in'
      });
    }

    return createCredential({
      bearer_value: parsedBody.data.access_token,
      issued_at: new Date(now.getTime()),
      expires_at: new Date(now.getTime() + parsedBody.data.expires_in * 1000),
      scope: parsedConfig.account_id
    });
  };
};
