import {z} from 'zod';

import {SharingApiError, SharingTransportError} from './errors';
import {
  EmptyResponseSchema,
  ListRecipientsResponseSchema,
  ListSharesResponseSchema,
  RecipientInfoSchema,
  ServiceErrorBodySchema,
  ShareInfoSchema,
  type CreateRecipientInput,
  type CreateShareInput,
  type RecipientInfo,
  type ShareInfo,
  type UpdateRecipientInput,
  type UpdateShareInput
} from './schemas';

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>;

export const UNITY_CATALOG_API_PREFIX = '/api/2.1/unity-catalog';
export const DEFAULT_PAGE_SIZE = 100;

type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

type QueryValue = string | number | boolean | undefined;

export type ListInput = {
  maxResults?: number;
  prefix?: string;
};

export type SharingClient = {
  listShares: (input?: ListInput) => Promise<ShareInfo[]>;
  getShare: (name: string) => Promise<ShareInfo>;
  createShare: (input: CreateShareInput) => Promise<ShareInfo>;
  updateShare: (name: string, input: UpdateShareInput) => Promise<ShareInfo>;
  deleteShare: (name: string) => Promise<void>;
  listRecipients: (input?: ListInput) => Promise<RecipientInfo[]>;
  getRecipient: (name: string) => Promise<RecipientInfo>;
  createRecipient: (input: CreateRecipientInput) => Promise<RecipientInfo>;
  updateRecipient: (name: string, input: UpdateRecipientInput) => Promise<void>;
  deleteRecipient: (name: string) => Promise<void>;
  rotateRecipientToken: (
    name: string,
    input: {existing_token_expire_in_seconds: number}
  ) => Promise<RecipientInfo>;
};

export type SharingClientOptions = {
  destination: {origin: string};
  credential: {bearer_value: string};
  fetchImpl?: FetchLike;
  timeoutMs?: number;
};

const buildUrl = ({
  origin,
  path,
  query
}: {
  origin: string;
  path: string;
  query?: Record<string, QueryValue>;
}) => {
  const url = new URL(`${UNITY_CATALOG_API_PREFIX}${path}`, origin);
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
};

const mapFetchError = ({error, timeoutMs}: {error: unknown; timeoutMs: number}) => {
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new SharingTransportError('timeout', `Sharing service request timed out after ${timeoutMs}ms`);
  }

  return new SharingTransportError(
    'network_error',
    error instanceof Error ? `Sharing service request failed: ${error.message}` : 'Sharing service request failed'
  );
};

const parseJsonText = (text: string): {ok: true; value: unknown} | {ok: false} => {
  if (text.trim().length === 0) {
    return {ok: true, value: {}};
  }
  try {
    const value: unknown = JSON.parse(text);
    return {ok: true, value};
  } catch {
    return {ok: false};
  }
};

const toApiError = ({status, text}: {status: number; text: string}) => {
  const parsed = parseJsonText(text);
  const body = parsed.ok ? ServiceErrorBodySchema.safeParse(parsed.value) : undefined;
  const errorCode = body?.success ? body.data.error_code : undefined;
  const message = body?.success && body.data.message ? body.data.message : `Sharing service responded with status ${status}`;

  return new SharingApiError({
    statusCode: status,
    message,
    ...(errorCode ? {errorCode} : {})
  });
};

const pathSegment = (value: string) => encodeURIComponent(value);

const matchesPrefix = (name: string, prefix: string | undefined) =>
  prefix === undefined || prefix.length === 0 || name.includes(prefix);

export const createSharingClient = ({
  destination,
  credential,
  fetchImpl = fetch,
  timeoutMs = 30_000
}: SharingClientOptions): SharingClient => {
  const request = async <T>({
    method,
    path,
    query,
    body,
    schema
  }: {
    method: HttpMethod;
    path: string;
    query?: Record<string, QueryValue>;
    body?: unknown;
    schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  }): Promise<T> => {
    let response: Response;
    try {
      response = await fetchImpl(buildUrl({origin: destination.origin, path, query}), {
        method,
        headers: {
          accept: 'application/json',
          authorization: `Bearer ${credential.bearer_value}`,
          ...(body !== undefined ? {'content-type': 'application/json'} : {})
        },
        ...(body !== undefined ? {body: JSON.stringify(body)} : {}),
        redirect: 'manual',
        signal: AbortSignal.timeout(timeoutMs)
      });
    } catch (error) {
      throw mapFetchError({error, timeoutMs});
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw mapFetchError({error, timeoutMs});
    }

    if (!response.ok) {
      throw toApiError({status: response.status, text});
    }

    const parsedJson = parseJsonText(text);
    if (!parsedJson.ok) {
      throw new SharingTransportError('invalid_response', 'Sharing service response is not valid JSON');
    }

    const parsed = schema.safeParse(parsedJson.value);
    if (!parsed.success) {
      throw new SharingTransportError(
        'invalid_response',
        `Sharing service response failed validation: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`
      );
    }

    return parsed.data;
  };

  const collectPages = async <T>({
    fetchPage
  }: {
    fetchPage: (pageToken: string | undefined) => Promise<{items: T[]; nextPageToken?: string}>;
  }): Promise<T[]> => {
    const items: T[] = [];
    const seenTokens = new Set<string>();
    let pageToken: string | undefined;

    do {
      const page = await fetchPage(pageToken);
      items.push(...page.items);
      pageToken = page.nextPageToken && page.nextPageToken.length > 0 ? page.nextPageToken : undefined;
      if (pageToken !== undefined) {
        if (seenTokens.has(pageToken)) {
          break;
        }
        seenTokens.add(pageToken);
      }
    } while (pageToken !== undefined);

    return items;
  };

  return {
    listShares: async ({maxResults = DEFAULT_PAGE_SIZE, prefix} = {}) => {
      const shares = await collectPages({
        fetchPage: async pageToken => {
          const page = await request({
            method: 'GET',
            path: '/shares',
            query: {max_results: maxResults, page_token: pageToken},
            schema: ListSharesResponseSchema
          });
          return {items: page.shares ?? [], nextPageToken: page.next_page_token};
        }
      });
      return shares.filter(share => matchesPrefix(share.name, prefix));
    },
    getShare: name =>
      request({
        method: 'GET',
        path: `/shares/${pathSegment(name)}`,
        query: {include_shared_data: true},
        schema: ShareInfoSchema
      }),
    createShare: input =>
      request({
        method: 'POST',
        path: '/shares',
        body: input,
        schema: ShareInfoSchema
      }),
    updateShare: (name, input) =>
      request({
        method: 'PATCH',
        path: `/shares/${pathSegment(name)}`,
        body: input,
        schema: ShareInfoSchema
      }),
    deleteShare: async name => {
      await request({
        method: 'DELETE',
        path: `/shares/${pathSegment(name)}`,
        schema: EmptyResponseSchema
      });
    },
    listRecipients: async ({maxResults = DEFAULT_PAGE_SIZE, prefix} = {}) => {
      const recipients = await collectPages({
        fetchPage: async pageToken => {
          const page = await request({
            method: 'GET',
            path: '/recipients',
            query: {max_results: maxResults, page_token: pageToken},
            schema: ListRecipientsResponseSchema
          });
          return {items: page.recipients ?? [], nextPageToken: page.next_page_token};
        }
      });
      return recipients.filter(recipient => matchesPrefix(recipient.name, prefix));
    },
    getRecipient: name =>
      request({
        method: 'GET',
        path: `/recipients/${pathSegment(name)}`,
        schema: RecipientInfoSchema
      }),
    createRecipient: input =>
      request({
        method: 'POST',
        path: '/recipients',
        body: input,
        schema: RecipientInfoSchema
      }),
    updateRecipient: async (name, input) => {
      await request({
        method: 'PATCH',
        path: `/recipients/${pathSegment(name)}`,
        body: input,
        schema: EmptyResponseSchema
      });
    },
    deleteRecipient: async name => {
      await request({
        method: 'DELETE',
        path: `/recipients/${pathSegment(name)}`,
        schema: EmptyResponseSchema
      });
    },
    rotateRecipientToken: (name, input) =>
      request({
        method: 'POST',
        path: `/recipients/${pathSegment(name)}/rotate-token`,
        body: input,
        schema: RecipientInfoSchema
      })
  };
};
