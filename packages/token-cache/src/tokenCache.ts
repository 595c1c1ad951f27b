import {createNoopLogger, type StructuredLogger} from '@share-gateway/logging';
import {z} from 'zod';

import {remainingLifetimeMs, type Credential} from './credential';
import {TokenAcquisitionError, toTokenAcquisitionError} from './errors';

export const DEFAULT_REFRESH_BUFFER_MS = 300_000;

export type AcquireCredential = (input: {now: Date}) => Promise<Credential>;

export const TokenCacheConfigSchema = z
  .object({
    refresh_buffer_ms: z.number().int().gte(0).default(DEFAULT_REFRESH_BUFFER_MS)
  })
  .strict();

export type TokenCacheConfig = z.input<typeof TokenCacheConfigSchema>;

export type TokenCache = {
  /** Returns a credential whose remaining lifetime exceeds the refresh buffer at `now`. */
  getCredential: (now: Date) => Promise<Credential>;
  /** Forces an acquisition; joins one that is already in flight. */
  refresh: (now: Date) => Promise<Credential>;
  /** Drops `credential` if it is still the cached one; a newer credential is kept. */
  invalidate: (credential: Credential) => void;
  peek: () => Credential | null;
};

export const createTokenCache = ({
  acquire,
  config = {},
  logger = createNoopLogger()
}: {
  acquire: AcquireCredential;
  config?: TokenCacheConfig;
  logger?: StructuredLogger;
}): TokenCache => {
  const {refresh_buffer_ms: refreshBufferMs} = TokenCacheConfigSchema.parse(config);

  let current: Credential | null = null;
  let inflight: Promise<Credential> | null = null;

  const isUsable = ({credential, now}: {credential: Credential; now: Date}) =>
    remainingLifetimeMs({credential, now}) > refreshBufferMs;

  const acquireAndStore = async (now: Date): Promise<Credential> => {
    const startedAt = Date.now();
    logger.info({
      event: 'token.acquisition.started',
      component: 'token.cache',
      message: 'Acquiring access credential'
    });

    try {
      const credential = await acquire({now});
      if (!isUsable({credential, now})) {
        throw new TokenAcquisitionError({
          code: 'token_lifetime_too_short',
          message: `Issued credential lifetime does not exceed the ${refreshBufferMs}ms refresh buffer`
        });
      }

      current = credential;
      logger.info({
        event: 'token.acquisition.succeeded',
        component: 'token.cache',
        message: 'Access credential acquired',
        duration_ms: Date.now() - startedAt,
        metadata: {
          scope: credential.scope,
          expires_at: credential.expires_at
        }
      });
      return credential;
    } catch (error) {
      const acquisitionError = toTokenAcquisitionError(error);
      logger.error({
        event: 'token.acquisition.failed',
        component: 'token.cache',
        message: acquisitionError.message,
        reason_code: acquisitionError.code,
        duration_ms: Date.now() - startedAt
      });
      throw acquisitionError;
    }
  };

  const startAcquisition = (now: Date): Promise<Credential> => {
    if (inflight) {
      return inflight;
    }

    const pending = acquireAndStore(now).finally(() => {
      if (inflight === pending) {
        inflight = null;
      }
    });
    inflight = pending;
    return pending;
  };

  return {
    getCredential: now => {
      if (current && isUsable({credential: current, now})) {
        logger.debug({
          event: 'token.cache.reused',
          component: 'token.cache'
        });
        return Promise.resolve(current);
      }

      return startAcquisition(now);
    },
    refresh: now => startAcquisition(now),
    invalidate: credential => {
      if (current === credential) {
        current = null;
      }
    },
    peek: () => current
  };
};
