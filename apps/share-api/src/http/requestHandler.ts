import {type IncomingMessage, type ServerResponse} from 'node:http';
import {randomUUID} from 'node:crypto';

import {runWithLogContext, setLogContextFields} from '@share-gateway/logging';

import {INTERNAL_ERROR_MESSAGE, internal, isAppError} from '../errors';
import {decodePathParam, extractCorrelationId, sendError} from '../http';
import type {ShareApiRuntime} from '../runtime';
import {handleFallbackRoute} from './routes/fallbackRoute';
import {handleHealthLiveRoute, handleHealthReadyRoute, handleHealthRoute} from './routes/healthRoutes';
import {
  handleAddRecipientIpsRoute,
  handleCreateRecipientD2DRoute,
  handleCreateRecipientD2ORoute,
  handleDeleteRecipientRoute,
  handleGetRecipientRoute,
  handleListRecipientsRoute,
  handleRevokeRecipientIpsRoute,
  handleRotateRecipientTokenRoute,
  handleUpdateRecipientDescriptionRoute,
  handleUpdateRecipientExpirationRoute
} from './routes/recipientRoutes';
import {
  handleAddShareDataObjectsRoute,
  handleCreateShareRoute,
  handleDeleteShareRoute,
  handleGetShareRoute,
  handleListSharesRoute
} from './routes/shareRoutes';
import type {
  ShareApiRouteHandler,
  ShareApiRouteHandlers,
  ShareApiRouteKind,
  ShareApiRouteLogicHandler
} from './routes/types';

export const shareApiRoutePatterns = {
  health: '/health',
  healthLive: '/health/live',
  healthReady: '/health/ready',
  listShares: '/shares',
  getShare: '/shares/:name',
  createShare: '/shares',
  deleteShare: '/shares/:name',
  addShareDataObjects: '/shares/:name/data-objects',
  listRecipients: '/recipients',
  getRecipient: '/recipients/:name',
  createRecipientD2D: '/recipients/d2d/:name',
  createRecipientD2O: '/recipients/d2o/:name',
  deleteRecipient: '/recipients/:name',
  rotateRecipientToken: '/recipients/:name/token/rotate',
  addRecipientIps: '/recipients/:name/ipaddress/add',
  revokeRecipientIps: '/recipients/:name/ipaddress/revoke',
  updateRecipientDescription: '/recipients/:name/description',
  updateRecipientExpiration: '/recipients/:name/expiration',
  fallback: '*'
} as const satisfies Record<ShareApiRouteKind, string>;

const routeLogicHandlers: Record<ShareApiRouteKind, ShareApiRouteLogicHandler> = {
  health: handleHealthRoute,
  healthLive: handleHealthLiveRoute,
  healthReady: handleHealthReadyRoute,
  listShares: handleListSharesRoute,
  getShare: handleGetShareRoute,
  createShare: handleCreateShareRoute,
  deleteShare: handleDeleteShareRoute,
  addShareDataObjects: handleAddShareDataObjectsRoute,
  listRecipients: handleListRecipientsRoute,
  getRecipient: handleGetRecipientRoute,
  createRecipientD2D: handleCreateRecipientD2DRoute,
  createRecipientD2O: handleCreateRecipientD2ORoute,
  deleteRecipient: handleDeleteRecipientRoute,
  rotateRecipientToken: handleRotateRecipientTokenRoute,
  addRecipientIps: handleAddRecipientIpsRoute,
  revokeRecipientIps: handleRevokeRecipientIpsRoute,
  updateRecipientDescription: handleUpdateRecipientDescriptionRoute,
  updateRecipientExpiration: handleUpdateRecipientExpirationRoute,
  fallback: handleFallbackRoute
};

const readStringProperty = (value: object, key: string): string | undefined => {
  const property: unknown = Reflect.get(value, key);
  return typeof property === 'string' ? property : undefined;
};

const getRawRequestUrl = (request: IncomingMessage) => {
  // Express rewrites `url` for mounted routers; `originalUrl` keeps the full path.
  const originalUrl = readStringProperty(request, 'originalUrl');
  if (originalUrl !== undefined && originalUrl.length > 0) {
    return originalUrl;
  }

  return request.url ?? '/';
};

const parseUrl = (request: IncomingMessage) => {
  const host = request.headers.host ?? 'localhost';
  return new URL(getRawRequestUrl(request), `https://${host}`);
};

const sanitizeRouteForLog = ({rawUrl}: {rawUrl: string | undefined}) => {
  if (!rawUrl) {
    return '/';
  }

  const routeWithoutQuery = rawUrl.split('?', 1)[0] ?? '';
  const routeWithoutFragment = routeWithoutQuery.split('#', 1)[0] ?? '';
  return routeWithoutFragment.length > 0 ? routeWithoutFragment : '/';
};

const splitPath = (path: string) => path.split('/').filter(segment => segment.length > 0);

/** Extracts `:param` segments of `pattern` from `pathname`. Returns an empty record when the shapes differ. */
export const matchPathParams = ({pattern, pathname}: {pattern: string; pathname: string}) => {
  const patternSegments = splitPath(pattern);
  const pathSegments = splitPath(pathname);
  const params: Record<string, string> = {};

  if (patternSegments.length !== pathSegments.length) {
    return params;
  }

  for (const [index, patternSegment] of patternSegments.entries()) {
    const pathSegment = pathSegments[index];
    if (pathSegment === undefined) {
      return {};
    }

    if (patternSegment.startsWith(':')) {
      params[patternSegment.slice(1)] = decodePathParam(pathSegment);
    } else if (patternSegment !== pathSegment) {
      return {};
    }
  }

  return params;
};

export const createShareApiRouteHandlers = ({runtime}: {runtime: ShareApiRuntime}): ShareApiRouteHandlers => {
  const {logger, now} = runtime;

  const createRouteHandler = ({routeKind}: {routeKind: ShareApiRouteKind}): ShareApiRouteHandler => {
    const routeLogicHandler = routeLogicHandlers[routeKind];
    const pattern = shareApiRoutePatterns[routeKind];

    return (request: IncomingMessage, response: ServerResponse) => {
      const correlationId = extractCorrelationId(request);
      const requestId = randomUUID();
      const startedAtMs = now().getTime();
      const requestMethod = request.method ?? 'GET';

      return runWithLogContext(
        {
          correlation_id: correlationId,
          request_id: requestId,
          method: requestMethod
        },
        async () => {
          let pathname = '/';
          let responseReasonCode: string | undefined;

          logger.info({
            event: 'request.received',
            component: 'http.server',
            message: 'Request received',
            route: sanitizeRouteForLog({rawUrl: getRawRequestUrl(request)}),
            method: requestMethod
          });

          try {
            const url = parseUrl(request);
            pathname = url.pathname;

            setLogContextFields({
              route: pathname,
              method: requestMethod
            });

            await routeLogicHandler({
              request,
              response,
              correlationId,
              method: requestMethod,
              pathname,
              searchParams: url.searchParams,
              params: matchPathParams({pattern, pathname}),
              runtime
            });
          } catch (error) {
            if (isAppError(error)) {
              responseReasonCode = error.reason ?? error.code;
              logger.warn({
                event: 'request.rejected',
                component: 'http.server',
                message: `Request rejected: ${error.code}`,
                reason_code: responseReasonCode,
                route: pathname,
                method: requestMethod
              });

              sendError({
                response,
                status: error.status,
                error: error.code,
                message: error.message,
                correlationId,
                ...(error.reason ? {reason: error.reason} : {})
              });
              return;
            }

            const failure = internal('internal_error', INTERNAL_ERROR_MESSAGE);
            responseReasonCode = failure.code;
            logger.error({
              event: 'request.failed',
              component: 'http.server',
              message: failure.message,
              reason_code: failure.code,
              route: pathname,
              method: requestMethod,
              metadata: {
                error
              }
            });

            sendError({
              response,
              status: failure.status,
              error: failure.code,
              message: failure.message,
              correlationId
            });
          } finally {
            const durationMs = Math.max(0, now().getTime() - startedAtMs);
            const statusCode = response.statusCode;
            const baseLog = {
              event: 'request.completed',
              component: 'http.server',
              message: 'Request completed',
              route: pathname,
              method: requestMethod,
              status_code: statusCode,
              duration_ms: durationMs,
              ...(responseReasonCode ? {reason_code: responseReasonCode} : {})
            };

            if (statusCode >= 500) {
              logger.error(baseLog);
            } else if (statusCode >= 400) {
              logger.warn(baseLog);
            } else {
              logger.info(baseLog);
            }
          }
        }
      );
    };
  };

  const handlers: ShareApiRouteHandlers = {
    health: createRouteHandler({routeKind: 'health'}),
    healthLive: createRouteHandler({routeKind: 'healthLive'}),
    healthReady: createRouteHandler({routeKind: 'healthReady'}),
    listShares: createRouteHandler({routeKind: 'listShares'}),
    getShare: createRouteHandler({routeKind: 'getShare'}),
    createShare: createRouteHandler({routeKind: 'createShare'}),
    deleteShare: createRouteHandler({routeKind: 'deleteShare'}),
    addShareDataObjects: createRouteHandler({routeKind: 'addShareDataObjects'}),
    listRecipients: createRouteHandler({routeKind: 'listRecipients'}),
    getRecipient: createRouteHandler({routeKind: 'getRecipient'}),
    createRecipientD2D: createRouteHandler({routeKind: 'createRecipientD2D'}),
    createRecipientD2O: createRouteHandler({routeKind: 'createRecipientD2O'}),
    deleteRecipient: createRouteHandler({routeKind: 'deleteRecipient'}),
    rotateRecipientToken: createRouteHandler({routeKind: 'rotateRecipientToken'}),
    addRecipientIps: createRouteHandler({routeKind: 'addRecipientIps'}),
    revokeRecipientIps: createRouteHandler({routeKind: 'revokeRecipientIps'}),
    updateRecipientDescription: createRouteHandler({routeKind: 'updateRecipientDescription'}),
    updateRecipientExpiration: createRouteHandler({routeKind: 'updateRecipientExpiration'}),
    fallback: createRouteHandler({routeKind: 'fallback'})
  };

  return handlers;
};
