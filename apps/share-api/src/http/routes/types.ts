import type {IncomingMessage, ServerResponse} from 'node:http'

import type {ShareApiRuntime} from '../../runtime'

export type RouteHandlerContext = {
  request: IncomingMessage
  response: ServerResponse
  correlationId: string
  method: string
  pathname: string
  searchParams: URLSearchParams
  params: Record<string, string>
  runtime: ShareApiRuntime
}

export type ShareApiRouteKind =
  | 'health'
  | 'healthLive'
  | 'healthReady'
  | 'listShares'
  | 'getShare'
  | 'createShare'
  | 'deleteShare'
  | 'addShareDataObjects'
  | 'listRecipients'
  | 'getRecipient'
  | 'createRecipientD2D'
  | 'createRecipientD2O'
  | 'deleteRecipient'
  | 'rotateRecipientToken'
  | 'addRecipientIps'
  | 'revokeRecipientIps'
  | 'updateRecipientDescription'
  | 'updateRecipientExpiration'
  | 'fallback'

export type ShareApiRouteLogicHandler = (context: RouteHandlerContext) => void | Promise<void>

export type ShareApiRouteHandler = (request: IncomingMessage, response: ServerResponse) => Promise<void>

export type ShareApiRouteHandlers = Record<ShareApiRouteKind, ShareApiRouteHandler>
