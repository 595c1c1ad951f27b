import {z} from 'zod'

import {unwrapResult} from '../../errors'
import {parseJsonBody, parseQuery, requireWorkspaceUrl, sendJson, sendNoContent} from '../../http'
import {describeCount, ListQuerySchema, NonBlankStringSchema, requirePathParam} from './shared'
import type {ShareApiRouteLogicHandler} from './types'

const CreateShareBodySchema = z
  .object({
    name: NonBlankStringSchema,
    description: NonBlankStringSchema,
    storage_root: NonBlankStringSchema.optional()
  })
  .strict()

const DataObjectsBodySchema = z
  .object({
    tables: z.array(z.string()).optional(),
    views: z.array(z.string()).optional(),
    schemas: z.array(z.string()).optional()
  })
  .strict()

export const handleListSharesRoute: ShareApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  searchParams,
  runtime
}) => {
  const workspaceUrl = requireWorkspaceUrl(request)
  const query = parseQuery({searchParams, schema: ListQuerySchema})

  const shares = unwrapResult(
    await runtime.operations.listShares(workspaceUrl, {
      pageSize: query.page_size,
      ...(query.prefix ? {prefix: query.prefix} : {})
    })
  )

  sendJson({
    response,
    status: 200,
    correlationId,
    payload: {
      message: describeCount({count: shares.length, noun: 'share'}),
      shares
    }
  })
}

export const handleGetShareRoute: ShareApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  params,
  runtime
}) => {
  const workspaceUrl = requireWorkspaceUrl(request)
  const share = unwrapResult(await runtime.operations.getShare(workspaceUrl, requirePathParam(params, 'name')))

  sendJson({response, status: 200, correlationId, payload: share})
}

export const handleCreateShareRoute: ShareApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  runtime
}) => {
  const workspaceUrl = requireWorkspaceUrl(request)
  const body = await parseJsonBody({
    request,
    schema: CreateShareBodySchema,
    maxBodyBytes: runtime.config.maxBodyBytes
  })

  const share = unwrapResult(await runtime.operations.createShare(workspaceUrl, body))

  sendJson({response, status: 201, correlationId, payload: share})
}

export const handleDeleteShareRoute: ShareApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  params,
  runtime
}) => {
  const workspaceUrl = requireWorkspaceUrl(request)
  unwrapResult(await runtime.operations.deleteShare(workspaceUrl, requirePathParam(params, 'name')))

  sendNoContent({response, correlationId})
}

export const handleAddShareDataObjectsRoute: ShareApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  params,
  runtime
}) => {
  const workspaceUrl = requireWorkspaceUrl(request)
  const body = await parseJsonBody({
    request,
    schema: DataObjectsBodySchema,
    maxBodyBytes: runtime.config.maxBodyBytes
  })

  const share = unwrapResult(
    await runtime.operations.addDataObjectsToShare(workspaceUrl, requirePathParam(params, 'name'), body)
  )

  sendJson({response, status: 200, correlationId, payload: share})
}
