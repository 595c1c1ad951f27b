import {z} from 'zod'

import {unwrapResult} from '../../errors'
import {parseJsonBody, parseOptionalJsonBody, parseQuery, requireWorkspaceUrl, sendJson, sendNoContent} from '../../http'
import {describeCount, ListQuerySchema, NonBlankStringSchema, requirePathParam} from './shared'
import type {RouteHandlerContext, ShareApiRouteLogicHandler} from './types'

const CreateRecipientD2DBodySchema = z
  .object({
    recipient_identifier: NonBlankStringSchema,
    description: NonBlankStringSchema,
    sharing_code: NonBlankStringSchema.optional()
  })
  .strict()

const CreateRecipientD2OBodySchema = z
  .object({
    description: NonBlankStringSchema,
    ip_access_list: z.array(z.string()).optional()
  })
  .strict()

const RotateTokenBodySchema = z
  .object({
    expire_in_seconds: z.number().int().nonnegative().default(0)
  })
  .strict()

const IpAddressesBodySchema = z
  .object({
    ip_access_list: z.array(z.string()).min(1, 'ip_access_list must contain at least one address')
  })
  .strict()

const DescriptionBodySchema = z
  .object({
    description: z.string()
  })
  .strict()

const ExpirationBodySchema = z
  .object({
    expiration_days: z.number().int()
  })
  .strict()

const readJsonBody = <TSchema extends z.ZodTypeAny>({
  context,
  schema
}: {
  context: RouteHandlerContext
  schema: TSchema
}) =>
  parseJsonBody({
    request: context.request,
    schema,
    maxBodyBytes: context.runtime.config.maxBodyBytes
  })

export const handleListRecipientsRoute: ShareApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  searchParams,
  runtime
}) => {
  const workspaceUrl = requireWorkspaceUrl(request)
  const query = parseQuery({searchParams, schema: ListQuerySchema})

  const recipients = unwrapResult(
    await runtime.operations.listRecipients(workspaceUrl, {
      pageSize: query.page_size,
      ...(query.prefix ? {prefix: query.prefix} : {})
    })
  )

  sendJson({
    response,
    status: 200,
    correlationId,
    payload: {
      message: describeCount({count: recipients.length, noun: 'recipient'}),
      recipients
    }
  })
}

export const handleGetRecipientRoute: ShareApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  params,
  runtime
}) => {
  const workspaceUrl = requireWorkspaceUrl(request)
  const recipient = unwrapResult(
    await runtime.operations.getRecipient(workspaceUrl, requirePathParam(params, 'name'))
  )

  sendJson({response, status: 200, correlationId, payload: recipient})
}

export const handleCreateRecipientD2DRoute: ShareApiRouteLogicHandler = async context => {
  const {request, response, correlationId, params, runtime} = context
  const workspaceUrl = requireWorkspaceUrl(request)
  const body = await readJsonBody({context, schema: CreateRecipientD2DBodySchema})

  const recipient = unwrapResult(
    await runtime.operations.createRecipientD2D(workspaceUrl, requirePathParam(params, 'name'), body)
  )

  sendJson({response, status: 201, correlationId, payload: recipient})
}

export const handleCreateRecipientD2ORoute: ShareApiRouteLogicHandler = async context => {
  const {request, response, correlationId, params, runtime} = context
  const workspaceUrl = requireWorkspaceUrl(request)
  const body = await readJsonBody({context, schema: CreateRecipientD2OBodySchema})

  const recipient = unwrapResult(
    await runtime.operations.createRecipientD2O(workspaceUrl, requirePathParam(params, 'name'), body)
  )

  sendJson({response, status: 201, correlationId, payload: recipient})
}

export const handleDeleteRecipientRoute: ShareApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  params,
  runtime
}) => {
  const workspaceUrl = requireWorkspaceUrl(request)
  unwrapResult(await runtime.operations.deleteRecipient(workspaceUrl, requirePathParam(params, 'name')))

  sendNoContent({response, correlationId})
}

export const handleRotateRecipientTokenRoute: ShareApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  params,
  runtime
}) => {
  const workspaceUrl = requireWorkspaceUrl(request)
  const body = await parseOptionalJsonBody({
    request,
    schema: RotateTokenBodySchema,
    maxBodyBytes: runtime.config.maxBodyBytes
  })

  const recipient = unwrapResult(
    await runtime.operations.rotateRecipientToken(workspaceUrl, requirePathParam(params, 'name'), body)
  )

  sendJson({response, status: 200, correlationId, payload: recipient})
}

export const handleAddRecipientIpsRoute: ShareApiRouteLogicHandler = async context => {
  const {request, response, correlationId, params, runtime} = context
  const workspaceUrl = requireWorkspaceUrl(request)
  const body = await readJsonBody({context, schema: IpAddressesBodySchema})

  const recipient = unwrapResult(
    await runtime.operations.addRecipientIps(workspaceUrl, requirePathParam(params, 'name'), body.ip_access_list)
  )

  sendJson({response, status: 200, correlationId, payload: recipient})
}

export const handleRevokeRecipientIpsRoute: ShareApiRouteLogicHandler = async context => {
  const {request, response, correlationId, params, runtime} = context
  const workspaceUrl = requireWorkspaceUrl(request)
  const body = await readJsonBody({context, schema: IpAddressesBodySchema})

  const recipient = unwrapResult(
    await runtime.operations.revokeRecipientIps(
      workspaceUrl,
      requirePathParam(params, 'name'),
      body.ip_access_list
    )
  )

  sendJson({response, status: 200, correlationId, payload: recipient})
}

export const handleUpdateRecipientDescriptionRoute: ShareApiRouteLogicHandler = async context => {
  const {request, response, correlationId, params, runtime} = context
  const workspaceUrl = requireWorkspaceUrl(request)
  const body = await readJsonBody({context, schema: DescriptionBodySchema})

  const recipient = unwrapResult(
    await runtime.operations.updateRecipientDescription(
      workspaceUrl,
      requirePathParam(params, 'name'),
      body.description
    )
  )

  sendJson({response, status: 200, correlationId, payload: recipient})
}

export const handleUpdateRecipientExpirationRoute: ShareApiRouteLogicHandler = async context => {
  const {request, response, correlationId, params, runtime} = context
  const workspaceUrl = requireWorkspaceUrl(request)
  const body = await readJsonBody({context, schema: ExpirationBodySchema})

  const recipient = unwrapResult(
    await runtime.operations.updateRecipientExpiration(workspaceUrl, requirePathParam(params, 'name'), body)
  )

  sendJson({response, status: 200, correlationId, payload: recipient})
}
