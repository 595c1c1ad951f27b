import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {z} from 'zod'

import {badRequest, unsupportedMediaType} from './errors'

const MAX_CORRELATION_ID_LENGTH = 128

const SECURITY_HEADERS = {
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'referrer-policy': 'no-referrer',
  'cross-origin-resource-policy': 'same-origin',
  'cache-control': 'no-store'
} as const

export const ErrorBodySchema = z
  .object({
    error: z.string().min(1),
    message: z.string(),
    correlation_id: z.string().min(1),
    reason: z.string().min(1).optional()
  })
  .strict()

export type ErrorBody = z.infer<typeof ErrorBodySchema>

const headerValue = (request: IncomingMessage, name: string): string | undefined => {
  const raw = request.headers[name]
  const first = Array.isArray(raw) ? raw[0] : raw
  return typeof first === 'string' ? first.trim() : undefined
}

const responseHeaders = (correlationId: string, extra: Record<string, string> = {}) => ({
  ...SECURITY_HEADERS,
  'x-correlation-id': correlationId,
  ...extra
})

const formatIssues = (issues: z.ZodIssue[]) =>
  issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ')

const validate = <TSchema extends z.ZodTypeAny>({
  schema,
  value,
  code
}: {
  schema: TSchema
  value: unknown
  code: string
}): z.infer<TSchema> => {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw badRequest(code, formatIssues(parsed.error.issues))
  }

  return parsed.data
}

/** Caller-supplied ids are kept when usable; anything else gets a fresh UUID. */
export const extractCorrelationId = (request: IncomingMessage) => {
  const value = headerValue(request, 'x-correlation-id')
  return value && value.length <= MAX_CORRELATION_ID_LENGTH ? value : randomUUID()
}

export const requireWorkspaceUrl = (request: IncomingMessage) => {
  const value = headerValue(request, 'x-workspace-url')
  if (!value) {
    throw badRequest('workspace_url_missing', 'X-Workspace-URL header is required')
  }

  return value
}

const hasBody = (request: IncomingMessage) => {
  const length = request.headers['content-length']
  return request.headers['transfer-encoding'] !== undefined || (length !== undefined && Number(length) > 0)
}

const collectBody = async ({request, maxBodyBytes}: {request: IncomingMessage; maxBodyBytes: number}) => {
  const chunks: Buffer[] = []
  let total = 0

  for await (const chunk of request) {
    if (typeof chunk !== 'string' && !(chunk instanceof Uint8Array)) {
      throw badRequest('request_body_invalid', 'Request body contains an invalid chunk type')
    }

    const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk)
    total += buffer.length
    if (total > maxBodyBytes) {
      throw badRequest('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)
    }
    chunks.push(buffer)
  }

  return Buffer.concat(chunks)
}

// Resolves to undefined for an empty payload.
const readJsonPayload = async ({
  request,
  maxBodyBytes
}: {
  request: IncomingMessage
  maxBodyBytes: number
}): Promise<unknown> => {
  if (!headerValue(request, 'content-type')?.toLowerCase().includes('application/json')) {
    throw unsupportedMediaType('content_type_invalid', 'Content-Type must be application/json')
  }

  const raw = await collectBody({request, maxBodyBytes})
  if (raw.length === 0) {
    return undefined
  }

  try {
    return JSON.parse(raw.toString('utf8'))
  } catch {
    throw badRequest('request_body_invalid_json', 'Request body contains invalid JSON')
  }
}

export const parseJsonBody = async <TSchema extends z.ZodTypeAny>({
  request,
  schema,
  maxBodyBytes
}: {
  request: IncomingMessage
  schema: TSchema
  maxBodyBytes: number
}): Promise<z.infer<TSchema>> => {
  const payload = await readJsonPayload({request, maxBodyBytes})
  if (payload === undefined) {
    throw badRequest('request_body_missing', 'Request body is required')
  }

  return validate({schema, value: payload, code: 'request_body_schema_invalid'})
}

/** A request without a body is validated as `{}`, so schema defaults fill it in. */
export const parseOptionalJsonBody = async <TSchema extends z.ZodTypeAny>({
  request,
  schema,
  maxBodyBytes
}: {
  request: IncomingMessage
  schema: TSchema
  maxBodyBytes: number
}): Promise<z.infer<TSchema>> => {
  const payload = hasBody(request) ? await readJsonPayload({request, maxBodyBytes}) : undefined
  return validate({schema, value: payload ?? {}, code: 'request_body_schema_invalid'})
}

export const parseQuery = <TSchema extends z.ZodTypeAny>({
  searchParams,
  schema
}: {
  searchParams: URLSearchParams
  schema: TSchema
}): z.infer<TSchema> => validate({schema, value: Object.fromEntries(searchParams), code: 'query_invalid'})

export const decodePathParam = (value: string) => {
  try {
    return decodeURIComponent(value)
  } catch {
    throw badRequest('path_param_invalid', 'Path parameter encoding is invalid')
  }
}

export const sendJson = ({
  response,
  status,
  correlationId,
  payload
}: {
  response: ServerResponse
  status: number
  correlationId: string
  payload: unknown
}) => {
  const body = Buffer.from(JSON.stringify(payload), 'utf8')

  response.writeHead(
    status,
    responseHeaders(correlationId, {
      'content-type': 'application/json; charset=utf-8',
      'content-length': String(body.length)
    })
  )
  response.end(body)
}

export const sendError = ({
  response,
  status,
  error,
  message,
  correlationId,
  reason
}: {
  response: ServerResponse
  status: number
  error: string
  message: string
  correlationId: string
  reason?: string
}) => {
  const payload: ErrorBody = ErrorBodySchema.parse({
    error,
    message,
    correlation_id: correlationId,
    ...(reason ? {reason} : {})
  })

  sendJson({response, status, correlationId, payload})
}

export const sendNoContent = ({response, correlationId}: {response: ServerResponse; correlationId: string}) => {
  response.writeHead(204, responseHeaders(correlationId))
  response.end()
}
