import type {Destination, EndpointValidator} from '@share-gateway/endpoint-guard'
import {createNoopLogger, setLogContextFields, type StructuredLogger} from '@share-gateway/logging'
import {
  classifyFailure,
  failed,
  requestValidationError,
  succeeded,
  type OperationFailure,
  type OperationResult
} from '@share-gateway/outcomes'
import type {
  DataObjectType,
  RecipientInfo,
  SharedDataObjectUpdate,
  SharingClient,
  ShareInfo
} from '@share-gateway/sharing-client'
import type {Credential, TokenCache} from '@share-gateway/token-cache'

const DAY_MS = 24 * 60 * 60 * 1000

export type CreateSharingClient = (input: {destination: Destination; credential: Credential}) => SharingClient

export type ListOptions = {
  prefix?: string
  pageSize?: number
}

export type DataObjectsInput = {
  tables?: string[]
  views?: string[]
  schemas?: string[]
}

export type ShareOperations = {
  listShares: (workspaceUrl: string, options?: ListOptions) => Promise<OperationResult<ShareInfo[]>>
  getShare: (workspaceUrl: string, name: string) => Promise<OperationResult<ShareInfo>>
  createShare: (
    workspaceUrl: string,
    input: {name: string; description: string; storage_root?: string}
  ) => Promise<OperationResult<ShareInfo>>
  deleteShare: (workspaceUrl: string, name: string) => Promise<OperationResult<void>>
  addDataObjectsToShare: (
    workspaceUrl: string,
    name: string,
    input: DataObjectsInput
  ) => Promise<OperationResult<ShareInfo>>
  listRecipients: (workspaceUrl: string, options?: ListOptions) => Promise<OperationResult<RecipientInfo[]>>
  getRecipient: (workspaceUrl: string, name: string) => Promise<OperationResult<RecipientInfo>>
  deleteRecipient: (workspaceUrl: string, name: string) => Promise<OperationResult<void>>
  createRecipientD2D: (
    workspaceUrl: string,
    name: string,
    input: {recipient_identifier: string; description: string; sharing_code?: string}
  ) => Promise<OperationResult<RecipientInfo>>
  createRecipientD2O: (
    workspaceUrl: string,
    name: string,
    input: {description: string; ip_access_list?: string[]}
  ) => Promise<OperationResult<RecipientInfo>>
  rotateRecipientToken: (
    workspaceUrl: string,
    name: string,
    input: {expire_in_seconds: number}
  ) => Promise<OperationResult<RecipientInfo>>
  addRecipientIps: (workspaceUrl: string, name: string, ips: string[]) => Promise<OperationResult<RecipientInfo>>
  revokeRecipientIps: (workspaceUrl: string, name: string, ips: string[]) => Promise<OperationResult<RecipientInfo>>
  updateRecipientDescription: (
    workspaceUrl: string,
    name: string,
    description: string
  ) => Promise<OperationResult<RecipientInfo>>
  updateRecipientExpiration: (
    workspaceUrl: string,
    name: string,
    input: {expiration_days: number}
  ) => Promise<OperationResult<RecipientInfo>>
}

export const cleanEntries = (values: string[]) =>
  values.map(value => value.trim()).filter(value => value.length > 0)

const parentSchemaOf = (qualifiedName: string) => {
  const parts = qualifiedName.split('.')
  return parts.length >= 3 ? parts.slice(0, -1).join('.') : undefined
}

/**
 * Builds the ADD updates for a share.
 *
 * A schema cannot be added in the same request as tables or views that live inside it.
 */
export const buildDataObjectUpdates = ({tables = [], views = [], schemas = []}: DataObjectsInput) => {
  const cleanTables = cleanEntries(tables)
  const cleanViews = cleanEntries(views)
  const cleanSchemas = cleanEntries(schemas)

  if (cleanTables.length === 0 && cleanViews.length === 0 && cleanSchemas.length === 0) {
    throw requestValidationError('data_objects_missing', 'No data objects provided to add to share')
  }

  const objectSchemas = new Set(
    [...cleanTables, ...cleanViews]
      .map(parentSchemaOf)
      .filter((schema): schema is string => schema !== undefined)
  )
  const conflicting = cleanSchemas.filter(schema => objectSchemas.has(schema))
  if (conflicting.length > 0) {
    throw requestValidationError(
      'data_objects_conflict',
      `Cannot add schemas ${conflicting.join(', ')} together with tables or views from the same schema`
    )
  }

  const toUpdates = (names: string[], dataObjectType: DataObjectType): SharedDataObjectUpdate[] =>
    names.map(name => ({
      action: 'ADD',
      data_object: {name, data_object_type: dataObjectType}
    }))

  return [
    ...toUpdates(cleanTables, 'TABLE'),
    ...toUpdates(cleanViews, 'VIEW'),
    ...toUpdates(cleanSchemas, 'SCHEMA')
  ]
}

export const mergeIps = ({existing, added}: {existing: string[]; added: string[]}) => [
  ...new Set([...existing, ...added])
]

const requireTokenRecipient = (recipient: RecipientInfo) => {
  if (recipient.authentication_type !== undefined && recipient.authentication_type !== 'TOKEN') {
    throw requestValidationError(
      'recipient_auth_type_unsupported',
      `Recipient ${recipient.name} does not use token authentication and has no IP access list`
    )
  }
}

export const createShareOperations = ({
  tokenCache,
  validateEndpoint,
  createClient,
  logger = createNoopLogger(),
  now = () => new Date()
}: {
  tokenCache: TokenCache
  validateEndpoint: EndpointValidator
  createClient: CreateSharingClient
  logger?: StructuredLogger
  now?: () => Date
}): ShareOperations => {
  const fail = ({
    operation,
    signal,
    credential
  }: {
    operation: string
    signal: unknown
    credential?: Credential
  }): OperationFailure => {
    const outcome = classifyFailure(signal)
    if (outcome.kind === 'unauthenticated' && credential) {
      tokenCache.invalidate(credential)
    }

    logger.warn({
      event: 'operation.failed',
      component: 'share.operations',
      message: `Operation ${operation} failed: ${outcome.kind}`,
      reason_code: outcome.reason ?? outcome.kind,
      metadata: {kind: outcome.kind, detail: outcome.message}
    })

    return failed(outcome)
  }

  const prepare = <T>({operation, build}: {operation: string; build: () => T}): OperationResult<T> => {
    try {
      return succeeded(build())
    } catch (error) {
      return fail({operation, signal: error})
    }
  }

  const run = async <T>({
    operation,
    workspaceUrl,
    execute
  }: {
    operation: string
    workspaceUrl: string
    execute: (client: SharingClient) => Promise<T>
  }): Promise<OperationResult<T>> => {
    setLogContextFields({operation})
    let credential: Credential | undefined

    try {
      const destination = await validateEndpoint(workspaceUrl)
      if (!destination.ok) {
        return fail({operation, signal: destination.error})
      }

      setLogContextFields({workspace_host: destination.value.host})

      credential = await tokenCache.getCredential(now())
      const client = createClient({destination: destination.value, credential})
      return succeeded(await execute(client))
    } catch (error) {
      return fail({operation, signal: error, ...(credential ? {credential} : {})})
    }
  }

  const updateRecipientAndFetch = async ({
    client,
    name,
    patch
  }: {
    client: SharingClient
    name: string
    patch: Parameters<SharingClient['updateRecipient']>[1]
  }) => {
    await client.updateRecipient(name, patch)
    return client.getRecipient(name)
  }

  return {
    listShares: (workspaceUrl, options = {}) =>
      run({
        operation: 'list_shares',
        workspaceUrl,
        execute: client =>
          client.listShares({
            ...(options.pageSize !== undefined ? {maxResults: options.pageSize} : {}),
            ...(options.prefix !== undefined ? {prefix: options.prefix} : {})
          })
      }),

    getShare: (workspaceUrl, name) =>
      run({operation: 'get_share', workspaceUrl, execute: client => client.getShare(name)}),

    createShare: (workspaceUrl, input) =>
      run({
        operation: 'create_share',
        workspaceUrl,
        execute: client =>
          client.createShare({
            name: input.name,
            comment: input.description,
            ...(input.storage_root ? {storage_root: input.storage_root} : {})
          })
      }),

    deleteShare: (workspaceUrl, name) =>
      run({operation: 'delete_share', workspaceUrl, execute: client => client.deleteShare(name)}),

    addDataObjectsToShare: async (workspaceUrl, name, input) => {
      const operation = 'add_data_objects_to_share'
      const updates = prepare({operation, build: () => buildDataObjectUpdates(input)})
      if (!updates.ok) {
        return updates
      }
      const dataObjectUpdates = updates.value

      return run({
        operation,
        workspaceUrl,
        execute: client => client.updateShare(name, {updates: dataObjectUpdates})
      })
    },

    listRecipients: (workspaceUrl, options = {}) =>
      run({
        operation: 'list_recipients',
        workspaceUrl,
        execute: client =>
          client.listRecipients({
            ...(options.pageSize !== undefined ? {maxResults: options.pageSize} : {}),
            ...(options.prefix !== undefined ? {prefix: options.prefix} : {})
          })
      }),

    getRecipient: (workspaceUrl, name) =>
      run({operation: 'get_recipient', workspaceUrl, execute: client => client.getRecipient(name)}),

    deleteRecipient: (workspaceUrl, name) =>
      run({operation: 'delete_recipient', workspaceUrl, execute: client => client.deleteRecipient(name)}),

    createRecipientD2D: (workspaceUrl, name, input) =>
      run({
        operation: 'create_recipient_d2d',
        workspaceUrl,
        execute: client =>
          client.createRecipient({
            name,
            authentication_type: 'DATABRICKS',
            comment: input.description,
            data_recipient_global_metastore_id: input.recipient_identifier,
            ...(input.sharing_code ? {sharing_code: input.sharing_code} : {})
          })
      }),

    createRecipientD2O: (workspaceUrl, name, input) => {
      const ips = cleanEntries(input.ip_access_list ?? [])
      return run({
        operation: 'create_recipient_d2o',
        workspaceUrl,
        execute: client =>
          client.createRecipient({
            name,
            authentication_type: 'TOKEN',
            comment: input.description,
            ...(ips.length > 0 ? {ip_access_list: {allowed_ip_addresses: ips}} : {})
          })
      })
    },

    rotateRecipientToken: (workspaceUrl, name, input) =>
      run({
        operation: 'rotate_recipient_token',
        workspaceUrl,
        execute: client =>
          client.rotateRecipientToken(name, {existing_token_expire_in_seconds: input.expire_in_seconds})
      }),

    addRecipientIps: async (workspaceUrl, name, ips) => {
      const operation = 'add_recipient_ips'
      const added = prepare({
        operation,
        build: () => {
          const cleaned = cleanEntries(ips)
          if (cleaned.length === 0) {
            throw requestValidationError('ip_addresses_missing', 'No valid IP addresses provided to add')
          }
          return cleaned
        }
      })
      if (!added.ok) {
        return added
      }
      const addedIps = added.value

      return run({
        operation,
        workspaceUrl,
        execute: async client => {
          const recipient = await client.getRecipient(name)
          requireTokenRecipient(recipient)

          const existing = recipient.ip_access_list?.allowed_ip_addresses ?? []
          return updateRecipientAndFetch({
            client,
            name,
            patch: {ip_access_list: {allowed_ip_addresses: mergeIps({existing, added: addedIps})}}
          })
        }
      })
    },

    revokeRecipientIps: async (workspaceUrl, name, ips) => {
      const operation = 'revoke_recipient_ips'
      const removed = prepare({
        operation,
        build: () => {
          const cleaned = new Set(cleanEntries(ips))
          if (cleaned.size === 0) {
            throw requestValidationError('ip_addresses_missing', 'No valid IP addresses provided to remove')
          }
          return cleaned
        }
      })
      if (!removed.ok) {
        return removed
      }
      const removedIps = removed.value

      return run({
        operation,
        workspaceUrl,
        execute: async client => {
          const recipient = await client.getRecipient(name)
          requireTokenRecipient(recipient)

          const existing = recipient.ip_access_list?.allowed_ip_addresses ?? []
          if (existing.length === 0) {
            throw requestValidationError(
              'ip_access_list_empty',
              `Recipient ${name} has no IP restrictions to remove`
            )
          }

          const remaining = existing.filter(ip => !removedIps.has(ip))
          if (remaining.length === existing.length) {
            throw requestValidationError(
              'ip_addresses_not_found',
              'None of the specified IP addresses are in the access list'
            )
          }

          return updateRecipientAndFetch({
            client,
            name,
            patch: {ip_access_list: {allowed_ip_addresses: remaining}}
          })
        }
      })
    },

    updateRecipientDescription: async (workspaceUrl, name, description) => {
      const operation = 'update_recipient_description'
      const comment = prepare({
        operation,
        build: () => {
          const trimmed = description.trim()
          if (trimmed.length === 0) {
            throw requestValidationError('description_invalid', 'Description must not be blank')
          }
          return trimmed
        }
      })
      if (!comment.ok) {
        return comment
      }
      const trimmedDescription = comment.value

      return run({
        operation,
        workspaceUrl,
        execute: client => updateRecipientAndFetch({client, name, patch: {comment: trimmedDescription}})
      })
    },

    updateRecipientExpiration: async (workspaceUrl, name, input) => {
      const operation = 'update_recipient_expiration'
      const days = prepare({
        operation,
        build: () => {
          if (!Number.isInteger(input.expiration_days) || input.expiration_days < 0) {
            throw requestValidationError(
              'expiration_invalid',
              'expiration_days must be a non-negative integer'
            )
          }
          return input.expiration_days
        }
      })
      if (!days.ok) {
        return days
      }
      const expirationDays = days.value

      return run({
        operation,
        workspaceUrl,
        execute: client =>
          updateRecipientAndFetch({
            client,
            name,
            patch: {expiration_time: now().getTime() + expirationDays * DAY_MS}
          })
      })
    }
  }
}
