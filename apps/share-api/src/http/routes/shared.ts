import {z} from 'zod'

import {badRequest} from '../../errors'

export const MAX_PAGE_SIZE = 1000

export const ListQuerySchema = z.object({
  prefix: z.string().trim().min(1).optional(),
  page_size: z.coerce
    .number()
    .int('page_size must be an integer')
    .positive('page_size must be positive')
    .max(MAX_PAGE_SIZE, `page_size must not exceed ${MAX_PAGE_SIZE}`)
    .default(100)
})

export const NonBlankStringSchema = z.string().trim().min(1)

export const requirePathParam = (params: Record<string, string>, name: string) => {
  const value = params[name]
  if (value === undefined || value.trim().length === 0) {
    throw badRequest('path_param_invalid', `Path parameter ${name} is required`)
  }

  return value
}

export const describeCount = ({count, noun}: {count: number; noun: string}) =>
  count === 0 ? `No ${noun}s found` : `Found ${count} ${noun}${count === 1 ? '' : 's'}`
