import { Request } from 'express'
import { ValidationError } from './errors'

export const TENANT_HEADER = 'x-tenant-id'
export const TENANT_QUERY = 'tenant_id'

const present = (value: string | undefined) => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

/**
 * Header wins over query. There is no verification here: whoever authenticates the
 * caller is expected to sit in front of this and hand over a trusted value.
 */
export const resolveTenant = (headerValue?: string, queryValue?: string): string => {
  const tenantId = present(headerValue) ?? present(queryValue)
  if (!tenantId) {
    throw new ValidationError('missing_tenant', `Tenant id required via ${TENANT_HEADER} header or ${TENANT_QUERY} query parameter`)
  }
  return tenantId
}

export const tenantOf = (req: Request) => {
  const query = req.query[TENANT_QUERY]
  return resolveTenant(req.get(TENANT_HEADER), typeof query === 'string' ? query : undefined)
}
