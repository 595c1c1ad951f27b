export const SHARE_API_RUNTIME = Symbol('SHARE_API_RUNTIME')
export const SHARE_API_ROUTE_HANDLERS = Symbol('SHARE_API_ROUTE_HANDLERS')
