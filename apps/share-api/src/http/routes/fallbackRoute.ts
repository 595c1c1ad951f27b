import {notFound} from '../../errors'
import type {ShareApiRouteLogicHandler} from './types'

export const handleFallbackRoute: ShareApiRouteLogicHandler = ({method, pathname}) => {
  throw notFound('route_not_found', `Unsupported route ${method} ${pathname}`)
}
