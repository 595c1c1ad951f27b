import {SERVICE_NAME} from '../../config'
import {sendJson} from '../../http'
import type {ShareApiRouteLogicHandler} from './types'

export const handleHealthRoute: ShareApiRouteLogicHandler = ({response, correlationId, runtime}) => {
  sendJson({
    response,
    status: 200,
    correlationId,
    payload: {
      status: 'healthy',
      service: SERVICE_NAME,
      version: runtime.config.serviceVersion,
      timestamp: runtime.now().toISOString()
    }
  })
}

export const handleHealthLiveRoute: ShareApiRouteLogicHandler = ({response, correlationId, runtime}) => {
  sendJson({
    response,
    status: 200,
    correlationId,
    payload: {status: 'alive', timestamp: runtime.now().toISOString()}
  })
}

export const handleHealthReadyRoute: ShareApiRouteLogicHandler = ({response, correlationId, runtime}) => {
  const checks = {
    settings: true,
    authentication: runtime.authenticationConfigured
  }
  const ready = Object.values(checks).every(Boolean)

  sendJson({
    response,
    status: ready ? 200 : 503,
    correlationId,
    payload: {
      status: ready ? 'ready' : 'not_ready',
      checks,
      timestamp: runtime.now().toISOString()
    }
  })
}
