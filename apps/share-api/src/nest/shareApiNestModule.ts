import {Module, type DynamicModule} from '@nestjs/common'

import {createShareApiRouteHandlers} from '../http/requestHandler'
import type {ShareApiRuntime} from '../runtime'
import {FallbackController} from './controllers/fallbackController'
import {HealthController} from './controllers/healthController'
import {RecipientsController} from './controllers/recipientsController'
import {SharesController} from './controllers/sharesController'
import {SHARE_API_ROUTE_HANDLERS, SHARE_API_RUNTIME} from './tokens'

export type ShareApiNestModuleOptions = {
  runtime: ShareApiRuntime
}

@Module({
  // FallbackController must stay last so its wildcard does not shadow the others.
  controllers: [HealthController, SharesController, RecipientsController, FallbackController]
})
export class ShareApiNestModule {
  public static register(options: ShareApiNestModuleOptions): DynamicModule {
    return {
      module: ShareApiNestModule,
      providers: [
        {
          provide: SHARE_API_RUNTIME,
          useValue: options.runtime
        },
        {
          provide: SHARE_API_ROUTE_HANDLERS,
          inject: [SHARE_API_RUNTIME],
          useFactory: (runtime: ShareApiRuntime) => createShareApiRouteHandlers({runtime})
        }
      ]
    }
  }
}
