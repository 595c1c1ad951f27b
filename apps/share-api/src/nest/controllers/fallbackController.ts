import {All, Controller, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import type {ShareApiRouteHandlers} from '../../http/routes/types'
import {SHARE_API_ROUTE_HANDLERS} from '../tokens'

@Controller()
export class FallbackController {
  public constructor(
    @Inject(SHARE_API_ROUTE_HANDLERS) private readonly routeHandlers: ShareApiRouteHandlers
  ) {}

  @All('*')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.fallback(request, response)
  }
}
