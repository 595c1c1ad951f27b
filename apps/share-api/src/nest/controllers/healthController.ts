import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import type {ShareApiRouteHandlers} from '../../http/routes/types'
import {SHARE_API_ROUTE_HANDLERS} from '../tokens'

@Controller('health')
export class HealthController {
  public constructor(
    @Inject(SHARE_API_ROUTE_HANDLERS) private readonly routeHandlers: ShareApiRouteHandlers
  ) {}

  @Get()
  public async health(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.health(request, response)
  }

  @Get('live')
  public async live(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.healthLive(request, response)
  }

  @Get('ready')
  public async ready(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.healthReady(request, response)
  }
}
