import {Controller, Delete, Get, Inject, Post, Put, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import type {ShareApiRouteHandlers} from '../../http/routes/types'
import {SHARE_API_ROUTE_HANDLERS} from '../tokens'

@Controller('shares')
export class SharesController {
  public constructor(
    @Inject(SHARE_API_ROUTE_HANDLERS) private readonly routeHandlers: ShareApiRouteHandlers
  ) {}

  @Get()
  public async list(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.listShares(request, response)
  }

  @Post()
  public async create(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.createShare(request, response)
  }

  @Get(':name')
  public async get(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.getShare(request, response)
  }

  @Delete(':name')
  public async remove(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.deleteShare(request, response)
  }

  @Put(':name/data-objects')
  public async addDataObjects(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.addShareDataObjects(request, response)
  }
}
