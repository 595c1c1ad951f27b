import {Controller, Delete, Get, Inject, Post, Put, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import type {ShareApiRouteHandlers} from '../../http/routes/types'
import {SHARE_API_ROUTE_HANDLERS} from '../tokens'

@Controller('recipients')
export class RecipientsController {
  public constructor(
    @Inject(SHARE_API_ROUTE_HANDLERS) private readonly routeHandlers: ShareApiRouteHandlers
  ) {}

  @Get()
  public async list(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.listRecipients(request, response)
  }

  @Post('d2d/:name')
  public async createD2D(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.createRecipientD2D(request, response)
  }

  @Post('d2o/:name')
  public async createD2O(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.createRecipientD2O(request, response)
  }

  @Get(':name')
  public async get(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.getRecipient(request, response)
  }

  @Delete(':name')
  public async remove(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.deleteRecipient(request, response)
  }

  @Put(':name/token/rotate')
  public async rotateToken(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.rotateRecipientToken(request, response)
  }

  @Put(':name/ipaddress/add')
  public async addIps(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.addRecipientIps(request, response)
  }

  @Put(':name/ipaddress/revoke')
  public async revokeIps(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.revokeRecipientIps(request, response)
  }

  @Put(':name/description')
  public async updateDescription(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.updateRecipientDescription(request, response)
  }

  @Put(':name/expiration')
  public async updateExpiration(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.updateRecipientExpiration(request, response)
  }
}
