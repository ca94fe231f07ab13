import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Res,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Response } from 'express';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { RolesGuard } from '../../common/guards/roles.guard';
import { TenantGuard } from '../../common/guards/tenant.guard';
import { Roles } from '../../common/decorators/roles.decorator';
import {
  AuthenticatedUser,
  CurrentUser,
} from '../../common/decorators/current-user.decorator';
import { UserRole } from '../../common/enums/user-role.enum';
import { toOperationContext } from '../../common/operation-context';
import { MAX_ATTACHMENT_SIZE } from '../attachments/attachments.service';
import { FulfillmentService } from './fulfillment.service';
import { CreateDeliveryDto } from './dto/create-delivery.dto';

const uploadInterceptor = FileInterceptor('file', {
  limits: { fileSize: MAX_ATTACHMENT_SIZE },
});

@Controller('orders/:orderId/deliveries')
@UseGuards(JwtAuthGuard, RolesGuard, TenantGuard)
@Roles(UserRole.ADMIN, UserRole.STAFF)
export class DeliveriesController {
  constructor(private readonly fulfillmentService: FulfillmentService) {}

  @Get()
  async list(
    @Param('orderId', ParseIntPipe) orderId: number,
    @CurrentUser() user: AuthenticatedUser,
  ) {
    return this.fulfillmentService.listDeliveries(
      toOperationContext(user),
      orderId,
    );
  }

  @Post()
  @UseInterceptors(uploadInterceptor)
  async create(
    @Param('orderId', ParseIntPipe) orderId: number,
    @CurrentUser() user: AuthenticatedUser,
    @Body() dto: CreateDeliveryDto,
    @UploadedFile() file: Express.Multer.File | undefined,
  ) {
    return this.fulfillmentService.addDelivery(
      toOperationContext(user),
      orderId,
      dto,
      file,
    );
  }

  @Delete(':deliveryId')
  async delete(
    @Param('orderId', ParseIntPipe) orderId: number,
    @Param('deliveryId', ParseIntPipe) deliveryId: number,
    @CurrentUser() user: AuthenticatedUser,
  ) {
    return this.fulfillmentService.deleteDelivery(
      toOperationContext(user),
      orderId,
      deliveryId,
    );
  }

  @Put(':deliveryId/attachment')
  @UseInterceptors(uploadInterceptor)
  async replaceAttachment(
    @Param('orderId', ParseIntPipe) orderId: number,
    @Param('deliveryId', ParseIntPipe) deliveryId: number,
    @CurrentUser() user: AuthenticatedUser,
    @UploadedFile() file: Express.Multer.File | undefined,
  ) {
    if (!file) {
      throw new BadRequestException('File is required');
    }
    return this.fulfillmentService.replaceDeliveryAttachment(
      toOperationContext(user),
      orderId,
      deliveryId,
      file,
    );
  }

  @Get(':deliveryId/attachment')
  async downloadAttachment(
    @Param('orderId', ParseIntPipe) orderId: number,
    @Param('deliveryId', ParseIntPipe) deliveryId: number,
    @CurrentUser() user: AuthenticatedUser,
    @Res() res: Response,
  ) {
    const download = await this.fulfillmentService.downloadAttachment(
      toOperationContext(user),
      orderId,
      deliveryId,
    );

    res.setHeader('Content-Type', download.mimeType);
    res.setHeader(
      'Content-Disposition',
      `attachment; filename="${download.fileName}"`,
    );
    res.send(download.bytes);
  }
}
