import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  Query,
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
import { CreateOrderDto } from './dto/create-order.dto';
import { UpdateOrderDto } from './dto/update-order.dto';
import { UpdateOrderStatusDto } from './dto/update-order-status.dto';
import { OrderFilterDto } from './dto/order-filter.dto';

@Controller('orders')
@UseGuards(JwtAuthGuard, RolesGuard, TenantGuard)
@Roles(UserRole.ADMIN, UserRole.STAFF)
export class OrdersController {
  constructor(private readonly fulfillmentService: FulfillmentService) {}

  @Get()
  async list(
    @CurrentUser() user: AuthenticatedUser,
    @Query() filters: OrderFilterDto,
  ) {
    return this.fulfillmentService.listOrders(toOperationContext(user), filters);
  }

  @Get(':orderId')
  async get(
    @Param('orderId', ParseIntPipe) orderId: number,
    @CurrentUser() user: AuthenticatedUser,
  ) {
    return this.fulfillmentService.getOrder(toOperationContext(user), orderId);
  }

  @Post()
  async create(
    @CurrentUser() user: AuthenticatedUser,
    @Body() dto: CreateOrderDto,
  ) {
    return this.fulfillmentService.createOrder(toOperationContext(user), dto);
  }

  @Put(':orderId')
  async update(
    @Param('orderId', ParseIntPipe) orderId: number,
    @CurrentUser() user: AuthenticatedUser,
    @Body() dto: UpdateOrderDto,
  ) {
    return this.fulfillmentService.editOrder(
      toOperationContext(user),
      orderId,
      dto,
    );
  }

  @Patch(':orderId/status')
  async updateStatus(
    @Param('orderId', ParseIntPipe) orderId: number,
    @CurrentUser() user: AuthenticatedUser,
    @Body() dto: UpdateOrderStatusDto,
  ) {
    return this.fulfillmentService.updateStatus(
      toOperationContext(user),
      orderId,
      dto.status,
    );
  }

  @Delete(':orderId')
  async delete(
    @Param('orderId', ParseIntPipe) orderId: number,
    @CurrentUser() user: AuthenticatedUser,
  ) {
    const summary = await this.fulfillmentService.deleteOrder(
      toOperationContext(user),
      orderId,
    );
    return { message: `Order #${orderId} deleted successfully`, ...summary };
  }

  @Post(':orderId/attachment')
  @UseInterceptors(
    FileInterceptor('file', { limits: { fileSize: MAX_ATTACHMENT_SIZE } }),
  )
  async attachDocument(
    @Param('orderId', ParseIntPipe) orderId: number,
    @CurrentUser() user: AuthenticatedUser,
    @UploadedFile() file: Express.Multer.File | undefined,
  ) {
    if (!file) {
      throw new BadRequestException('File is required');
    }
    return this.fulfillmentService.attachOrderDocument(
      toOperationContext(user),
      orderId,
      file,
    );
  }

  @Get(':orderId/attachment')
  async downloadDocument(
    @Param('orderId', ParseIntPipe) orderId: number,
    @CurrentUser() user: AuthenticatedUser,
    @Res() res: Response,
  ) {
    const download = await this.fulfillmentService.downloadAttachment(
      toOperationContext(user),
      orderId,
    );

    res.setHeader('Content-Type', download.mimeType);
    res.setHeader(
      'Content-Disposition',
      `attachment; filename="${download.fileName}"`,
    );
    res.send(download.bytes);
  }

  @Get(':orderId/consistency')
  @Roles(UserRole.ADMIN)
  async checkConsistency(
    @Param('orderId', ParseIntPipe) orderId: number,
    @CurrentUser() user: AuthenticatedUser,
  ) {
    return this.fulfillmentService.checkConsistency(
      toOperationContext(user),
      orderId,
    );
  }
}
