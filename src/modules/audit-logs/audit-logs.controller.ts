import {
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AuditLogsService } from './audit-logs.service';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { RolesGuard } from '../../common/guards/roles.guard';
import { TenantGuard } from '../../common/guards/tenant.guard';
import { Roles } from '../../common/decorators/roles.decorator';
import { UserRole } from '../../common/enums/user-role.enum';
import {
  AuthenticatedUser,
  CurrentUser,
} from '../../common/decorators/current-user.decorator';
import { toOperationContext } from '../../common/operation-context';
import { AuditLogFilterDto } from './dto/audit-log-filter.dto';

@Controller('audit-logs')
@UseGuards(JwtAuthGuard, RolesGuard, TenantGuard)
export class AuditLogsController {
  constructor(private readonly auditLogsService: AuditLogsService) {}

  @Get()
  @Roles(UserRole.ADMIN)
  async getForOrganization(
    @CurrentUser() user: AuthenticatedUser,
    @Query() filters: AuditLogFilterDto,
  ) {
    const { organizationId } = toOperationContext(user);
    return this.auditLogsService.listForOrganization(organizationId, filters);
  }

  @Get('orders/:orderId')
  @Roles(UserRole.ADMIN, UserRole.STAFF)
  async getOrderHistory(
    @Param('orderId', ParseIntPipe) orderId: number,
    @CurrentUser() user: AuthenticatedUser,
  ) {
    const { organizationId } = toOperationContext(user);
    return this.auditLogsService.listForOrder(organizationId, orderId);
  }
}
