import { Controller, Get, UseGuards } from '@nestjs/common';
import { ReportsService } from './reports.service';
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

@Controller('reports')
@UseGuards(JwtAuthGuard, RolesGuard, TenantGuard)
@Roles(UserRole.ADMIN, UserRole.STAFF)
export class ReportsController {
  constructor(private readonly reportsService: ReportsService) {}

  @Get('monthly-summary')
  async monthlySummary(@CurrentUser() user: AuthenticatedUser) {
    const { organizationId } = toOperationContext(user);
    return this.reportsService.getMonthlySummary(organizationId);
  }

  @Get('revenue-summary')
  async revenueSummary(@CurrentUser() user: AuthenticatedUser) {
    const { organizationId } = toOperationContext(user);
    return this.reportsService.getRevenueSummary(organizationId);
  }
}
