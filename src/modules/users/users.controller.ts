import { Controller, Delete, Get, Param, ParseUUIDPipe, UseGuards } from '@nestjs/common';
import { UsersService } from './users.service';
import { User } from '../../entities/user.entity';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { RolesGuard } from '../../common/guards/roles.guard';
import { Roles } from '../../common/decorators/roles.decorator';
import { UserRole } from '../../common/enums/user-role.enum';
import {
  CurrentUser,
  AuthenticatedUser,
} from '../../common/decorators/current-user.decorator';

function toProfile(user: User) {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    role: user.role,
    organization: user.organization
      ? { id: user.organization.id, name: user.organization.name }
      : null,
    lastLogin: user.lastLogin ?? null,
  };
}

@Controller('users')
@UseGuards(JwtAuthGuard, RolesGuard)
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get('me')
  async me(@CurrentUser() user: AuthenticatedUser) {
    return toProfile(await this.usersService.findById(user.userId));
  }

  @Delete('me')
  async deleteMe(@CurrentUser() user: AuthenticatedUser) {
    return this.usersService.deleteAccount(user, user.userId);
  }

  @Get()
  @Roles(UserRole.SUPERADMIN)
  async list() {
    const users = await this.usersService.listAll();
    return users.map(toProfile);
  }

  @Delete(':id')
  @Roles(UserRole.SUPERADMIN)
  async delete(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: AuthenticatedUser,
  ) {
    return this.usersService.deleteAccount(user, id);
  }
}
