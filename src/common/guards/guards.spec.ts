import { ExecutionContext, ForbiddenException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { RolesGuard } from './roles.guard';
import { TenantGuard } from './tenant.guard';
import { AuthenticatedUser } from '../decorators/current-user.decorator';
import { UserRole } from '../enums/user-role.enum';

function contextFor(user?: AuthenticatedUser): ExecutionContext {
  class OrdersController {}
  const handler = () => undefined;
  return new ExecutionContextHost(
    [{ user }, {}, () => undefined],
    OrdersController,
    handler,
  );
}

const staff: AuthenticatedUser = {
  userId: 'user-1',
  email: 'staff@example.com',
  role: UserRole.STAFF,
  organizationId: 'org-1',
};

const superAdmin: AuthenticatedUser = {
  userId: 'root-1',
  email: 'root@example.com',
  role: UserRole.SUPERADMIN,
  organizationId: null,
};

describe('RolesGuard', () => {
  const reflector = new Reflector();
  const guard = new RolesGuard(reflector);

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('allows any user when no roles are required', () => {
    jest.spyOn(reflector, 'getAllAndOverride').mockReturnValue(undefined);
    expect(guard.canActivate(contextFor(staff))).toBe(true);
  });

  it('rejects a role outside the allowed list', () => {
    jest
      .spyOn(reflector, 'getAllAndOverride')
      .mockReturnValue([UserRole.ADMIN]);
    expect(() => guard.canActivate(contextFor(staff))).toThrow(
      'Requires one of the roles: admin',
    );
  });

  it('accepts a listed role', () => {
    jest
      .spyOn(reflector, 'getAllAndOverride')
      .mockReturnValue([UserRole.ADMIN, UserRole.STAFF]);
    expect(guard.canActivate(contextFor(staff))).toBe(true);
  });
});

describe('TenantGuard', () => {
  const guard = new TenantGuard();

  it('requires an organization', () => {
    expect(() => guard.canActivate(contextFor(superAdmin))).toThrow(
      ForbiddenException,
    );
  });

  it('passes members of an organization', () => {
    expect(guard.canActivate(contextFor(staff))).toBe(true);
  });

  it('denies unauthenticated requests', () => {
    expect(guard.canActivate(contextFor())).toBe(false);
  });
});
