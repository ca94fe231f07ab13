import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { AuthenticatedRequest } from '../decorators/current-user.decorator';
import { toOperationContext } from '../operation-context';

/**
 * Ledger routes always act inside one organization. The super admin has
 * none, so there is no bypass here.
 */
@Injectable()
export class TenantGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const { user } = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!user) {
      return false;
    }
    toOperationContext(user);
    return true;
  }
}
