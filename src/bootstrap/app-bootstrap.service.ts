import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { UsersService } from '../modules/users/users.service';
import { UserRole } from '../common/enums/user-role.enum';
import { PASSWORD_POLICY } from '../utils/password.util';

const DEFAULT_SUPER_ADMIN_NAME = 'Order Ledger Super Admin';

/** Seeds the platform super admin from SUPER_ADMIN_* on startup. */
@Injectable()
export class AppBootstrapService implements OnModuleInit {
  private readonly logger = new Logger(AppBootstrapService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly usersService: UsersService,
  ) {}

  async onModuleInit(): Promise<void> {
    const email = this.configService.get<string>('SUPER_ADMIN_EMAIL');
    const password = this.configService.get<string>('SUPER_ADMIN_PASSWORD');
    if (!email || !password) {
      this.logger.warn(
        'SUPER_ADMIN_EMAIL or SUPER_ADMIN_PASSWORD not set, no super admin seeded',
      );
      return;
    }
    if (!PASSWORD_POLICY.test(password)) {
      this.logger.error(
        'SUPER_ADMIN_PASSWORD does not meet the password policy, no super admin seeded',
      );
      return;
    }

    const existing = await this.usersService.findByEmail(email);
    if (existing) {
      if (existing.role !== UserRole.SUPERADMIN) {
        this.logger.warn(
          `${email} already belongs to a ${existing.role} account`,
        );
      }
      return;
    }

    await this.usersService.createSuperAdmin({
      name:
        this.configService.get<string>('SUPER_ADMIN_NAME') ||
        DEFAULT_SUPER_ADMIN_NAME,
      email,
      password,
      role: UserRole.SUPERADMIN,
    });
    this.logger.log(`Super admin ${email} created`);
  }
}
