import {
  BadRequestException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { UsersService } from '../users/users.service';
import { OrganizationsService } from '../organizations/organizations.service';
import { AuditLogsService } from '../audit-logs/audit-logs.service';
import { LoginDto } from './dto/login.dto';
import { RegisterDto } from './dto/register.dto';
import { ChangePasswordDto } from './dto/change-password.dto';
import { UserRole } from '../../common/enums/user-role.enum';
import { AuditAction } from '../../common/enums/audit-action.enum';
import { AuditEntityType } from '../../common/enums/audit-entity-type.enum';
import {
  comparePassword,
  PASSWORD_POLICY,
  PASSWORD_POLICY_MESSAGE,
} from '../../utils/password.util';
import { User } from '../../entities/user.entity';
import { AuthConfig } from '../../config/auth.config';

export interface AuthUserView {
  id: string;
  name: string;
  email: string;
  role: UserRole;
  organization: { id: string; name: string } | null;
}

export interface AuthResult {
  accessToken: string;
  expiresIn: number;
  user: AuthUserView;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly organizationsService: OrganizationsService,
    private readonly auditLogsService: AuditLogsService,
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Joining an existing organization name adds a staff member; a new name
   * creates the organization with this user as its admin.
   */
  async register(dto: RegisterDto): Promise<AuthResult> {
    if (!PASSWORD_POLICY.test(dto.password)) {
      throw new BadRequestException(PASSWORD_POLICY_MESSAGE);
    }

    const { organization, created } =
      await this.organizationsService.findOrCreate(dto.organizationName);
    const role = created ? UserRole.ADMIN : UserRole.STAFF;

    const user = await this.usersService.createForOrganization(organization.id, {
      name: dto.name,
      email: dto.email,
      password: dto.password,
      role,
    });
    user.organization = organization;

    await this.auditLogsService.record({
      organizationId: organization.id,
      userId: user.id,
      entityType: AuditEntityType.USER,
      entityId: user.id,
      action: AuditAction.CREATE,
      changes: { email: user.email, role },
    });
    this.logger.log(
      `Registered ${user.email} as ${role} of organization ${organization.name}`,
    );

    return this.issueToken(user);
  }

  async login(dto: LoginDto): Promise<AuthResult> {
    const user = await this.usersService.findByEmail(dto.email);
    if (!user) {
      throw new UnauthorizedException('Invalid credentials');
    }
    const passwordValid = await comparePassword(dto.password, user.passwordHash);
    if (!passwordValid) {
      throw new UnauthorizedException('Invalid credentials');
    }

    const result = await this.issueToken(user);
    await this.usersService.recordLogin(user.id);
    if (user.organizationId) {
      await this.auditLogsService.record({
        organizationId: user.organizationId,
        userId: user.id,
        entityType: AuditEntityType.USER,
        entityId: user.id,
        action: AuditAction.LOGIN,
      });
    }
    return result;
  }

  async changePassword(userId: string, dto: ChangePasswordDto): Promise<void> {
    if (dto.newPassword !== dto.confirmPassword) {
      throw new BadRequestException('New password and confirmation do not match');
    }
    if (!PASSWORD_POLICY.test(dto.newPassword)) {
      throw new BadRequestException(PASSWORD_POLICY_MESSAGE);
    }

    const user = await this.usersService.findById(userId);
    const currentValid = await comparePassword(
      dto.currentPassword,
      user.passwordHash,
    );
    if (!currentValid) {
      throw new UnauthorizedException('Current password is incorrect');
    }

    await this.usersService.updatePassword(user.id, dto.newPassword);
    if (user.organizationId) {
      await this.auditLogsService.record({
        organizationId: user.organizationId,
        userId: user.id,
        entityType: AuditEntityType.USER,
        entityId: user.id,
        action: AuditAction.UPDATE,
        changes: { passwordChanged: true },
      });
    }
  }

  private async issueToken(user: User): Promise<AuthResult> {
    const payload = {
      sub: user.id,
      role: user.role,
      email: user.email,
      organizationId: user.organizationId ?? null,
    };
    // Secret and lifetime come from the JwtModule registration.
    const accessToken = await this.jwtService.signAsync(payload);
    const { accessExpiresIn } = this.configService.getOrThrow<AuthConfig>('auth');
    return {
      accessToken,
      expiresIn: accessExpiresIn,
      user: this.mapUser(user),
    };
  }

  private mapUser(user: User): AuthUserView {
    return {
      id: user.id,
      name: user.name,
      email: user.email,
      role: user.role,
      organization: user.organization
        ? {
            id: user.organization.id,
            name: user.organization.name,
          }
        : null,
    };
  }
}
