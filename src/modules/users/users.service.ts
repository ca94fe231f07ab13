import {
  ConflictException,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from '../../entities/user.entity';
import { CreateUserDto } from './dto/create-user.dto';
import { UserRole } from '../../common/enums/user-role.enum';
import { AuthenticatedUser } from '../../common/decorators/current-user.decorator';
import { hashPassword } from '../../utils/password.util';
import { OrganizationsService } from '../organizations/organizations.service';
import { AuditLogsService } from '../audit-logs/audit-logs.service';
import { FulfillmentService } from '../fulfillment/fulfillment.service';

export interface AccountDeletionResult {
  userId: string;
  ordersDeleted: number;
  blobsDeleted: number;
  blobFailures: number;
  organizationDeleted: boolean;
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly usersRepository: Repository<User>,
    private readonly organizationsService: OrganizationsService,
    private readonly auditLogsService: AuditLogsService,
    private readonly fulfillmentService: FulfillmentService,
  ) {}

  async findByEmail(email: string): Promise<User | null> {
    return this.usersRepository.findOne({
      where: { email: email.toLowerCase() },
      relations: ['organization'],
    });
  }

  async findById(id: string): Promise<User> {
    const user = await this.usersRepository.findOne({
      where: { id },
      relations: ['organization'],
    });
    if (!user) {
      throw new NotFoundException(`User ${id} not found`);
    }
    return user;
  }

  async listAll(): Promise<User[]> {
    return this.usersRepository.find({
      relations: ['organization'],
      order: { email: 'ASC' },
    });
  }

  async createSuperAdmin(dto: CreateUserDto): Promise<User> {
    const existing = await this.findByEmail(dto.email);
    if (existing) {
      throw new ConflictException('User with this email already exists');
    }
    const user = this.usersRepository.create({
      name: dto.name,
      email: dto.email.toLowerCase(),
      passwordHash: await hashPassword(dto.password),
      role: UserRole.SUPERADMIN,
      organizationId: null,
    });
    return this.usersRepository.save(user);
  }

  async createForOrganization(
    organizationId: string,
    dto: CreateUserDto,
  ): Promise<User> {
    if (dto.role === UserRole.SUPERADMIN) {
      throw new ConflictException('Invalid role for the current operation');
    }
    const existing = await this.findByEmail(dto.email);
    if (existing) {
      throw new ConflictException('User with this email already exists');
    }

    const user = this.usersRepository.create({
      name: dto.name,
      email: dto.email.toLowerCase(),
      passwordHash: await hashPassword(dto.password),
      role: dto.role,
      organizationId,
    });
    return this.usersRepository.save(user);
  }

  async updatePassword(userId: string, password: string): Promise<void> {
    await this.usersRepository.update(userId, {
      passwordHash: await hashPassword(password),
    });
  }

  async recordLogin(userId: string): Promise<void> {
    await this.usersRepository.update(userId, {
      lastLogin: new Date(),
    });
  }

  /**
   * Deletes a user together with every order of their organization, then the
   * organization itself once nobody is left in it. E-way bills that cannot be
   * removed from storage are counted, not fatal.
   */
  async deleteAccount(
    actor: AuthenticatedUser,
    targetUserId: string,
  ): Promise<AccountDeletionResult> {
    const deletingSelf = actor.userId === targetUserId;
    if (!deletingSelf && actor.role !== UserRole.SUPERADMIN) {
      throw new ForbiddenException('Insufficient permissions');
    }
    const user = await this.findById(targetUserId);
    if (user.role === UserRole.SUPERADMIN) {
      throw new ForbiddenException('The super admin account cannot be deleted');
    }

    const result: AccountDeletionResult = {
      userId: user.id,
      ordersDeleted: 0,
      blobsDeleted: 0,
      blobFailures: 0,
      organizationDeleted: false,
    };

    const organizationId = user.organizationId;
    if (organizationId) {
      const summary =
        await this.fulfillmentService.deleteOrganizationOrders(organizationId);
      result.ordersDeleted = summary.ordersDeleted;
      result.blobsDeleted = summary.blobsDeleted;
      result.blobFailures = summary.blobFailures;
    }

    await this.usersRepository.delete({ id: user.id });
    this.logger.log(`Deleted user ${user.email}`);

    if (organizationId) {
      const remainingUsers = await this.usersRepository.count({
        where: { organizationId },
      });
      if (remainingUsers === 0) {
        await this.auditLogsService.deleteForOrganization(organizationId);
        await this.organizationsService.delete(organizationId);
        result.organizationDeleted = true;
        this.logger.log(`Deleted organization ${organizationId}`);
      }
    }

    return result;
  }
}
