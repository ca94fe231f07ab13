import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { AuthService } from './auth.service';
import { UsersService } from '../users/users.service';
import { OrganizationsService } from '../organizations/organizations.service';
import { AuditLogsService } from '../audit-logs/audit-logs.service';
import { User } from '../../entities/user.entity';
import { Organization } from '../../entities/organization.entity';
import { UserRole } from '../../common/enums/user-role.enum';
import { AuditAction } from '../../common/enums/audit-action.enum';
import { hashPassword } from '../../utils/password.util';

describe('AuthService', () => {
  let service: AuthService;
  let usersService: {
    findByEmail: jest.Mock;
    findById: jest.Mock;
    createForOrganization: jest.Mock;
    recordLogin: jest.Mock;
    updatePassword: jest.Mock;
  };
  let organizationsService: { findOrCreate: jest.Mock };
  let auditLogsService: { record: jest.Mock };
  let jwtService: { signAsync: jest.Mock };

  const organization = Object.assign(new Organization(), {
    id: 'org-1',
    name: 'Acme Traders',
  });

  function buildUser(overrides: Partial<User> = {}): User {
    return Object.assign(new User(), {
      id: 'user-1',
      name: 'Priya',
      email: 'priya@example.com',
      role: UserRole.ADMIN,
      organizationId: 'org-1',
      passwordHash: 'hash',
      ...overrides,
    });
  }

  beforeEach(async () => {
    usersService = {
      findByEmail: jest.fn(),
      findById: jest.fn(),
      createForOrganization: jest.fn(),
      recordLogin: jest.fn(),
      updatePassword: jest.fn(),
    };
    organizationsService = { findOrCreate: jest.fn() };
    auditLogsService = { record: jest.fn() };
    jwtService = { signAsync: jest.fn().mockResolvedValue('signed-token') };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthService,
        { provide: UsersService, useValue: usersService },
        { provide: OrganizationsService, useValue: organizationsService },
        { provide: AuditLogsService, useValue: auditLogsService },
        { provide: JwtService, useValue: jwtService },
        {
          provide: ConfigService,
          useValue: {
            getOrThrow: jest.fn((key: string) => {
              if (key !== 'auth') {
                throw new Error(`Unexpected config key ${key}`);
              }
              return { accessSecret: 'test-secret', accessExpiresIn: 3600 };
            }),
          },
        },
      ],
    }).compile();

    service = module.get<AuthService>(AuthService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('register', () => {
    const dto = {
      name: 'Priya',
      email: 'priya@example.com',
      password: 'secret1!',
      organizationName: 'Acme Traders',
    };

    it('creates a new organization with the user as admin', async () => {
      organizationsService.findOrCreate.mockResolvedValue({
        organization,
        created: true,
      });
      usersService.createForOrganization.mockResolvedValue(buildUser());

      const result = await service.register(dto);

      expect(organizationsService.findOrCreate).toHaveBeenCalledWith('Acme Traders');
      expect(usersService.createForOrganization).toHaveBeenCalledWith('org-1', {
        name: 'Priya',
        email: 'priya@example.com',
        password: 'secret1!',
        role: UserRole.ADMIN,
      });
      expect(result).toEqual({
        accessToken: 'signed-token',
        expiresIn: 3600,
        user: {
          id: 'user-1',
          name: 'Priya',
          email: 'priya@example.com',
          role: UserRole.ADMIN,
          organization: { id: 'org-1', name: 'Acme Traders' },
        },
      });
      expect(jwtService.signAsync).toHaveBeenCalledWith(
        {
          sub: 'user-1',
          role: UserRole.ADMIN,
          email: 'priya@example.com',
          organizationId: 'org-1',
        },
      );
    });

    it('joins an existing organization as staff', async () => {
      organizationsService.findOrCreate.mockResolvedValue({
        organization,
        created: false,
      });
      usersService.createForOrganization.mockResolvedValue(
        buildUser({ role: UserRole.STAFF }),
      );

      const result = await service.register(dto);

      expect(usersService.createForOrganization).toHaveBeenCalledWith(
        'org-1',
        expect.objectContaining({ role: UserRole.STAFF }),
      );
      expect(result.user.role).toBe(UserRole.STAFF);
      expect(auditLogsService.record).toHaveBeenCalledWith(
        expect.objectContaining({
          organizationId: 'org-1',
          action: AuditAction.CREATE,
          changes: { email: 'priya@example.com', role: UserRole.STAFF },
        }),
      );
    });

    it('rejects a password without a special symbol', async () => {
      await expect(
        service.register({ ...dto, password: 'secret12' }),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(organizationsService.findOrCreate).not.toHaveBeenCalled();
    });
  });

  describe('login', () => {
    it('issues a token for valid credentials', async () => {
      usersService.findByEmail.mockResolvedValue(
        buildUser({ passwordHash: await hashPassword('secret1!') }),
      );

      const result = await service.login({
        email: 'priya@example.com',
        password: 'secret1!',
      });

      expect(result.accessToken).toBe('signed-token');
      expect(usersService.recordLogin).toHaveBeenCalledWith('user-1');
      expect(auditLogsService.record).toHaveBeenCalledWith(
        expect.objectContaining({ action: AuditAction.LOGIN }),
      );
    });

    it('rejects a wrong password', async () => {
      usersService.findByEmail.mockResolvedValue(
        buildUser({ passwordHash: await hashPassword('secret1!') }),
      );

      await expect(
        service.login({ email: 'priya@example.com', password: 'wrong1!' }),
      ).rejects.toBeInstanceOf(UnauthorizedException);
      expect(usersService.recordLogin).not.toHaveBeenCalled();
    });

    it('rejects an unknown email', async () => {
      usersService.findByEmail.mockResolvedValue(null);

      await expect(
        service.login({ email: 'nobody@example.com', password: 'secret1!' }),
      ).rejects.toBeInstanceOf(UnauthorizedException);
    });
  });

  describe('changePassword', () => {
    it('requires the confirmation to match', async () => {
      await expect(
        service.changePassword('user-1', {
          currentPassword: 'secret1!',
          newPassword: 'newpass1!',
          confirmPassword: 'newpass2!',
        }),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(usersService.updatePassword).not.toHaveBeenCalled();
    });

    it('requires the current password', async () => {
      usersService.findById.mockResolvedValue(
        buildUser({ passwordHash: await hashPassword('secret1!') }),
      );

      await expect(
        service.changePassword('user-1', {
          currentPassword: 'wrong1!',
          newPassword: 'newpass1!',
          confirmPassword: 'newpass1!',
        }),
      ).rejects.toBeInstanceOf(UnauthorizedException);
    });

    it('stores the new password', async () => {
      usersService.findById.mockResolvedValue(
        buildUser({ passwordHash: await hashPassword('secret1!') }),
      );

      await service.changePassword('user-1', {
        currentPassword: 'secret1!',
        newPassword: 'newpass1!',
        confirmPassword: 'newpass1!',
      });

      expect(usersService.updatePassword).toHaveBeenCalledWith(
        'user-1',
        'newpass1!',
      );
    });
  });
});
