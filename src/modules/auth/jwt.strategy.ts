import { Injectable, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { AuthenticatedUser } from '../../common/decorators/current-user.decorator';
import { AuthConfig } from '../../config/auth.config';
import { UsersService } from '../users/users.service';

export interface AccessTokenPayload {
  sub: string;
  email: string;
  role: string;
  organizationId: string | null;
}

/**
 * Bearer tokens only. The account is re-read on every request so that a
 * deleted user's outstanding tokens stop working and role or organization
 * come from the stored row rather than the token.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private readonly usersService: UsersService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<AuthConfig>('auth').accessSecret,
    });
  }

  async validate(payload: AccessTokenPayload): Promise<AuthenticatedUser> {
    try {
      const user = await this.usersService.findById(payload.sub);
      return {
        userId: user.id,
        email: user.email,
        role: user.role,
        organizationId: user.organizationId,
      };
    } catch (error) {
      if (error instanceof NotFoundException) {
        throw new UnauthorizedException('Account no longer exists');
      }
      throw error;
    }
  }
}
