import { registerAs } from '@nestjs/config';

export interface AuthConfig {
  accessSecret: string;
  /** Seconds. */
  accessExpiresIn: number;
}

const DEFAULT_ACCESS_EXPIRES_IN = 3600;

export default registerAs('auth', (): AuthConfig => {
  const accessSecret = process.env.JWT_ACCESS_SECRET;
  if (!accessSecret) {
    throw new Error('JWT_ACCESS_SECRET must be set');
  }
  const expiresIn = parseInt(process.env.JWT_ACCESS_EXPIRES_IN ?? '', 10);
  return {
    accessSecret,
    accessExpiresIn:
      Number.isFinite(expiresIn) && expiresIn > 0
        ? expiresIn
        : DEFAULT_ACCESS_EXPIRES_IN,
  };
});
