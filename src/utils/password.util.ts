import * as bcrypt from 'bcryptjs';

const SALT_ROUNDS = 10;

/** Letters, digits and @$!%*?& only; at least 6 long with one of each class. */
export const PASSWORD_POLICY =
  /^(?=.*[A-Za-z])(?=.*\d)(?=.*[@$!%*?&])[A-Za-z\d@$!%*?&]{6,}$/;

export const PASSWORD_POLICY_MESSAGE =
  'Password must be at least 6 characters long and contain at least one letter, one digit, and one special symbol (@$!%*?&).';

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, SALT_ROUNDS);
}

export function comparePassword(
  password: string,
  passwordHash: string,
): Promise<boolean> {
  return bcrypt.compare(password, passwordHash);
}
