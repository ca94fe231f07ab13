import { IsNotEmpty, IsString, Matches } from 'class-validator';
import {
  PASSWORD_POLICY,
  PASSWORD_POLICY_MESSAGE,
} from '../../../utils/password.util';

export class ChangePasswordDto {
  @IsNotEmpty()
  @IsString()
  currentPassword!: string;

  @Matches(PASSWORD_POLICY, { message: PASSWORD_POLICY_MESSAGE })
  newPassword!: string;

  @IsNotEmpty()
  @IsString()
  confirmPassword!: string;
}
