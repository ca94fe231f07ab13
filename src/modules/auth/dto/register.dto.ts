import { IsEmail, IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';
import {
  PASSWORD_POLICY,
  PASSWORD_POLICY_MESSAGE,
} from '../../../utils/password.util';

export class RegisterDto {
  @IsNotEmpty()
  @IsString()
  @MaxLength(120)
  name!: string;

  @IsEmail()
  email!: string;

  @Matches(PASSWORD_POLICY, { message: PASSWORD_POLICY_MESSAGE })
  password!: string;

  @IsNotEmpty()
  @IsString()
  @MaxLength(150)
  organizationName!: string;
}
