import { IsEmail, IsEnum, IsNotEmpty, IsString, Matches } from 'class-validator';
import { UserRole } from '../../../common/enums/user-role.enum';
import {
  PASSWORD_POLICY,
  PASSWORD_POLICY_MESSAGE,
} from '../../../utils/password.util';

export class CreateUserDto {
  @IsNotEmpty()
  @IsString()
  name!: string;

  @IsEmail()
  email!: string;

  @Matches(PASSWORD_POLICY, { message: PASSWORD_POLICY_MESSAGE })
  password!: string;

  @IsEnum(UserRole)
  role!: UserRole;
}
