import {
  IsEmail,
  IsNotEmpty,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { MAX_NAME_LENGTH, PHONE_PATTERN } from '@app/common';

/**
 * Request DTO for registering a user (and its wallet).
 */
export class CreateUserDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_NAME_LENGTH)
  name!: string;

  @IsEmail()
  email!: string;

  @IsString()
  @Matches(PHONE_PATTERN, {
    message: "phone must be 7 to 15 digits with an optional leading '+'",
  })
  phone!: string;
}
