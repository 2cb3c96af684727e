import { Expose, Type } from 'class-transformer';

/**
 * Response DTO for a user together with its wallet balance.
 */
export class UserResponseDto {
  @Expose()
  id!: string;

  @Expose()
  name!: string;

  @Expose()
  email!: string;

  @Expose()
  phone!: string;

  @Expose()
  walletBalance!: string;

  @Expose()
  createdAt!: string;
}

export class UserListResponseDto {
  @Expose()
  count!: number;

  @Expose()
  @Type(() => UserResponseDto)
  users!: UserResponseDto[];
}
