import {
  Controller,
  Post,
  Get,
  Delete,
  Body,
  Param,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { UserRegistryService } from '../../application/services/user-registry.service';
import { CreateUserDto } from '../../application/dtos/create-user.dto';
import { UserParams } from '../../application/dtos/user-params.dto';
import type {
  UserListResponseDto,
  UserResponseDto,
} from '../../application/dtos/user-response.dto';
import { presentUser, presentUsers } from './presenters';

@Controller('users')
export class UserController {
  constructor(private readonly userRegistry: UserRegistryService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createUser(@Body() dto: CreateUserDto): Promise<UserResponseDto> {
    return presentUser(await this.userRegistry.createUser(dto));
  }

  @Get()
  async listUsers(): Promise<UserListResponseDto> {
    return presentUsers(await this.userRegistry.listUsers());
  }

  @Get(':userId')
  async getUser(@Param() params: UserParams): Promise<UserResponseDto> {
    return presentUser(await this.userRegistry.getUser(params.userId));
  }

  @Delete(':userId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteUser(@Param() params: UserParams): Promise<void> {
    await this.userRegistry.deleteUser(params.userId);
  }
}
