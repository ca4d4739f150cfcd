import { Body, Controller, Delete, Get, Param, Put, Query } from '@nestjs/common';
import { Principal } from '../../domain/users';
import { AdminOnly, Authenticated } from '../auth/decorators/auth.decorators';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import { toUserResponse, UserResponseDto } from '../auth/dto/user-response.dto';
import { ListUsersQueryDto, UpdateUserDto } from './dto';
import { UsersService } from './users.service';

@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get()
  @Authenticated()
  async list(
    @CurrentUser() user: Principal,
    @Query() query: ListUsersQueryDto,
  ): Promise<UserResponseDto[]> {
    const users = await this.usersService.listOthers(user, query.limit);
    return users.map(toUserResponse);
  }

  @Get('me')
  @Authenticated()
  me(@CurrentUser() user: Principal): UserResponseDto {
    return toUserResponse(user);
  }

  @Put('me')
  @Authenticated()
  async updateMe(
    @CurrentUser() user: Principal,
    @Body() body: UpdateUserDto,
  ): Promise<UserResponseDto> {
    return toUserResponse(await this.usersService.updateProfile(user, body));
  }

  @Get(':id')
  @AdminOnly()
  async get(@Param('id') id: string): Promise<UserResponseDto> {
    return toUserResponse(await this.usersService.get(id));
  }

  @Delete(':id')
  @AdminOnly()
  async delete(@Param('id') id: string): Promise<{ message: string }> {
    await this.usersService.delete(id);
    return { message: 'User deleted successfully' };
  }
}
