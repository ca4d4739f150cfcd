import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { RefreshedAccessToken, SessionTokens } from '../../../domain/auth';
import { Principal } from '../../../domain/users';
import { Authenticated } from '../decorators/auth.decorators';
import { CurrentUser } from '../decorators/current-user.decorator';
import {
  LoginDto,
  RefreshTokenDto,
  RegisterDto,
  toUserResponse,
  UserResponseDto,
} from '../dto';
import { AuthService } from '../services/auth.service';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  register(@Body() body: RegisterDto): Promise<SessionTokens> {
    return this.authService.register({
      username: body.username,
      email: body.email,
      password: body.password,
      firstName: body.first_name,
      lastName: body.last_name,
      phoneNumber: body.phone_number,
    });
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(@Body() body: LoginDto): Promise<SessionTokens> {
    return this.authService.login(body.username, body.password);
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  refresh(@Body() body: RefreshTokenDto): Promise<RefreshedAccessToken> {
    return this.authService.refresh(body.refresh_token);
  }

  @Get('user-details')
  @Authenticated()
  userDetails(@CurrentUser() user: Principal): UserResponseDto {
    return toUserResponse(user);
  }

  @Get('verify-token')
  @Authenticated()
  verifyToken(@CurrentUser() user: Principal) {
    return {
      message: 'Token is valid',
      username: user.username,
      user_id: user.id,
      is_admin: user.isAdmin,
      is_subscribed: user.isSubscribed,
      subscription_expiry: user.subscriptionExpiry?.toISOString() ?? null,
    };
  }
}
