import { Module } from '@nestjs/common';
import { MailModule } from '../mail/mail.module';
import { AuthController } from './controllers/auth.controller';
import { PasswordResetController } from './controllers/password-reset.controller';
import { AdminGuard, JwtAuthGuard, SubscriptionGuard } from './guards';
import {
  AuthService,
  PasswordHasherService,
  PasswordResetService,
  SessionResolverService,
  SubscriptionPolicyService,
  TokenCodecService,
} from './services';

@Module({
  imports: [MailModule],
  controllers: [AuthController, PasswordResetController],
  providers: [
    TokenCodecService,
    PasswordHasherService,
    AuthService,
    SessionResolverService,
    SubscriptionPolicyService,
    PasswordResetService,
    JwtAuthGuard,
    SubscriptionGuard,
    AdminGuard,
  ],
  exports: [
    TokenCodecService,
    PasswordHasherService,
    SessionResolverService,
    SubscriptionPolicyService,
    JwtAuthGuard,
    SubscriptionGuard,
    AdminGuard,
  ],
})
export class AuthModule {}
