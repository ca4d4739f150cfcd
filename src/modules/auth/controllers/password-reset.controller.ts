import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ForgotPasswordDto, ResetPasswordDto } from '../dto';
import { PasswordResetService } from '../services/password-reset.service';

@Controller('auth')
export class PasswordResetController {
  constructor(private readonly passwordReset: PasswordResetService) {}

  /**
   * Same answer whether or not the address belongs to an account.
   */
  @Post('forgot-password')
  @HttpCode(HttpStatus.OK)
  async forgotPassword(@Body() body: ForgotPasswordDto) {
    await this.passwordReset.requestReset(body.email);
    return {
      message:
        'If an account exists for this email, a password reset token has been sent',
    };
  }

  @Post('reset-password')
  @HttpCode(HttpStatus.OK)
  async resetPassword(@Body() body: ResetPasswordDto) {
    await this.passwordReset.resetPassword(body.token, body.new_password);
    return { message: 'Password reset successfully' };
  }
}
