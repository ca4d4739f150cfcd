import { applyDecorators, UseGuards } from '@nestjs/common';
import { AdminGuard } from '../guards/admin.guard';
import { JwtAuthGuard } from '../guards/jwt-auth.guard';
import { SubscriptionGuard } from '../guards/subscription.guard';

export const Authenticated = () => applyDecorators(UseGuards(JwtAuthGuard));

export const RequiresSubscription = () =>
  applyDecorators(UseGuards(JwtAuthGuard, SubscriptionGuard));

export const AdminOnly = () =>
  applyDecorators(UseGuards(JwtAuthGuard, AdminGuard));
