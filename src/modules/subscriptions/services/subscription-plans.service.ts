import { Injectable } from '@nestjs/common';
import { NotFoundError } from '../../../core/errors';
import { logger } from '../../../core/logger/logger.config';
import { SubscriptionPlansRepository } from '../../../database/repositories';
import {
  DEFAULT_PLAN_CURRENCY,
  SubscriptionPlan,
} from '../../../domain/subscriptions/models';
import { CreatePlanDto, UpdatePlanDto } from '../dto';

@Injectable()
export class SubscriptionPlansService {
  private readonly logger = logger();

  constructor(private readonly plans: SubscriptionPlansRepository) {}

  list(activeOnly: boolean): Promise<SubscriptionPlan[]> {
    return this.plans.list(activeOnly);
  }

  async get(id: string): Promise<SubscriptionPlan> {
    const plan = await this.plans.findById(id);
    if (!plan) throw new NotFoundError('Subscription plan');
    return plan;
  }

  async create(dto: CreatePlanDto): Promise<SubscriptionPlan> {
    const plan = await this.plans.create({
      name: dto.name,
      description: dto.description,
      price: dto.price,
      currency: (dto.currency ?? DEFAULT_PLAN_CURRENCY).toUpperCase(),
      durationDays: dto.duration_days,
      isActive: dto.is_active ?? true,
    });
    this.logger.info({ planId: plan.id, name: plan.name }, 'Subscription plan created');
    return plan;
  }

  async update(id: string, dto: UpdatePlanDto): Promise<SubscriptionPlan> {
    const plan = await this.plans.update(id, {
      name: dto.name,
      description: dto.description,
      price: dto.price,
      currency: dto.currency?.toUpperCase(),
      durationDays: dto.duration_days,
      isActive: dto.is_active,
    });
    if (!plan) throw new NotFoundError('Subscription plan');

    this.logger.info({ planId: plan.id }, 'Subscription plan updated');
    return plan;
  }
}
