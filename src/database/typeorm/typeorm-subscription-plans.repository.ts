import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { isUUID } from 'class-validator';
import { Repository } from 'typeorm';
import {
  NewSubscriptionPlan,
  SubscriptionPlan,
  SubscriptionPlanChanges,
} from '../../domain/subscriptions/models';
import { SubscriptionPlanEntity } from '../entities';
import { SubscriptionPlansRepository } from '../repositories';

@Injectable()
export class TypeOrmSubscriptionPlansRepository extends SubscriptionPlansRepository {
  constructor(
    @InjectRepository(SubscriptionPlanEntity)
    private readonly plans: Repository<SubscriptionPlanEntity>,
  ) {
    super();
  }

  async findById(id: string): Promise<SubscriptionPlan | null> {
    if (!isUUID(id)) return null;
    return this.plans.findOne({ where: { id } });
  }

  list(activeOnly: boolean): Promise<SubscriptionPlan[]> {
    return this.plans.find({
      where: activeOnly ? { isActive: true } : {},
      order: { price: 'ASC' },
    });
  }

  create(data: NewSubscriptionPlan): Promise<SubscriptionPlan> {
    return this.plans.save(this.plans.create(data));
  }

  async update(
    id: string,
    changes: SubscriptionPlanChanges,
  ): Promise<SubscriptionPlan | null> {
    if (!isUUID(id)) return null;
    const existing = await this.plans.findOne({ where: { id } });
    if (!existing) return null;
    return this.plans.save(this.plans.merge(existing, changes));
  }
}
