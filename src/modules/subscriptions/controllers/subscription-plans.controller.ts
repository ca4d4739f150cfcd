import { Body, Controller, Get, Param, Patch, Post, Query } from '@nestjs/common';
import { AdminOnly } from '../../auth/decorators/auth.decorators';
import {
  CreatePlanDto,
  PlanResponseDto,
  PlansQueryDto,
  toPlanResponse,
  UpdatePlanDto,
} from '../dto';
import { SubscriptionPlansService } from '../services/subscription-plans.service';

@Controller('subscriptions/plans')
export class SubscriptionPlansController {
  constructor(private readonly plansService: SubscriptionPlansService) {}

  @Get()
  async list(@Query() query: PlansQueryDto): Promise<PlanResponseDto[]> {
    const plans = await this.plansService.list(query.active_only ?? true);
    return plans.map(toPlanResponse);
  }

  @Get(':id')
  async get(@Param('id') id: string): Promise<PlanResponseDto> {
    return toPlanResponse(await this.plansService.get(id));
  }

  @Post()
  @AdminOnly()
  async create(@Body() body: CreatePlanDto): Promise<PlanResponseDto> {
    return toPlanResponse(await this.plansService.create(body));
  }

  @Patch(':id')
  @AdminOnly()
  async update(
    @Param('id') id: string,
    @Body() body: UpdatePlanDto,
  ): Promise<PlanResponseDto> {
    return toPlanResponse(await this.plansService.update(id, body));
  }
}
