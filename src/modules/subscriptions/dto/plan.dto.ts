import { Transform } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  MaxLength,
  Min,
} from 'class-validator';
import { SubscriptionPlan } from '../../../domain/subscriptions/models';

export class CreatePlanDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @IsString()
  description!: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  price!: number;

  @IsOptional()
  @IsString()
  @Length(3, 3)
  currency?: string;

  @IsInt()
  @Min(1)
  duration_days!: number;

  @IsOptional()
  @IsBoolean()
  is_active?: boolean;
}

export class UpdatePlanDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  price?: number;

  @IsOptional()
  @IsString()
  @Length(3, 3)
  currency?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  duration_days?: number;

  @IsOptional()
  @IsBoolean()
  is_active?: boolean;
}

export class PlansQueryDto {
  /**
   * Defaults to true. Read from the raw query string, since implicit
   * conversion turns "false" into true.
   */
  @IsOptional()
  @IsBoolean()
  @Transform(({ obj, key }) => {
    const raw: unknown = Reflect.get(obj, key);
    if (raw === undefined || raw === '') return undefined;
    return raw === true || raw === 'true' || raw === '1';
  })
  active_only?: boolean;
}

export interface PlanResponseDto {
  id: string;
  name: string;
  description: string;
  price: number;
  currency: string;
  duration_days: number;
  is_active: boolean;
  created_at: string;
  updated_at: string | null;
}

export const toPlanResponse = (plan: SubscriptionPlan): PlanResponseDto => ({
  id: plan.id,
  name: plan.name,
  description: plan.description,
  price: plan.price,
  currency: plan.currency,
  duration_days: plan.durationDays,
  is_active: plan.isActive,
  created_at: plan.createdAt.toISOString(),
  updated_at: plan.updatedAt?.toISOString() ?? null,
});
