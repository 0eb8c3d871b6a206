import { Type } from 'class-transformer'
import {
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator'
import { ADJUSTMENT_MODES, type AdjustmentMode } from '../../plan-adjustments/plan-adjustments.types'
import type { PlanShape } from '../../task-store/task-store.types'

const PLAN_SHAPES: PlanShape[] = ['single-week', 'multi-week-block']
const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/

export class MaterializePlanDto {
  @IsObject()
  document!: Record<string, unknown>

  @IsIn(PLAN_SHAPES)
  shape!: PlanShape

  @Matches(DATE_KEY)
  @IsOptional()
  anchorDate?: string

  @IsString()
  @MaxLength(200)
  @IsOptional()
  name?: string

  @IsString()
  @MaxLength(200)
  @IsOptional()
  goal?: string
}

export class GeneratePlanDto {
  @IsIn(PLAN_SHAPES)
  shape!: PlanShape

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  goal!: string

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(12)
  @IsOptional()
  weeks?: number

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(7)
  @IsOptional()
  daysPerWeek?: number

  @Matches(DATE_KEY)
  @IsOptional()
  anchorDate?: string

  @IsString()
  @MaxLength(200)
  @IsOptional()
  name?: string

  @IsObject()
  @IsOptional()
  readiness?: Record<string, unknown>
}

export class ReconcileActivitiesDto {
  @IsArray()
  activities!: unknown[]
}

export class AdjustPlanDto {
  @IsIn(ADJUSTMENT_MODES)
  mode!: AdjustmentMode

  @IsObject()
  @IsOptional()
  readiness?: Record<string, unknown>
}
