import { Type } from 'class-transformer'
import { IsInt, IsOptional, Matches, Max, Min } from 'class-validator'
import { MAX_LISTING_DAYS } from '../tasks.types'

export class ListTasksQueryDto {
  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  @IsOptional()
  from?: string

  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  @IsOptional()
  to?: string

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_LISTING_DAYS)
  @IsOptional()
  days?: number

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  planId?: number
}
