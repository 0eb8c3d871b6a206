import { IsInt, IsNumber, IsOptional, IsString, MaxLength, Min } from 'class-validator'

export class CompleteTaskDto {
  @IsInt()
  @Min(0)
  @IsOptional()
  actualDurationMin?: number

  @IsNumber()
  @Min(0)
  @IsOptional()
  calories?: number

  @IsNumber()
  @Min(0)
  @IsOptional()
  avgHr?: number

  @IsNumber()
  @Min(0)
  @IsOptional()
  distanceKm?: number

  @IsString()
  @IsOptional()
  linkedActivityId?: string

  @IsString()
  @MaxLength(2000)
  @IsOptional()
  note?: string
}
