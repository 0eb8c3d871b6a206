import { IsOptional, IsString, MaxLength } from 'class-validator'

export class UpdateTaskNoteDto {
  @IsString()
  @MaxLength(2000)
  @IsOptional()
  note?: string | null
}
