import { IsOptional, IsString, MaxLength } from "class-validator";

export class StopRequestDto {
  @IsOptional()
  @IsString()
  @MaxLength(200)
  reason?: string;
}
