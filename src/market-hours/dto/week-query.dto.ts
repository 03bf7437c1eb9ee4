import { IsOptional, IsString } from 'class-validator';

export class WeekQueryDto {
  // El formato YYYY-MM-DD se valida en el servicio (InvalidDateError)
  @IsOptional()
  @IsString()
  startDate?: string;
}
