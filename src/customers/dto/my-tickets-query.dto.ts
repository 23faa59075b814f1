import { IsOptional, IsString } from 'class-validator';

export class MyTicketsQueryDto {
  /** `true` (any case) returns only ticket ids. */
  @IsOptional()
  @IsString()
  summary?: string;

  get summaryOnly(): boolean {
    return this.summary?.toLowerCase() === 'true';
  }
}
