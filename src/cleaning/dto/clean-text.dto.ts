import { IsBoolean, IsOptional, IsString, MaxLength } from 'class-validator';

export class CleanTextDto {
  @IsString()
  text!: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  source?: string; // e.g. 'amarujala', 'api'

  /** Run the boilerplate rule chain before the pipeline. */
  @IsOptional()
  @IsBoolean()
  scrub?: boolean;

  @IsOptional()
  @IsBoolean()
  html?: boolean;

  @IsOptional()
  @IsBoolean()
  filterPunctuation?: boolean;

  @IsOptional()
  @IsBoolean()
  decodeEscapes?: boolean;
}
