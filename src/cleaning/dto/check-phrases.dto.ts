import { IsString } from 'class-validator';

export class CheckPhrasesDto {
  @IsString()
  text!: string;
}
