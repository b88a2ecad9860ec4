import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  Post,
} from '@nestjs/common';
import type { LoggerService } from '../shared/types';
import { CleaningService } from './cleaning.service';
import { CheckPhrasesDto } from './dto/check-phrases.dto';
import { CleanTextDto } from './dto/clean-text.dto';

@Controller('cleaning')
export class CleaningController {
  constructor(
    private readonly cleaningService: CleaningService,
    @Inject('LOGGER_SERVICE') private readonly logger: LoggerService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  clean(@Body() dto: CleanTextDto) {
    this.logger.debug(`POST /cleaning (${dto.text.length} chars)`);
    return this.cleaningService.clean(dto);
  }

  @Post('check')
  @HttpCode(HttpStatus.OK)
  check(@Body() dto: CheckPhrasesDto) {
    this.logger.debug('POST /cleaning/check');
    return this.cleaningService.check(dto.text);
  }

  @Get('stopwords/:dialect')
  stopwords(@Param('dialect') dialect: string) {
    this.logger.debug(`GET /cleaning/stopwords/${dialect}`);
    return this.cleaningService.stopwordsFor(dialect);
  }
}
