import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { AuthGuard } from '../guards/auth.guard';
import { RolesGuard } from '../guards/roles.guard';
import { Roles } from '../../decorators/roles.decorator';
import { CurrentUser } from '../../decorators/current-user.decorator';
import { RequestSignal } from '../../decorators/request-signal.decorator';
import { AuthenticatedUser } from '../../types';
import { Logger } from '../../utils/logger';
import { unwrapResult } from '../../utils/result';
import { GetLatestRatesHandler } from '../../services/rates/queries/get-latest-rates.handler';
import { ConvertCurrencyHandler } from '../../services/rates/queries/convert-currency.handler';
import { GetHistoricalRatesHandler } from '../../services/rates/queries/get-historical-rates.handler';
import { HistoricalRateSet, RateSnapshot } from '../../services/rates/interfaces/rates.types';

type QueryParams = Record<string, unknown>;

@Controller('rates')
@UseGuards(AuthGuard, RolesGuard)
export class RatesController {
  private logger = new Logger('RatesController');

  constructor(
    private readonly latestRatesHandler: GetLatestRatesHandler,
    private readonly convertCurrencyHandler: ConvertCurrencyHandler,
    private readonly historicalRatesHandler: GetHistoricalRatesHandler
  ) {}

  @Get('latest')
  @Roles('User', 'Admin')
  async getLatestRates(
    @Query() query: QueryParams,
    @RequestSignal() signal: AbortSignal
  ): Promise<RateSnapshot> {
    return unwrapResult(await this.latestRatesHandler.execute(query, signal));
  }

  @Get('convert')
  @Roles('User', 'Admin')
  async convert(
    @Query() query: QueryParams,
    @RequestSignal() signal: AbortSignal
  ): Promise<RateSnapshot> {
    return unwrapResult(await this.convertCurrencyHandler.execute(query, signal));
  }

  @Get('historical')
  @Roles('Admin')
  async getHistoricalRates(
    @Query() query: QueryParams,
    @CurrentUser() user: AuthenticatedUser,
    @RequestSignal() signal: AbortSignal
  ): Promise<HistoricalRateSet> {
    this.logger.debug(`Historical rates requested by ${user.userId}`, { query });
    return unwrapResult(await this.historicalRatesHandler.execute(query, signal));
  }
}
