import { BadRequestException, Controller, Get, Param, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PriceCache, PriceUnavailableError, symbolSchema } from '@libs/alerts';
import { toExchangeSymbol } from '@libs/market-data';

@Controller('prices')
export class PricesController {
  private readonly exchangeSuffix: string;

  constructor(
    private readonly priceCache: PriceCache,
    configService: ConfigService,
  ) {
    this.exchangeSuffix = configService.get<string>('SYMBOL_EXCHANGE_SUFFIX', '.NS');
  }

  @Get(':symbol')
  async price(@Param('symbol') raw: string): Promise<{
    ok: true;
    symbol: string;
    price: number;
    observedAt: string;
    openPrice: number | null;
    previousClose: number | null;
    stale: boolean;
  }> {
    const parsed = symbolSchema.safeParse(raw);
    if (!parsed.success) {
      throw new BadRequestException('Invalid symbol');
    }
    const symbol = toExchangeSymbol(parsed.data, this.exchangeSuffix);

    try {
      const observation = await this.priceCache.lookup(symbol, Date.now());
      return {
        ok: true,
        symbol: observation.symbol,
        price: observation.price,
        observedAt: new Date(observation.observedAt).toISOString(),
        openPrice: observation.openPrice,
        previousClose: observation.previousClose,
        stale: observation.stale,
      };
    } catch (error) {
      if (error instanceof PriceUnavailableError) {
        throw new ServiceUnavailableException(error.message);
      }
      throw error;
    }
  }
}
