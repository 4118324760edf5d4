import axios from 'axios';
import { axiosResponse } from '../../testing/axios-response';
import { CoinMarketCapService } from './coinmarketcap.service';
import { testConfig } from '../../testing/test-database';

jest.mock('axios');
const mockedGet = jest.mocked(axios.get);

describe('CoinMarketCapService', () => {
  afterEach(() => jest.resetAllMocks());

  it('requests all symbols in one call and maps the converted quote', async () => {
    const service = new CoinMarketCapService(testConfig({ CMC_API_KEY: 'test-key' }));
    mockedGet.mockResolvedValueOnce(axiosResponse({
      data: {
        BTC: {
          quote: {
            EUR: { price: 50000, percent_change_24h: 2.5, volume_24h: 1000, market_cap: 900000 },
          },
        },
        ETH: { quote: { EUR: { price: null } } },
      },
    }));

    const quotes = await service.getQuotes(['btc', 'eth', 'BTC'], 'EUR');

    expect(mockedGet).toHaveBeenCalledTimes(1);
    expect(mockedGet.mock.calls[0][1]?.params).toEqual({ symbol: 'BTC,ETH', convert: 'EUR' });
    expect([...quotes.values()]).toEqual([
      { symbol: 'BTC', price: 50000, percentChange24h: 2.5, volume24h: 1000, marketCap: 900000 },
    ]);
  });

  it('skips symbols quoted at zero', async () => {
    const service = new CoinMarketCapService(testConfig({ CMC_API_KEY: 'test-key' }));
    mockedGet.mockResolvedValueOnce(axiosResponse({
      data: { DEAD: { quote: { USD: { price: 0, percent_change_24h: 0 } } } },
    }));

    await expect(service.getQuotes(['DEAD'])).resolves.toEqual(new Map());
  });

  it('returns no quotes when the request fails', async () => {
    const service = new CoinMarketCapService(testConfig({ CMC_API_KEY: 'test-key' }));
    mockedGet.mockRejectedValueOnce(new Error('Request failed with status code 401'));

    await expect(service.getQuotes(['BTC'])).resolves.toEqual(new Map());
  });
});
