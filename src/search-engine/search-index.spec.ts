import { ApiError } from './errors/api.error';
import { SearchTransport } from './interfaces/transport.interface';
import { SearchIndex } from './search-index';

describe('SearchIndex', () => {
  let transport: jest.Mocked<SearchTransport>;
  let index: SearchIndex;

  beforeEach(() => {
    transport = { request: jest.fn().mockResolvedValue({ acknowledged: true }) };
    index = new SearchIndex(transport, 'site-default-1');
  });

  it('should default the settings key to the index name', () => {
    expect(index.getSettingsKey()).toBe('site-default-1');

    index.setSettingsKey('site-default');
    expect(index.getSettingsKey()).toBe('site-default');
  });

  describe('exists', () => {
    it('should be true when the engine knows the index', async () => {
      await expect(index.exists()).resolves.toBe(true);
      expect(transport.request).toHaveBeenCalledWith('HEAD', '/site-default-1');
    });

    it('should be false on a 404', async () => {
      transport.request.mockRejectedValue(new ApiError('HEAD /site-default-1 failed', 404));

      await expect(index.exists()).resolves.toBe(false);
    });

    it('should propagate other failures', async () => {
      transport.request.mockRejectedValue(new ApiError('No response received', 0));

      await expect(index.exists()).rejects.toBeInstanceOf(ApiError);
    });
  });

  it('should create the index with its settings', async () => {
    await index.create({ number_of_shards: 1 });

    expect(transport.request).toHaveBeenCalledWith('PUT', '/site-default-1', {
      body: { settings: { number_of_shards: 1 } },
    });
  });

  it('should delete and refresh the index', async () => {
    await index.delete();
    await index.refresh();

    expect(transport.request.mock.calls).toEqual([
      ['DELETE', '/site-default-1'],
      ['POST', '/site-default-1/_refresh'],
    ]);
  });

  it('should scope requests to the index', async () => {
    await index.request('POST', '/_search', { query: { match_all: {} } });

    expect(transport.request).toHaveBeenCalledWith('POST', '/site-default-1/_search', {
      body: { query: { match_all: {} } },
      contentType: undefined,
    });
  });
});
