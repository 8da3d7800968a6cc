import { HttpInventoryRepository, HttpLikeError } from './http-inventory.repository';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('HttpInventoryRepository', () => {
  const repository = new HttpInventoryRepository({
    baseUrl: 'http://store.test/api/',
    apiToken: 'test-token',
    maxRetries: 2,
    retryBaseDelayMs: 0,
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reads existing keys with the bearer token', async () => {
    const fetchMock = jest
      .spyOn(global, 'fetch')
      .mockResolvedValue(jsonResponse([{ id: 'item-1', sku: 'EX-1' }]));

    await expect(repository.getExistingKeys()).resolves.toEqual(new Map([['EX-1', 'item-1']]));

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://store.test/api/items/keys');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer test-token',
    });
  });

  it('posts the whole batch in one request', async () => {
    const fetchMock = jest
      .spyOn(global, 'fetch')
      .mockResolvedValue(jsonResponse({ created: 0, updated: 1 }));
    const mutations = [
      {
        kind: 'update' as const,
        rowNumber: 1,
        sku: 'EX-1',
        id: 'item-1',
        changes: { name: 'Renamed' },
      },
    ];

    await expect(repository.applyBatch(mutations)).resolves.toEqual({ created: 0, updated: 1 });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://store.test/api/items/batch');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ mutations }));
  });

  it('passes the export filter as query parameters', async () => {
    const fetchMock = jest.spyOn(global, 'fetch').mockResolvedValue(jsonResponse([]));

    await repository.listRecords({ locationId: 'loc-main' });

    expect(fetchMock.mock.calls[0][0]).toBe(
      'http://store.test/api/items?active=true&location_id=loc-main',
    );
  });

  it('retries when the store is rate limited', async () => {
    let locationCalls = 0;
    const fetchMock = jest.spyOn(global, 'fetch').mockImplementation(async (input) => {
      if (String(input).endsWith('/locations')) {
        locationCalls += 1;
        return locationCalls === 1
          ? new Response('slow down', { status: 429 })
          : jsonResponse([{ id: 'loc-main', name: 'Main Store' }]);
      }

      return jsonResponse([]);
    });

    const snapshot = await repository.getReferenceSnapshot();

    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(snapshot).toEqual({
      locations: [{ id: 'loc-main', name: 'Main Store' }],
      categories: [],
      suppliers: [],
    });
  });

  it('does not retry other errors', async () => {
    const fetchMock = jest
      .spyOn(global, 'fetch')
      .mockResolvedValue(new Response('constraint violated', { status: 409 }));

    await expect(repository.applyBatch([])).rejects.toEqual(
      new HttpLikeError('Store HTTP 409: constraint violated', 409),
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
