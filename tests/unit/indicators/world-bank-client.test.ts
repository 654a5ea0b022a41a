import pinoLib from 'pino';
import { describe, expect, it, vi } from 'vitest';

import { createSilentLogger } from '@/infra/logger/index.js';
import { seriesPath } from '@/modules/indicators/core/types.js';
import {
  buildPageUrl,
  makeWorldBankClient,
} from '@/modules/indicators/shell/http/world-bank-client.js';

import type { PageRequest } from '@/modules/indicators/core/types.js';

const BASE_URL = 'http://stats.test/v2';
const catalogRequest: PageRequest = { path: 'country', query: {}, pageSize: 300 };
const CATALOG_PAGE_1 = 'http://stats.test/v2/country?format=json&per_page=300&page=1';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

const makeClient = (fetchStub: typeof fetch) =>
  makeWorldBankClient({
    baseUrl: BASE_URL,
    timeoutMs: 1000,
    logger: createSilentLogger(),
    fetch: fetchStub,
  });

describe('buildPageUrl', () => {
  it('adds format, page size and page number', () => {
    expect(buildPageUrl(BASE_URL, catalogRequest, 2)).toBe(
      'http://stats.test/v2/country?format=json&per_page=300&page=2'
    );
  });

  it('appends fixed query parameters and keeps the period range readable', () => {
    const request: PageRequest = {
      path: seriesPath('SP.POP.TOTL'),
      query: { date: '2010:2028' },
      pageSize: 20000,
    };

    expect(buildPageUrl(`${BASE_URL}/`, request, 1)).toBe(
      'http://stats.test/v2/country/all/indicator/SP.POP.TOTL?format=json&per_page=20000&page=1&date=2010:2028'
    );
  });
});

describe('makeWorldBankClient', () => {
  it('returns the parsed body of a successful response', async () => {
    const body = [{ page: 1, pages: 1, per_page: 300, total: 1 }, [{ id: 'ABC' }]];
    const fetchStub = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(body));

    const result = await makeClient(fetchStub).getPage(catalogRequest, 1);

    expect(result._unsafeUnwrap()).toEqual(body);
    expect(fetchStub).toHaveBeenCalledTimes(1);
    expect(fetchStub.mock.calls[0]?.[0]).toBe(CATALOG_PAGE_1);
  });

  it('sends an accept header and an abort signal', async () => {
    const fetchStub = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([]));

    await makeClient(fetchStub).getPage(catalogRequest, 1);

    const init = fetchStub.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({ accept: 'application/json' });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('maps a 5xx status to a retryable transport error', async () => {
    const fetchStub = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({}, 503));

    const result = await makeClient(fetchStub).getPage(catalogRequest, 1);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'TransportError',
      kind: 'transport',
      message: `Request to ${CATALOG_PAGE_1} failed with HTTP 503`,
      retryable: true,
      status: 503,
    });
  });

  it('maps a 4xx status to a non-retryable transport error', async () => {
    const fetchStub = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({}, 400));

    const result = await makeClient(fetchStub).getPage(catalogRequest, 1);

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('TransportError');
    expect(error.retryable).toBe(false);
  });

  it('maps a network failure to a retryable transport error', async () => {
    const fetchStub = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    const result = await makeClient(fetchStub).getPage(catalogRequest, 1);

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('TransportError');
    expect(error.message).toBe(`Request to ${CATALOG_PAGE_1} failed: fetch failed`);
    expect(error.retryable).toBe(true);
  });

  it('maps an aborted request to a timeout error', async () => {
    const abort = Object.assign(new Error('The operation was aborted due to timeout'), {
      name: 'TimeoutError',
    });
    const fetchStub = vi.fn<typeof fetch>().mockRejectedValue(abort);

    const result = await makeClient(fetchStub).getPage(catalogRequest, 1);

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('TimeoutError');
    expect(error.message).toBe(`Request to ${CATALOG_PAGE_1} timed out after 1000 ms`);
  });

  it('maps a body that is not JSON to a malformed response error', async () => {
    const fetchStub = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response('<html>maintenance</html>', { status: 200 }));

    const result = await makeClient(fetchStub).getPage(catalogRequest, 1);

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('MalformedResponseError');
    expect(error.message).toBe(`Response from ${CATALOG_PAGE_1} is not valid JSON`);
    expect(error.retryable).toBe(false);
  });

  it('logs with the component binding of the logger it is given', async () => {
    const lines: string[] = [];
    const logger = pinoLib({ level: 'debug' }, { write: (line: string) => lines.push(line) });
    const fetchStub = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([{ total: 0 }, []]));
    const client = makeWorldBankClient({
      baseUrl: BASE_URL,
      timeoutMs: 1000,
      logger: logger.child({ component: 'stats-api' }),
      fetch: fetchStub,
    });

    await client.getPage(catalogRequest, 1);

    expect(lines).toHaveLength(1);
    const line = lines[0] ?? '';
    expect(line.match(/"component":/g)).toHaveLength(1);
    expect(JSON.parse(line)).toMatchObject({
      component: 'stats-api',
      url: CATALOG_PAGE_1,
      page: 1,
      msg: 'Fetching page',
    });
  });
});
