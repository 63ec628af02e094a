import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { HttpError, fetchWithRetry, getJson, postJson } from '../../src/http/client.js';
import { catchAsyncError } from '../helpers/fixtures.js';

const idSchema = z.object({ id: z.string() });

describe('http client', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('throws a 4xx at once with the response body', async () => {
    const fetchMock = vi.fn(async () => new Response('{"error":"nope"}', { status: 404, statusText: 'Not Found' }));
    vi.stubGlobal('fetch', fetchMock);

    const error = await catchAsyncError(fetchWithRetry('https://api.example.com/thing', {}, { maxRetries: 3 }));

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 404, body: '{"error":"nope"}', message: 'HTTP 404: Not Found' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries a 5xx and returns the later success', async () => {
    const fetchMock = vi.fn(async () => new Response('{"id":"x"}'));
    fetchMock.mockResolvedValueOnce(new Response('busy', { status: 503, statusText: 'Service Unavailable' }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(getJson('https://api.example.com/thing', idSchema, { maxRetries: 1 })).resolves.toEqual({ id: 'x' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('reports a transport failure as status 0', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));

    const error = await catchAsyncError(fetchWithRetry('https://api.example.com/thing', {}, { maxRetries: 0 }));

    expect(error instanceof HttpError && error.isNetworkError).toBe(true);
    expect(error).toMatchObject({ status: 0, message: 'Request failed after 1 attempt(s): fetch failed' });
  });

  it('sends JSON with merged headers', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response('{"id":"y"}'));
    vi.stubGlobal('fetch', fetchMock);

    await postJson('https://api.example.com/thing', { a: 1 }, idSchema, { headers: { Authorization: 'Bearer test-token' } });

    const init = fetchMock.mock.calls[0][1];
    const headers = new Headers(init?.headers);
    expect(init?.body).toBe('{"a":1}');
    expect(headers.get('content-type')).toBe('application/json');
    expect(headers.get('authorization')).toBe('Bearer test-token');
  });

  it('rejects a response of the wrong shape', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('{"name":"z"}')));

    const error = await catchAsyncError(getJson('https://api.example.com/thing', idSchema));

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ message: 'Unexpected response shape: id Required' });
  });
});
