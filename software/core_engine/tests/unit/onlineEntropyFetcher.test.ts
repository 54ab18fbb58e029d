import { describe, it, expect } from '@jest/globals';
import { MalformedResponseError, SourceUnavailableError } from '../../src/errors';
import { OnlineEntropyFetcher, type FetchFn } from '../../src/sources/OnlineEntropyFetcher';
import { FakeClock, testContext } from '../helpers/fakes';

const ENDPOINT = 'https://qrng.test/api';

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

/** Answers every request with `length` bytes of value 9. */
function servingFetch(requested: string[]): FetchFn {
  return async (url) => {
    requested.push(url);
    const length = Number(new URL(url).searchParams.get('length'));
    return json({ type: 'uint8', length, data: Array(length).fill(9), success: true });
  };
}

describe('OnlineEntropyFetcher', () => {
  it('splits large requests into chunks and pauses between them', async () => {
    const requested: string[] = [];
    const clock = new FakeClock();
    const fetcher = new OnlineEntropyFetcher(
      { endpoint: ENDPOINT, maxChunkBytes: 4, chunkDelayMs: 50 },
      testContext({ clock }),
      servingFetch(requested),
    );

    const result = await fetcher.fetch(10);

    expect(result.ok && Array.from(result.bytes)).toEqual(Array(10).fill(9));
    expect(requested).toEqual([
      `${ENDPOINT}?length=4&type=uint8`,
      `${ENDPOINT}?length=4&type=uint8`,
      `${ENDPOINT}?length=2&type=uint8`,
    ]);
    expect(clock.sleeps).toEqual([50, 50]);
  });

  it('caps the chunk size at 1024 bytes', async () => {
    const requested: string[] = [];
    const fetcher = new OnlineEntropyFetcher({ endpoint: ENDPOINT, maxChunkBytes: 5000 }, testContext(), servingFetch(requested));

    await fetcher.fetchBytes(1500);

    expect(requested).toEqual([`${ENDPOINT}?length=1024&type=uint8`, `${ENDPOINT}?length=476&type=uint8`]);
  });

  it('reports a non-2xx status as unavailable', async () => {
    const fetcher = new OnlineEntropyFetcher({ endpoint: ENDPOINT }, testContext(), async () => json({}, 503));

    const result = await fetcher.fetch(8);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SourceUnavailableError);
      expect(result.error.message).toBe('[online] HTTP 503');
    }
  });

  it.each([
    ['an empty data array', { data: [] }],
    ['out-of-range values', { data: [1, 256] }],
    ['a missing data field', { success: false }],
  ])('rejects %s as malformed', async (_label, body) => {
    const fetcher = new OnlineEntropyFetcher({ endpoint: ENDPOINT }, testContext(), async () => json(body));

    await expect(fetcher.fetchBytes(2)).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it('rejects a non-JSON body as malformed', async () => {
    const fetcher = new OnlineEntropyFetcher({ endpoint: ENDPOINT }, testContext(), async () => new Response('<html>'));

    await expect(fetcher.fetchBytes(2)).rejects.toThrow('[online] Response body is not JSON');
  });

  it('aborts a request that exceeds the timeout', async () => {
    const hanging: FetchFn = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const fetcher = new OnlineEntropyFetcher({ endpoint: ENDPOINT, timeoutMs: 10 }, testContext(), hanging);

    const result = await fetcher.fetch(8);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('SOURCE_UNAVAILABLE');
      expect(result.error.message).toBe('[online] Request timed out after 10ms');
    }
  });

  it('reports a timeout while reading the body as a timeout', async () => {
    const stalledBody: FetchFn = async (_url, init) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          init.signal.addEventListener('abort', () => controller.error(new Error('aborted')));
        },
      });
      return new Response(body, { status: 200 });
    };
    const fetcher = new OnlineEntropyFetcher({ endpoint: ENDPOINT, timeoutMs: 10 }, testContext(), stalledBody);

    await expect(fetcher.fetchBytes(4)).rejects.toThrow('[online] Request timed out after 10ms');
  });

  it('wraps network errors as unavailable', async () => {
    const fetcher = new OnlineEntropyFetcher({ endpoint: ENDPOINT }, testContext(), async () => {
      throw new TypeError('fetch failed');
    });

    await expect(fetcher.fetchBytes(2)).rejects.toThrow('[online] fetch failed');
  });

  it('never returns partial output when a later chunk fails', async () => {
    let calls = 0;
    const fetcher = new OnlineEntropyFetcher({ endpoint: ENDPOINT, maxChunkBytes: 2 }, testContext(), async () => {
      calls++;
      return calls === 1 ? json({ data: [1, 2] }) : json({}, 500);
    });

    const result = await fetcher.fetch(4);

    expect(result.ok).toBe(false);
    expect(calls).toBe(2);
  });
});
