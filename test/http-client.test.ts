import { createFetchWithTimeout, type FetchImpl } from '../src/utils/http-client.js';

const hangingFetch: FetchImpl = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) {
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

test('passes the request through with an abort signal attached', async () => {
  const seen: (RequestInit | undefined)[] = [];
  const fetchWithTimeout = createFetchWithTimeout(1000, async (_url, init) => {
    seen.push(init);
    return new Response('ok');
  });

  const response = await fetchWithTimeout('https://example.test/ping', { method: 'GET' });

  expect(await response.text()).toBe('ok');
  expect(seen[0]?.method).toBe('GET');
  expect(seen[0]?.signal).toBeInstanceOf(AbortSignal);
});

test('aborts the request once the timeout elapses', async () => {
  const fetchWithTimeout = createFetchWithTimeout(1000, hangingFetch);
  await expect(fetchWithTimeout('https://example.test/slow', {}, 10)).rejects.toThrow('Request timed out after 10ms');
});

test('forwards an abort from the caller signal', async () => {
  const fetchWithTimeout = createFetchWithTimeout(1000, hangingFetch);
  const controller = new AbortController();
  const pending = fetchWithTimeout('https://example.test/slow', { signal: controller.signal });
  controller.abort(new Error('caller gave up'));
  await expect(pending).rejects.toThrow('caller gave up');
});
