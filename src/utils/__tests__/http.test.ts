import { describe, expect, it } from 'vitest';
import {
  detectSoftBlock,
  PageFetcher,
  USER_AGENTS,
  type Transport,
  type TransportResponse,
} from '../http.js';

type Call = { url: string; headers: Record<string, string> };

function scripted(responses: Array<TransportResponse | Error>) {
  const calls: Call[] = [];
  const transport: Transport = async (url, init) => {
    calls.push({ url, headers: init.headers });
    const next = responses.shift();
    if (!next) throw new Error('unexpected request');
    if (next instanceof Error) throw next;
    return next;
  };
  return { transport, calls };
}

const reply = (status: number, body = '<html><body>ok</body></html>'): TransportResponse => ({
  status,
  body,
  finalUrl: 'https://www.apartments.com/miami-fl/',
});

function recorder() {
  const waits: number[] = [];
  return { waits, sleep: async (ms: number) => { waits.push(ms); } };
}

const URL_ = 'https://www.apartments.com/miami-fl/';

describe('PageFetcher', () => {
  it('retries 5xx with exponential backoff', async () => {
    const { transport, calls } = scripted([reply(503), reply(502), reply(200, 'hello')]);
    const { waits, sleep } = recorder();
    const res = await new PageFetcher({ transport, sleep }).fetch(URL_);

    expect(res).toEqual({ status: 'ok', body: 'hello', finalUrl: URL_, httpStatus: 200 });
    expect(calls).toHaveLength(3);
    expect(waits).toEqual([600, 1200]);
  });

  it('gives up after the attempt limit', async () => {
    const { transport, calls } = scripted([reply(503), reply(503), reply(503), reply(503)]);
    const { waits, sleep } = recorder();
    const res = await new PageFetcher({ transport, sleep }).fetch(URL_);

    expect(res).toEqual({ status: 'failed', finalUrl: URL_, reason: 'HTTP 503', httpStatus: 503 });
    expect(calls).toHaveLength(4);
    expect(waits).toEqual([600, 1200, 2400]);
  });

  it('treats transport errors as retryable failures', async () => {
    const err = () => new Error('socket hang up');
    const { transport, calls } = scripted([err(), err(), err(), err()]);
    const { sleep } = recorder();
    const res = await new PageFetcher({ transport, sleep }).fetch(URL_);

    expect(res).toEqual({ status: 'failed', finalUrl: URL_, reason: 'socket hang up' });
    expect(calls).toHaveLength(4);
  });

  it('rotates identity once on 403', async () => {
    const { transport, calls } = scripted([reply(403), reply(200)]);
    const { waits, sleep } = recorder();
    const fetcher = new PageFetcher({ transport, sleep, random: () => 0.5 });
    const res = await fetcher.fetch(URL_);

    expect(res.status).toBe('ok');
    expect(waits).toEqual([1500]);
    expect(calls[0]?.headers['User-Agent']).toBe(USER_AGENTS[0]);
    expect(calls[1]?.headers['User-Agent']).toBe(USER_AGENTS[1]);
  });

  it('reports blocked when denied again after rotating', async () => {
    const { transport, calls } = scripted([reply(429), reply(429)]);
    const { sleep } = recorder();
    const res = await new PageFetcher({ transport, sleep, random: () => 0 }).fetch(URL_);

    expect(res).toEqual({ status: 'blocked', finalUrl: URL_, reason: 'HTTP 429', httpStatus: 429 });
    expect(calls).toHaveLength(2);
  });

  it('does not retry other client errors', async () => {
    const { transport, calls } = scripted([reply(404)]);
    const { waits, sleep } = recorder();
    const res = await new PageFetcher({ transport, sleep }).fetch(URL_);

    expect(res).toEqual({ status: 'failed', finalUrl: URL_, reason: 'HTTP 404', httpStatus: 404 });
    expect(calls).toHaveLength(1);
    expect(waits).toEqual([]);
  });

  it('flags interstitial pages served with 200', async () => {
    const body = '<html><body><h1>Please verify you are human</h1></body></html>';
    const { transport } = scripted([reply(200, body)]);
    const res = await new PageFetcher({ transport }).fetch(URL_);

    expect(res.status).toBe('blocked');
    expect(res.httpStatus).toBe(200);
  });

  it('only scans the head of the body for interstitial wording', async () => {
    const body = `${'x'.repeat(6000)}Please verify you are human`;
    const { transport } = scripted([reply(200, body)]);
    const res = await new PageFetcher({ transport }).fetch(URL_);

    expect(res.status).toBe('ok');
  });

  it('sends the configured referer', async () => {
    const { transport, calls } = scripted([reply(200)]);
    await new PageFetcher({ transport, referer: 'https://www.google.com/' }).fetch(URL_);

    expect(calls[0]?.headers.Referer).toBe('https://www.google.com/');
    expect(calls[0]?.headers['Accept-Language']).toBe('en-US,en;q=0.9');
  });
});

describe('detectSoftBlock', () => {
  it('matches known interstitial wording', () => {
    expect(detectSoftBlock('Our systems have detected unusual traffic from your network')).toBeDefined();
    expect(detectSoftBlock('<title>Just a moment...</title>')).toBeDefined();
    expect(detectSoftBlock('<h1>Oakwood Gardens</h1>')).toBeUndefined();
  });
});
