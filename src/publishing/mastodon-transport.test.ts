import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigError, PublishError } from '../types/index.js';
import { LogTransport, MastodonTransport, createTransport } from './index.js';

describe('MastodonTransport', () => {
  const originalFetch = global.fetch;
  const mockFetch = vi.fn();
  let transport: MastodonTransport;

  beforeEach(() => {
    mockFetch.mockReset();
    global.fetch = mockFetch;
    transport = new MastodonTransport({
      baseUrl: 'https://social.example',
      accessToken: 'test-secret',
      visibility: 'unlisted',
      maxLength: 500,
    });
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('should post the status with auth and idempotency headers', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200 });

    await transport.publish('Reprimand: Cobalt Health Trust', { idempotencyKey: 'key-1' });

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://social.example/api/v1/statuses');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
      'Idempotency-Key': 'key-1',
    });
    expect(JSON.parse(init.body)).toEqual({
      status: 'Reprimand: Cobalt Health Trust',
      visibility: 'unlisted',
    });
  });

  it('should omit the idempotency header when no key is given', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200 });

    await transport.publish('hello');

    expect(mockFetch.mock.calls[0][1].headers).not.toHaveProperty('Idempotency-Key');
  });

  it('should raise a PublishError with the HTTP status on rejection', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 429,
      text: async () => '{"error":"Too many requests"}',
    });

    const error = await transport.publish('hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PublishError);
    expect(error).toMatchObject({
      status: 429,
      message: 'Mastodon rejected status: HTTP 429 {"error":"Too many requests"}',
    });
  });

  describe('with an image', () => {
    const image = {
      data: Buffer.from('png-bytes'),
      mimeType: 'image/png',
      description: 'Reprimand: Cobalt Health Trust, 2 January 2024',
    };

    it('should upload the image and attach it to the status', async () => {
      mockFetch
        .mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({ id: '109876' }) })
        .mockResolvedValueOnce({ ok: true, status: 200 });

      await transport.publish('Reprimand: Cobalt Health Trust', { idempotencyKey: 'key-1', image });

      expect(mockFetch).toHaveBeenCalledTimes(2);
      const [mediaUrl, mediaInit] = mockFetch.mock.calls[0];
      expect(mediaUrl).toBe('https://social.example/api/v2/media');
      expect(mediaInit.headers).toEqual({ Authorization: 'Bearer test-secret' });
      expect(mediaInit.body).toBeInstanceOf(FormData);
      expect(mediaInit.body.get('description')).toBe(image.description);
      const file = mediaInit.body.get('file');
      expect(file).toBeInstanceOf(Blob);
      expect(file.type).toBe('image/png');

      const [statusUrl, statusInit] = mockFetch.mock.calls[1];
      expect(statusUrl).toBe('https://social.example/api/v1/statuses');
      expect(JSON.parse(statusInit.body)).toEqual({
        status: 'Reprimand: Cobalt Health Trust',
        visibility: 'unlisted',
        media_ids: ['109876'],
      });
    });

    it('should post without the image when the upload is rejected', async () => {
      mockFetch
        .mockResolvedValueOnce({ ok: false, status: 422, text: async () => 'File type not supported' })
        .mockResolvedValueOnce({ ok: true, status: 200 });

      await transport.publish('hello', { image });

      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(JSON.parse(mockFetch.mock.calls[1][1].body)).toEqual({
        status: 'hello',
        visibility: 'unlisted',
      });
    });

    it('should post without the image when the upload response has no id', async () => {
      mockFetch
        .mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({ error: 'processing' }) })
        .mockResolvedValueOnce({ ok: true, status: 200 });

      await transport.publish('hello', { image });

      expect(JSON.parse(mockFetch.mock.calls[1][1].body)).not.toHaveProperty('media_ids');
    });
  });

  it('should raise a PublishError on network failure', async () => {
    mockFetch.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND social.example'));

    await expect(transport.publish('hello')).rejects.toThrow(
      'Mastodon request failed: getaddrinfo ENOTFOUND social.example'
    );
  });
});

describe('createTransport', () => {
  const mastodon = {
    baseUrl: 'https://social.example',
    accessToken: 'test-secret',
    visibility: 'public' as const,
  };

  it('should build a log transport by default', () => {
    const transport = createTransport({ kind: 'log', maxLength: 500, imageCards: true, mastodon });

    expect(transport).toBeInstanceOf(LogTransport);
    expect(transport.maxLength).toBe(500);
  });

  it('should build a mastodon transport when configured', () => {
    const transport = createTransport({
      kind: 'mastodon',
      maxLength: 450,
      imageCards: true,
      mastodon,
    });

    expect(transport.name).toBe('mastodon');
    expect(transport.maxLength).toBe(450);
  });

  it('should refuse a mastodon transport without a token', () => {
    expect(() =>
      createTransport({
        kind: 'mastodon',
        maxLength: 500,
        imageCards: false,
        mastodon: { ...mastodon, accessToken: undefined },
      })
    ).toThrow(ConfigError);
  });
});
