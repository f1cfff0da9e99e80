import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { YouTubeClient } from './client.js';
import { NotFoundError, YouTubeApiError } from '../errors.js';

const logger = pino({ level: 'silent' });

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function videoItem(id: string, stats: { views: string; likes?: string; comments?: string }) {
  return {
    id,
    snippet: {
      channelId: 'UC_chan',
      channelTitle: 'Test Channel',
      title: `Video ${id}`,
      description: 'desc',
      publishedAt: '2026-01-10T12:00:00Z',
      categoryId: '22',
      thumbnails: { high: { url: `https://img.example/${id}.jpg` } },
    },
    statistics: { viewCount: stats.views, likeCount: stats.likes, commentCount: stats.comments },
    contentDetails: { duration: 'PT4M13S' },
  };
}

describe('YouTubeClient', () => {
  const fetchMock = vi.fn();
  let client: YouTubeClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    client = new YouTubeClient({
      apiKey: 'test-key',
      baseUrl: 'https://api.example/youtube/v3/',
      logger,
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('getVideo', () => {
    it('maps snippet, statistics and duration', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ items: [videoItem('abc', { views: '1000', likes: '60', comments: '5' })] }),
      );

      const video = await client.getVideo('abc');

      expect(video).toEqual({
        videoId: 'abc',
        channelId: 'UC_chan',
        channelName: 'Test Channel',
        title: 'Video abc',
        description: 'desc',
        publishedAt: '2026-01-10T12:00:00Z',
        durationIso: 'PT4M13S',
        duration: 253,
        viewCount: 1000,
        likeCount: 60,
        commentCount: 5,
        tags: [],
        categoryId: '22',
        thumbnailUrl: 'https://img.example/abc.jpg',
      });

      const url = new URL(fetchMock.mock.calls[0][0]);
      expect(url.origin + url.pathname).toBe('https://api.example/youtube/v3/videos');
      expect(url.searchParams.get('id')).toBe('abc');
      expect(url.searchParams.get('key')).toBe('test-key');
    });

    it('treats hidden counters as zero', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [videoItem('abc', { views: '10' })] }));

      const video = await client.getVideo('abc');
      expect(video.likeCount).toBe(0);
      expect(video.commentCount).toBe(0);
    });

    it('throws NotFoundError when no item comes back', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [] }));

      await expect(client.getVideo('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('throws YouTubeApiError on a non-2xx response', async () => {
      fetchMock.mockResolvedValueOnce(new Response('quota exceeded', { status: 403 }));

      const err = await client.getVideo('abc').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(YouTubeApiError);
      if (err instanceof YouTubeApiError) {
        expect(err.statusCode).toBe(403);
        expect(err.message).toBe('YouTube API error 403: quota exceeded');
      }
    });
  });

  describe('getVideosBatch', () => {
    it('splits ids into requests of 50', async () => {
      const ids = Array.from({ length: 51 }, (_, i) => `v${i}`);
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ items: [videoItem('v0', { views: '1' })] }))
        .mockResolvedValueOnce(jsonResponse({ items: [videoItem('v50', { views: '2' })] }));

      const videos = await client.getVideosBatch(ids);

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(new URL(fetchMock.mock.calls[1][0]).searchParams.get('id')).toBe('v50');
      expect(videos.map((v) => v.videoId)).toEqual(['v0', 'v50']);
    });
  });

  describe('getChannel', () => {
    it('maps channel statistics', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          items: [
            {
              id: 'UC_1',
              snippet: { title: 'Chan', description: '', publishedAt: '2020-01-01T00:00:00Z' },
              statistics: { subscriberCount: '1000', viewCount: '100000', videoCount: '100' },
            },
          ],
        }),
      );

      const channel = await client.getChannel('UC_1');
      expect(channel.subscriberCount).toBe(1000);
      expect(channel.viewCount).toBe(100000);
      expect(channel.videoCount).toBe(100);
      expect(channel.country).toBe('Unknown');
    });

    it('throws NotFoundError for an unknown channel', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}));
      await expect(client.getChannel('UC_none')).rejects.toThrow('Channel not found: UC_none');
    });
  });

  describe('resolveChannelHandle', () => {
    it('looks the handle up with forHandle', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [{ id: 'UC_handle' }] }));

      expect(await client.resolveChannelHandle('somecreator')).toBe('UC_handle');
      expect(new URL(fetchMock.mock.calls[0][0]).searchParams.get('forHandle')).toBe('@somecreator');
    });
  });

  describe('listChannelVideos', () => {
    it('passes publishedAfter and keeps only video ids', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          items: [
            { id: { videoId: 'v1' }, snippet: {} },
            { id: { channelId: 'UC_x' }, snippet: {} },
            { id: { videoId: 'v2' }, snippet: {} },
          ],
        }),
      );

      const ids = await client.listChannelVideos('UC_1', {
        publishedAfter: new Date('2026-03-01T00:00:00Z'),
        maxResults: 25,
      });

      expect(ids).toEqual(['v1', 'v2']);
      const params = new URL(fetchMock.mock.calls[0][0]).searchParams;
      expect(params.get('publishedAfter')).toBe('2026-03-01T00:00:00.000Z');
      expect(params.get('order')).toBe('date');
      expect(params.get('maxResults')).toBe('25');
    });
  });

  describe('getTrendingVideos', () => {
    it('omits the category filter for category 0', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [videoItem('t1', { views: '5', likes: '1' })] }));

      const trending = await client.getTrendingVideos({ regionCode: 'GB', categoryId: '0', maxResults: 5 });

      expect(trending[0]).toMatchObject({ videoId: 't1', viewCount: 5, likeCount: 1 });
      const params = new URL(fetchMock.mock.calls[0][0]).searchParams;
      expect(params.get('chart')).toBe('mostPopular');
      expect(params.get('regionCode')).toBe('GB');
      expect(params.has('videoCategoryId')).toBe(false);
    });
  });

  describe('getPlaylist', () => {
    it('combines playlist details with its items', async () => {
      fetchMock
        .mockResolvedValueOnce(
          jsonResponse({
            items: [
              {
                snippet: { title: 'Best of', description: '', channelId: 'UC_1', channelTitle: 'Chan' },
                contentDetails: { itemCount: 42 },
              },
            ],
          }),
        )
        .mockResolvedValueOnce(
          jsonResponse({
            items: [
              {
                snippet: {
                  title: 'First',
                  description: '',
                  channelTitle: 'Chan',
                  publishedAt: '2026-01-01T00:00:00Z',
                  position: 0,
                  resourceId: { videoId: 'p1' },
                },
              },
            ],
          }),
        );

      const playlist = await client.getPlaylist('PL_1', 20);
      expect(playlist.itemCount).toBe(42);
      expect(playlist.items).toHaveLength(1);
      expect(playlist.items[0].videoId).toBe('p1');
    });
  });
});
