import { describe, it, expect, vi } from 'vitest';
import { mergeResults, runFetch, shouldRunSource, type FetchRunOptions } from '../orchestrator.js';
import { fetchWithResume } from '../resume.js';
import { createProgressState } from '../types.js';
import { ConfigError } from '../../shared/errors.js';
import {
  FakeArchive,
  FakePlatform,
  flatPage,
  instantPacing,
  likedDanmu,
  likedPage,
  likedReply,
  noSleep,
  ok,
  type Responder,
} from './fakePlatform.js';

const options: FetchRunOptions = {
  uid: 42,
  includeArchive: false,
  archivePageSize: 500,
  pacing: instantPacing(3),
  sleep: noSleep,
};

type RouteKey = 'liked' | 'replied' | 'ated' | 'system' | 'systemNext';
const ROUTE_KEYS: readonly RouteKey[] = ['liked', 'replied', 'ated', 'system', 'systemNext'];

const ROUTES: Record<RouteKey, [string, Responder]> = {
  liked: [
    '/x/msgfeed/like',
    () => likedPage([likedReply(1, 500, 100), likedDanmu(2, '700', 90)], { is_end: true, id: 2, time: 90 }),
  ],
  replied: [
    '/x/msgfeed/reply',
    () =>
      flatPage(
        [
          {
            id: 1,
            reply_time: 95,
            item: {
              type: 'reply',
              target_id: 500,
              title: 'answer',
              target_reply_content: 'my comment',
              uri: 'https://www.bilibili.com/video/BV1xx411c7mD',
              native_uri: 'bilibili://video/777',
            },
          },
        ],
        { is_end: true, id: 1, time: 95 },
      ),
  ],
  ated: ['/x/msgfeed/at', () => flatPage([{ id: 3, at_time: 80, item: { title: 'hi' } }], { is_end: true, id: 3, time: 80 })],
  system: [
    'query_user_notify',
    () => ok({ system_notify_list: [{ id: 4, title: 'S', content: 'B', type: 4, cursor: 1 }] }),
  ],
  systemNext: ['query_notify_list', () => ok([])],
};

function platform(overrides: Partial<Record<RouteKey, Responder>> = {}): FakePlatform {
  return new FakePlatform(
    ROUTE_KEYS.map((key): [string, Responder] => {
      const [match, respond] = ROUTES[key];
      return [match, overrides[key] ?? respond];
    }),
  );
}

const failing: Responder = () => {
  throw new Error('service unavailable');
};

const paths = (api: FakePlatform) => api.gets.map((u) => new URL(u).pathname);

describe('runFetch', () => {
  it('runs the sources in order and merges later sources over earlier ones', async () => {
    const api = platform();
    const activity: unknown[] = [];
    const run = await runFetch({ platform: api }, createProgressState(), {
      ...options,
      onActivity: (u) => activity.push(u),
    });

    expect(paths(api)).toEqual([
      '/x/msgfeed/like',
      '/x/msgfeed/reply',
      '/x/msgfeed/at',
      '/x/sys-msg/query_user_notify',
      '/x/sys-msg/query_notify_list',
    ]);
    if (run.status !== 'complete') throw new Error('expected a complete run');
    const { notifications, comments, danmus } = run.result;
    expect([...notifications.keys()].sort()).toEqual(['1', '2', '3', '4']);
    expect(notifications.get('1')?.content).toBe('answer (reply)');
    expect(comments.get('500')).toMatchObject({ content: 'my comment', tp: 1 });
    expect([...danmus.keys()]).toEqual(['700']);
    expect(activity[activity.length - 1]).toBe('Merging results');
  });

  it('pauses at the first failing source without touching the input state', async () => {
    const initial = createProgressState();
    const run = await runFetch({ platform: platform({ replied: failing }) }, initial, options);

    if (run.status !== 'paused') throw new Error('expected a paused run');
    expect(run.source).toBe('replied');
    expect(run.reason).toBe('failed');
    expect(run.error).toBe('service unavailable');
    expect(run.state.liked.completed).toBe(true);
    expect(run.state.liked.data.notifications.size).toBe(2);
    expect(run.state.replied).toMatchObject({ checkpoint: { cursorId: null, cursorTime: null }, completed: false });

    expect(initial.liked.completed).toBe(false);
    expect(initial.liked.data.notifications.size).toBe(0);
  });

  it('resumes from the paused source and skips finished ones', async () => {
    const first = await runFetch({ platform: platform({ replied: failing }) }, createProgressState(), options);
    if (first.status !== 'paused') throw new Error('expected a paused run');

    const api = platform();
    const second = await runFetch({ platform: api }, first.state, options);

    expect(second.status).toBe('complete');
    expect(paths(api)).not.toContain('/x/msgfeed/like');
    expect(paths(api)[0]).toBe('/x/msgfeed/reply');
  });

  it('does not re-walk a source that finished empty', async () => {
    const emptyLiked: Responder = () => ok({ total: { items: [], cursor: { is_end: true } } });
    const first = await runFetch(
      { platform: platform({ liked: emptyLiked, ated: failing }) },
      createProgressState(),
      options,
    );
    if (first.status !== 'paused') throw new Error('expected a paused run');
    expect(first.state.liked).toMatchObject({ completed: true, checkpoint: null });
    expect(shouldRunSource('liked', first.state)).toBe(false);

    const api = platform();
    await runFetch({ platform: api }, first.state, options);
    expect(paths(api)).not.toContain('/x/msgfeed/like');
  });

  it('pauses with reason stopped when asked to stop', async () => {
    const api = platform();
    const run = await runFetch({ platform: api }, createProgressState(), {
      ...options,
      shouldStop: () => api.gets.length >= 1,
    });

    if (run.status !== 'paused') throw new Error('expected a paused run');
    expect(run.source).toBe('replied');
    expect(run.reason).toBe('stopped');
    expect(run.state.replied.checkpoint).toEqual({ cursorId: null, cursorTime: null });
  });

  it('discards archive progress once the archive is turned off', async () => {
    const state = createProgressState();
    state.archiveEnabledLastRun = true;
    state.archiveComments = {
      data: new Map([['9', { oid: 1, type: 1, content: 'old', notifyId: null, tp: null, source: 'aicu', createdTime: 1, videoUri: null, likeCount: 0 }]]),
      checkpoint: null,
      completed: true,
    };

    const run = await runFetch({ platform: platform({ liked: failing }) }, state, options);

    if (run.status !== 'paused') throw new Error('expected a paused run');
    expect(run.state.archiveEnabledLastRun).toBe(false);
    expect(run.state.archiveComments).toEqual({ data: new Map(), checkpoint: null, completed: false });
  });

  it('lets archive records win over feed records', async () => {
    const archive = new FakeArchive((path) =>
      path.endsWith('getreply')
        ? ok({
            cursor: { is_end: true, all_count: 1 },
            replies: [{ rpid: '500', message: 'archived text', time: 1, dyn: { oid: 777, type: 1 } }],
          })
        : ok({ cursor: { is_end: true, all_count: 1 }, videodmlist: [{ id: '800', content: 'dm', ctime: 2, oid: 4242 }] }),
    );

    const run = await runFetch({ platform: platform(), archive }, createProgressState(), {
      ...options,
      includeArchive: true,
    });

    if (run.status !== 'complete') throw new Error('expected a complete run');
    expect(run.result.comments.get('500')).toMatchObject({ content: 'archived text', source: 'aicu' });
    expect([...run.result.danmus.keys()]).toEqual(['700', '800']);
    expect(archive.calls.map((c) => c.path)).toEqual(['/api/v3/search/getreply', '/api/v3/search/getvideodm']);
  });

  it('rejects archive runs without an archive client', async () => {
    await expect(
      runFetch({ platform: platform() }, createProgressState(), { ...options, includeArchive: true }),
    ).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('mergeResults', () => {
  it('leaves archive maps out when the archive is off', () => {
    const state = createProgressState();
    state.archiveDanmus.data.set('1', {
      content: 'x',
      cid: 1,
      notifyId: null,
      source: 'aicu',
      createdTime: 0,
      videoUrl: null,
    });
    expect(mergeResults(state, false).danmus.size).toBe(0);
    expect(mergeResults(state, true).danmus.size).toBe(1);
  });
});

describe('fetchWithResume', () => {
  it('waits and resumes after a failure pause', async () => {
    let replyFailures = 0;
    const api = platform({
      replied: (url) => {
        if (replyFailures < 3) {
          replyFailures++;
          throw new Error('flaky');
        }
        const respond = ROUTES.replied[1];
        return respond(url);
      },
    });
    const sleep = vi.fn(() => Promise.resolve());

    const run = await fetchWithResume({ platform: api }, createProgressState(), { ...options, sleep }, {
      resumeDelayMs: 30000,
      maxResumeAttempts: 2,
    });

    expect(run.status).toBe('complete');
    expect(sleep).toHaveBeenCalledWith(30000);
    expect(paths(api).filter((p) => p === '/x/msgfeed/like')).toHaveLength(1);
  });

  it('gives up after the last attempt', async () => {
    const api = platform({ replied: failing });
    const run = await fetchWithResume({ platform: api }, createProgressState(), options, {
      resumeDelayMs: 0,
      maxResumeAttempts: 2,
    });

    expect(run).toMatchObject({ status: 'paused', source: 'replied', reason: 'failed' });
    expect(paths(api).filter((p) => p === '/x/msgfeed/reply')).toHaveLength(9);
  });

  it('does not resume a stopped run', async () => {
    const api = platform();
    const sleep = vi.fn(() => Promise.resolve());
    const run = await fetchWithResume(
      { platform: api },
      createProgressState(),
      { ...options, sleep, shouldStop: () => true },
      { resumeDelayMs: 0, maxResumeAttempts: 5 },
    );

    expect(run).toMatchObject({ status: 'paused', source: 'liked', reason: 'stopped' });
    expect(api.gets).toHaveLength(0);
    expect(sleep).not.toHaveBeenCalled();
  });
});
