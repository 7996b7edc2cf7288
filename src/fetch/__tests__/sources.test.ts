import { describe, it, expect } from 'vitest';
import { fetchLiked } from '../sources/liked.js';
import { fetchReplied } from '../sources/replied.js';
import { fetchSystemNotify } from '../sources/systemNotify.js';
import { fetchArchiveComments, fetchArchiveDanmus } from '../sources/archive.js';
import { feedPageUrl } from '../sources/feed.js';
import type { SourceContext } from '../sources/run.js';
import { createProgressState } from '../types.js';
import { FakeArchive, FakePlatform, flatPage, instantPacing, likedDanmu, likedPage, likedReply, noSleep, ok } from './fakePlatform.js';

const ctx: SourceContext = { pacing: instantPacing(3), onActivity: () => undefined, sleep: noSleep };

const LIKED_URL = 'https://api.test/x/msgfeed/like?platform=web&build=0&mobi_app=web';

/** Three liked pages; page two fails `failuresOnPage2` times before answering. */
function likedFeed(failuresOnPage2: number): FakePlatform {
  let failures = 0;
  return new FakePlatform([
    [
      'id=2&like_time=990',
      () => {
        if (failures < failuresOnPage2) {
          failures++;
          throw new Error(`page 2 unavailable (${failures})`);
        }
        return likedPage([likedReply(3, 103, 980), likedDanmu(4, '204', 970)], { is_end: false, id: 4, time: 970 });
      },
    ],
    ['id=4&like_time=970', () => likedPage([likedReply(5, 105, 960)], { is_end: true, id: 5, time: 960 })],
    ['/x/msgfeed/like', () => likedPage([likedReply(1, 101, 1000), likedReply(2, 102, 990)], { is_end: false, id: 2, time: 990 })],
  ]);
}

describe('feedPageUrl', () => {
  it('adds the cursor pair after the first page', () => {
    const api = new FakePlatform([]);
    expect(feedPageUrl(api, 'liked', { cursorId: null, cursorTime: null })).toBe(LIKED_URL);
    expect(feedPageUrl(api, 'replied', { cursorId: 7, cursorTime: 99 })).toBe(
      'https://api.test/x/msgfeed/reply?platform=web&build=0&mobi_app=web&id=7&reply_time=99',
    );
    expect(feedPageUrl(api, 'ated', { cursorId: 7, cursorTime: 99 })).toBe(
      'https://api.test/x/msgfeed/at?build=0&mobi_app=web&id=7&at_time=99',
    );
  });
});

describe('fetchLiked', () => {
  it('checkpoints at the failing page and resumes to the same data as a clean run', async () => {
    const flaky = likedFeed(3);
    const first = await fetchLiked(flaky, createProgressState().liked, ctx);

    expect(first.outcome).toMatchObject({ status: 'paused', reason: 'failed', error: 'page 2 unavailable (3)' });
    expect(first.progress.checkpoint).toEqual({ cursorId: 2, cursorTime: 990 });
    expect(first.progress.completed).toBe(false);
    expect([...first.progress.data.notifications.keys()]).toEqual(['1', '2']);
    expect([...first.progress.data.comments.keys()]).toEqual(['101', '102']);
    expect(flaky.gets).toEqual([
      LIKED_URL,
      `${LIKED_URL}&id=2&like_time=990`,
      `${LIKED_URL}&id=2&like_time=990`,
      `${LIKED_URL}&id=2&like_time=990`,
    ]);

    const resumed = await fetchLiked(flaky, first.progress, ctx);
    expect(resumed.outcome.status).toBe('done');
    expect(resumed.progress).toMatchObject({ checkpoint: null, completed: true });

    const clean = await fetchLiked(likedFeed(0), createProgressState().liked, ctx);
    expect(resumed.progress.data).toEqual(clean.progress.data);
    expect([...resumed.progress.data.notifications.keys()]).toEqual(['1', '2', '3', '4', '5']);
    expect([...resumed.progress.data.comments.keys()]).toEqual(['101', '102', '103', '105']);
    expect(resumed.progress.data.danmus.get('204')?.cid).toBe(4242);
  });

  it('keeps the first occurrence of a repeated comment', async () => {
    const api = new FakePlatform([
      ['/x/msgfeed/like', () => likedPage([likedReply(1, 101, 1000), likedReply(2, 101, 990)], { is_end: true, id: 2, time: 990 })],
    ]);
    const run = await fetchLiked(api, createProgressState().liked, ctx);
    expect(run.progress.data.comments.size).toBe(1);
    expect(run.progress.data.comments.get('101')?.notifyId).toBe('1');
    expect(run.progress.data.notifications.size).toBe(2);
  });

  it('completes an empty feed after one page', async () => {
    const api = new FakePlatform([['/x/msgfeed/like', () => ok({ total: { items: [], cursor: { is_end: true } } })]]);
    const run = await fetchLiked(api, createProgressState().liked, ctx);
    expect(run.progress).toMatchObject({ checkpoint: null, completed: true });
    expect(run.progress.data.notifications.size).toBe(0);
    expect(api.gets).toHaveLength(1);
  });
});

describe('fetchReplied', () => {
  it('stores the replied-to comment under its own id', async () => {
    const api = new FakePlatform([
      [
        '/x/msgfeed/reply',
        () =>
          flatPage(
            [
              {
                id: 21,
                reply_time: 500,
                item: {
                  type: 'reply',
                  target_id: 600,
                  title: 'nice',
                  target_reply_content: 'original',
                  uri: 'https://www.bilibili.com/read/cv42',
                },
              },
            ],
            { is_end: true, id: 21, time: 500 },
          ),
      ],
    ]);
    const run = await fetchReplied(api, createProgressState().replied, ctx);
    expect(run.progress.data.comments.get('600')).toMatchObject({ oid: 42, type: 12, content: 'original', notifyId: '21' });
    expect(run.progress.data.notifications.get('21')?.content).toBe('nice (reply)');
  });
});

describe('fetchSystemNotify', () => {
  it('falls back to the unified list when the per-user list is empty', async () => {
    const api = new FakePlatform([
      ['query_user_notify', () => ok({ system_notify_list: [] })],
      [
        'query_unified_notify',
        () => ok({ system_notify_list: [{ id: 7, title: 'Notice', content: 'Body', type: 4, cursor: 55 }] }),
      ],
      ['query_notify_list', () => ok([])],
    ]);

    const run = await fetchSystemNotify(api, createProgressState().system, ctx);

    expect(run.progress.completed).toBe(true);
    expect(run.progress.data.get('7')).toEqual({
      content: 'Notice\nBody',
      tp: 4,
      systemNotifyApi: 1,
      source: 'bilibili',
      createdTime: 0,
    });
    expect(api.gets).toEqual([
      'https://msg.test/x/sys-msg/query_user_notify?csrf=test-csrf&page_size=20&build=0&mobi_app=web',
      'https://msg.test/x/sys-msg/query_unified_notify?csrf=test-csrf&page_size=10&build=0&mobi_app=web',
      'https://msg.test/x/sys-msg/query_notify_list?csrf=test-csrf&data_type=1&cursor=55&build=0&mobi_app=web',
    ]);
  });

  it('does not fall back when the per-user list has entries', async () => {
    const api = new FakePlatform([
      ['query_user_notify', () => ok({ system_notify_list: [{ id: 8, title: 'a', content: 'b', type: 4 }] })],
    ]);
    const run = await fetchSystemNotify(api, createProgressState().system, ctx);
    expect(run.progress.data.get('8')?.systemNotifyApi).toBe(0);
    expect(api.gets).toHaveLength(1);
  });
});

describe('archive sources', () => {
  it('finishes at once when the archive holds nothing', async () => {
    const archive = new FakeArchive(() => ok({ cursor: { is_end: false, all_count: 0 }, replies: [] }));
    const run = await fetchArchiveComments(archive, 42, 500, createProgressState().archiveComments, ctx);

    expect(run.progress).toMatchObject({ checkpoint: null, completed: true });
    expect(run.progress.data.size).toBe(0);
    expect(archive.calls).toEqual([
      { path: '/api/v3/search/getreply', params: { uid: 42, pn: 1, ps: 500, mode: 0, keyword: '' } },
    ]);
  });

  it('pages until is_end', async () => {
    const archive = new FakeArchive((_path, params) =>
      params.pn === 1
        ? ok({
            cursor: { is_end: false, all_count: 3 },
            replies: [
              { rpid: 1, message: 'a', time: 10, dyn: { oid: 5, type: 1 } },
              { rpid: 2, message: 'b', time: 9, dyn: { oid: 5, type: 1 } },
            ],
          })
        : ok({ cursor: { is_end: true, all_count: 3 }, replies: [{ rpid: 3, message: 'c', time: 8, dyn: { oid: 6, type: 17 } }] }),
    );
    const run = await fetchArchiveComments(archive, 42, 2, createProgressState().archiveComments, ctx);

    expect([...run.progress.data.keys()]).toEqual(['1', '2', '3']);
    expect(archive.calls.map((c) => c.params.pn)).toEqual([1, 2]);
    expect(run.progress.data.get('3')).toMatchObject({ oid: 6, type: 17, source: 'aicu' });
  });

  it('checkpoints the page number on failure', async () => {
    const archive = new FakeArchive((_path, params) => {
      if (params.pn === 2) throw new Error('archive busy');
      return ok({ cursor: { is_end: false, all_count: 9 }, videodmlist: [{ id: '11', content: 'x', ctime: 1, oid: 3 }] });
    });
    const run = await fetchArchiveDanmus(archive, 42, 1, createProgressState().archiveDanmus, ctx);

    expect(run.progress.checkpoint).toEqual({ uid: 42, page: 2, allCount: 9 });
    expect(run.progress.data.get('11')).toEqual({
      content: 'x',
      cid: 3,
      notifyId: null,
      source: 'aicu',
      createdTime: 1,
      videoUrl: null,
    });
  });
});
