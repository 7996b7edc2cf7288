import { describe, it, expect, vi } from 'vitest';
import { FixedPacer, walkPages, type PagedSource, type PageResult } from '../paging.js';
import type { Decoded } from '../decode.js';

type Script = Array<PageResult<number, string> | Error>;

/** Page n answers with script[n]; an Error entry fails once and is then consumed. */
function scripted(pages: Record<number, Script>): PagedSource<number, string> & { calls: number[] } {
  const calls: number[] = [];
  return {
    name: 'scripted',
    calls,
    fetchPage(position: number) {
      calls.push(position);
      const queue = pages[position];
      const next = queue?.shift();
      if (next === undefined) return Promise.reject(new Error(`no page ${position}`));
      if (next instanceof Error) return Promise.reject(next);
      return Promise.resolve(next);
    },
  };
}

const item = (v: string): Decoded<string> => ({ kind: 'ok', value: v });
const page = (values: string[], next: number | null): PageResult<number, string> => ({
  items: values.map(item),
  next,
});

describe('walkPages', () => {
  it('walks to the end and sleeps between pages', async () => {
    const source = scripted({ 1: [page(['a', 'b'], 2)], 2: [page(['c'], 3)], 3: [page([], null)] });
    const seen: string[] = [];
    const sleep = vi.fn(() => Promise.resolve());

    const outcome = await walkPages(source, 1, (v) => void seen.push(v), { pacer: new FixedPacer(250), sleep });

    expect(outcome).toEqual({ status: 'done', pages: 3, truncated: false });
    expect(seen).toEqual(['a', 'b', 'c']);
    expect(sleep.mock.calls).toEqual([[250], [250]]);
  });

  it('retries a failing page and resets the failure count on success', async () => {
    const source = scripted({
      1: [new Error('flaky'), new Error('flaky'), page(['a'], 2)],
      2: [new Error('flaky'), new Error('flaky'), page(['b'], null)],
    });
    const seen: string[] = [];

    const outcome = await walkPages(source, 1, (v) => void seen.push(v), {
      pacer: new FixedPacer(0, 3),
      sleep: () => Promise.resolve(),
    });

    expect(outcome.status).toBe('done');
    expect(seen).toEqual(['a', 'b']);
    expect(source.calls).toEqual([1, 1, 1, 2, 2, 2]);
  });

  it('pauses at the failing position after the last allowed failure', async () => {
    const source = scripted({
      1: [page(['a'], 2)],
      2: [new Error('boom 1'), new Error('boom 2'), new Error('boom 3')],
    });
    const seen: string[] = [];

    const outcome = await walkPages(source, 1, (v) => void seen.push(v), {
      pacer: new FixedPacer(0, 3),
      sleep: () => Promise.resolve(),
    });

    expect(outcome).toEqual({ status: 'paused', position: 2, reason: 'failed', error: 'boom 3', pages: 1 });
    expect(seen).toEqual(['a']);
  });

  it('ends at once when one failure is allowed', async () => {
    const source = scripted({ 1: [new Error('down')] });
    const outcome = await walkPages(source, 1, () => undefined, { pacer: new FixedPacer(0) });
    expect(outcome).toMatchObject({ status: 'paused', position: 1, reason: 'failed', pages: 0 });
  });

  it('pauses before the next page when the stop signal is raised', async () => {
    const source = scripted({ 1: [page(['a'], 2)], 2: [page(['b'], null)] });
    let stop = false;

    const outcome = await walkPages(
      source,
      1,
      () => {
        stop = true;
      },
      { pacer: new FixedPacer(0), shouldStop: () => stop, sleep: () => Promise.resolve() },
    );

    expect(outcome).toEqual({ status: 'paused', position: 2, reason: 'stopped', pages: 1 });
    expect(source.calls).toEqual([1]);
  });

  it('ends when the handler returns false', async () => {
    const source = scripted({ 1: [page(['a', 'b', 'c'], 2)] });
    const seen: string[] = [];

    const outcome = await walkPages(
      source,
      1,
      (v) => {
        if (v === 'b') return false;
        seen.push(v);
      },
      { pacer: new FixedPacer(0) },
    );

    expect(outcome).toEqual({ status: 'done', pages: 1, truncated: false });
    expect(seen).toEqual(['a']);
    expect(source.calls).toEqual([1]);
  });

  it('stops after maxPages and reports truncation', async () => {
    const source = scripted({ 1: [page(['a'], 2)], 2: [page(['b'], 3)], 3: [page(['c'], null)] });
    const outcome = await walkPages(source, 1, () => undefined, {
      pacer: new FixedPacer(0),
      maxPages: 2,
      sleep: () => Promise.resolve(),
    });
    expect(outcome).toEqual({ status: 'done', pages: 2, truncated: true });
    expect(source.calls).toEqual([1, 2]);
  });

  it('passes over skipped items', async () => {
    const source = scripted({
      1: [{ items: [item('a'), { kind: 'skip', reason: 'bad' }, item('b')], next: null }],
    });
    const seen: string[] = [];
    await walkPages(source, 1, (v) => void seen.push(v), { pacer: new FixedPacer(0) });
    expect(seen).toEqual(['a', 'b']);
  });
});
