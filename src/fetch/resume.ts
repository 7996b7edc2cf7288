import { logger } from '../shared/logger.js';
import { sleep as defaultSleep } from '../shared/utils.js';
import { safeCallback } from './tracker.js';
import { runFetch, type FetchClients, type FetchRunOptions, type FetchRunResult } from './orchestrator.js';
import type { FetchProgressState } from './types.js';

export interface ResumePolicy {
  resumeDelayMs: number;
  maxResumeAttempts: number;
}

/**
 * Re-run the orchestrator after failure pauses, waiting `resumeDelayMs` between attempts.
 * A stop request is returned as-is; so is the last pause once the attempts run out.
 */
export async function fetchWithResume(
  clients: FetchClients,
  state: FetchProgressState,
  opts: FetchRunOptions,
  policy: ResumePolicy,
): Promise<FetchRunResult> {
  const sleep = opts.sleep ?? defaultSleep;
  const onActivity = safeCallback(opts.onActivity);
  let result = await runFetch(clients, state, opts);

  for (let attempt = 1; attempt <= policy.maxResumeAttempts; attempt++) {
    if (result.status === 'complete' || result.reason === 'stopped' || opts.shouldStop?.()) break;
    logger.info(
      { source: result.source, attempt, maxAttempts: policy.maxResumeAttempts, error: result.error },
      'Fetch paused, resuming after delay',
    );
    onActivity(`Paused at ${result.source}; resuming in ${Math.round(policy.resumeDelayMs / 1000)}s`);
    await sleep(policy.resumeDelayMs);
    result = await runFetch(clients, result.state, opts);
  }
  return result;
}
