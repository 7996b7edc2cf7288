import type { Config } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { ArchiveClient } from './archive.js';
import { PlatformClient } from './platform.js';
import type { ArchiveApi, PlatformApi } from './types.js';

export interface RemoteSession {
  platform: PlatformApi;
  /** Present when the archive sources are enabled. */
  archive: ArchiveApi | null;
  uid: number;
  close(): void;
}

/** Open the clients and resolve the account id. The caller owns `close()`. */
export type SessionOpener = (opts: { archive?: boolean }) => Promise<RemoteSession>;

export async function openSession(config: Config, opts: { archive?: boolean } = {}): Promise<RemoteSession> {
  const platform = new PlatformClient(config.platform);
  const useArchive = opts.archive ?? config.archive.enabled;
  const archive = useArchive ? new ArchiveClient(config.archive) : null;

  let uid: number;
  try {
    uid = await platform.getUid();
  } catch (err) {
    platform.close();
    archive?.close();
    throw err;
  }
  logger.debug({ uid, archive: useArchive }, 'Remote session opened');

  return {
    platform,
    archive,
    uid,
    close() {
      platform.close();
      archive?.close();
    },
  };
}

/** Run `fn` with an open session, closing it however `fn` ends. */
export async function withSession<T>(
  config: Config,
  opts: { archive?: boolean },
  fn: (session: RemoteSession) => Promise<T>,
): Promise<T> {
  const session = await openSession(config, opts);
  try {
    return await fn(session);
  } finally {
    session.close();
  }
}
