import type { AppContext } from './server.js';

/**
 * Use the `uid` query value when given, otherwise ask the platform which account the
 * configured cookie belongs to. Returns null for a malformed query value.
 */
export async function resolveUid(ctx: AppContext, raw: string | undefined): Promise<number | null> {
  if (raw !== undefined) {
    const uid = Number(raw);
    return Number.isInteger(uid) && uid > 0 ? uid : null;
  }
  const session = await ctx.openSession({ archive: false });
  try {
    return session.uid;
  } finally {
    session.close();
  }
}
