/**
 * Seams between the fetch/delete core and the network. The real clients live in
 * this directory; tests substitute in-process fakes.
 */

export interface PlatformApi {
  readonly csrf: string;
  readonly apiBase: string;
  readonly messageBase: string;
  getJson(url: string): Promise<unknown>;
  postForm(url: string, form: Record<string, string>): Promise<unknown>;
  postJson(url: string, body: Record<string, unknown>): Promise<unknown>;
}

export type QueryParams = Record<string, string | number>;

export interface ArchiveApi {
  getJson(path: string, params: QueryParams): Promise<unknown>;
}
