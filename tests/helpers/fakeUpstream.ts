import { FetchLike, UpstreamRequestInit, UpstreamResponse } from '../../src/core/upstream-client';

export interface ScriptedResponse {
  status?: number;
  /** Serialized as JSON unless `raw` is given */
  body?: unknown;
  raw?: string;
  /** Reject the fetch instead of answering */
  error?: Error;
}

export function scriptedResponse(script: ScriptedResponse): UpstreamResponse {
  const status = script.status ?? 200;
  const text = script.raw !== undefined ? script.raw : JSON.stringify(script.body ?? {});
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => text,
  };
}

/**
 * In-process stand-in for the REST upstream. Routes are keyed by path plus
 * query string; each call consumes the next scripted response and the last
 * one repeats.
 */
export class FakeUpstream {
  readonly calls: { url: string; init: UpstreamRequestInit }[] = [];
  private routes = new Map<string, ScriptedResponse[]>();

  on(pathAndQuery: string, ...responses: ScriptedResponse[]): this {
    this.routes.set(pathAndQuery, responses);
    return this;
  }

  callsTo(pathAndQuery: string): number {
    return this.calls.filter(({ url }) => {
      const parsed = new URL(url);
      return `${parsed.pathname}${parsed.search}` === pathAndQuery;
    }).length;
  }

  readonly fetchImpl: FetchLike = async (url, init) => {
    this.calls.push({ url, init });
    const parsed = new URL(url);
    const queue = this.routes.get(`${parsed.pathname}${parsed.search}`);

    if (!queue || queue.length === 0) {
      return scriptedResponse({ status: 404, body: { error: `no route for ${parsed.pathname}` } });
    }

    const script = queue.length > 1 ? queue.shift() : queue[0];
    if (!script) {
      return scriptedResponse({ status: 404 });
    }
    if (script.error) {
      throw script.error;
    }
    return scriptedResponse(script);
  };
}
