/**
 * In-process stand-in for the platform REST API.
 *
 * Routes are matched on method and pathname. A route may reply with a fixed
 * response, a function of the call, or a sequence (the last entry repeats).
 */

export interface RecordedCall {
  body?: unknown
  host: string
  method: string
  path: string
  query: Record<string, string>
}

export interface FakeReply {
  body?: unknown
  status?: number
}

export type Responder = (call: RecordedCall) => FakeReply | Promise<FakeReply>

type ReplySpec = FakeReply | Responder

// A reply that makes fetch itself reject, as undici does on socket errors
export const CONNECTION_RESET: Responder = () => {
  throw new TypeError('fetch failed', { cause: { code: 'ECONNRESET' } })
}

export class FakeBackend {
  readonly calls: RecordedCall[] = []
  private readonly routes = new Map<string, ReplySpec[]>()

  readonly fetch = async (input: Request | string | URL, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : input.toString())
    const method = init?.method ?? 'GET'
    const call: RecordedCall = {
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
      host: url.host,
      method,
      path: url.pathname,
      query: Object.fromEntries(url.searchParams),
    }
    this.calls.push(call)

    const queue = this.routes.get(`${method} ${url.pathname}`)
    if (!queue || queue.length === 0) {
      return jsonResponse(404, { error_code: 'ENDPOINT_NOT_FOUND', message: `No fake route for ${method} ${url.pathname}` }) // eslint-disable-line camelcase
    }

    const spec = queue.length > 1 ? queue.shift() : queue[0]
    const reply = typeof spec === 'function' ? await spec(call) : spec
    return jsonResponse(reply?.status ?? 200, reply?.body ?? {})
  }

  /**
   * Calls made to one route
   */
  callsTo(method: string, path: string): RecordedCall[] {
    return this.calls.filter(call => call.method === method && call.path === path)
  }

  on(method: string, path: string, ...replies: ReplySpec[]): this {
    this.routes.set(`${method} ${path}`, replies)
    return this
  }
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    headers: { 'content-type': 'application/json' },
    status,
  })
}

/**
 * Sleep that records requested delays and returns immediately
 */
export function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = []
  return {
    delays,
    async sleep(ms: number) {
      delays.push(ms)
    },
  }
}
