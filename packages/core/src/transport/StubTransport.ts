import type {
  Transport,
  TransportRequest,
  TransportResponse,
} from "./Transport";

/**
 * A canned reply. `status` defaults to 200, `headers` to none, `body` to "".
 */
export interface StubReply {
  readonly status?: number;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}

export type StubHandler = (
  request: TransportRequest,
) => StubReply | Error | Promise<StubReply | Error>;

/**
 * In-process transport for tests and offline use.
 *
 * Replies are served from a FIFO queue first, then from the fallback handler.
 * Returning (or queueing) an Error makes `send` reject with it, which is how a
 * network fault is simulated. Every request is recorded in `requests`.
 *
 * @example
 * ```typescript
 * const transport = new StubTransport()
 *   .reply({ status: 200, body: '{"id":"1"}' })
 *   .reply(new Error("socket hang up"));
 * ```
 */
export class StubTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  private readonly queue: Array<StubReply | Error> = [];

  constructor(private readonly fallback?: StubHandler) {}

  reply(reply: StubReply | Error): this {
    this.queue.push(reply);
    return this;
  }

  get lastRequest(): TransportRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);

    const reply = this.queue.shift() ?? (await this.fallback?.(request));
    if (reply === undefined) {
      throw new Error(`No stubbed reply for ${request.method} ${request.url}`);
    }
    if (reply instanceof Error) throw reply;

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(reply.headers ?? {})) {
      headers[name.toLowerCase()] = value;
    }
    return {
      status: reply.status ?? 200,
      headers,
      bodyText: reply.body ?? "",
    };
  }
}
