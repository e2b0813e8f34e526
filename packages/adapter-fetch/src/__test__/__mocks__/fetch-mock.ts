import type { FetchFunction } from "../../fetch-request-adapter";

export interface FetchMockResponse {
  body?: string;
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
}

export interface FetchCall {
  url: string;
  method?: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * In-process stand-in for `fetch`. Answers calls from a queue of mocked
 * responses or errors and records every call.
 */
export class FetchMock {
  private outcomes: (FetchMockResponse | Error)[] = [];
  private calls: FetchCall[] = [];

  public readonly fetch: FetchFunction = async (input, init = {}) => {
    this.calls.push({
      url: input,
      method: init.method,
      headers: readHeaders(init.headers),
      body: typeof init.body === "string" ? init.body : undefined,
    });
    const outcome = this.outcomes.shift();
    if (outcome === undefined) {
      throw new Error(`No mocked response for ${input}`);
    }
    if (outcome instanceof Error) {
      throw outcome;
    }
    return new Response(outcome.body ?? null, {
      status: outcome.status ?? 200,
      statusText: outcome.statusText ?? "",
      headers: outcome.headers,
    });
  };

  public mockResponseOnce(response: FetchMockResponse): FetchMock {
    this.outcomes.push(response);
    return this;
  }

  public mockRejectOnce(error: Error): FetchMock {
    this.outcomes.push(error);
    return this;
  }

  public getCalls(): FetchCall[] {
    return this.calls;
  }

  public reset(): void {
    this.outcomes = [];
    this.calls = [];
  }
}

function readHeaders(headers: RequestInit["headers"]): Record<string, string> {
  return Object.fromEntries(new Headers(headers));
}

const fetchMock = new FetchMock();

export default fetchMock;
