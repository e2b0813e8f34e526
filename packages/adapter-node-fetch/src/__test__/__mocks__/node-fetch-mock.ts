import { Headers, Response } from "node-fetch";
import type { NodeFetchFunction } from "../../node-fetch-request-adapter";

type NodeFetchMockResponse = {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
  body?: string;
};

interface NodeFetchCall {
  url: string;
  method?: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Stands in for node-fetch: answers with real node-fetch `Response`
 * objects from a queue and records every call.
 */
class NodeFetchMock {
  private outcomes: (NodeFetchMockResponse | Error)[] = [];
  private calls: NodeFetchCall[] = [];

  public readonly fetch: NodeFetchFunction = async (url, init = {}) => {
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, name) => {
      headers[name] = value;
    });
    this.calls.push({
      url,
      method: init.method,
      headers,
      body: typeof init.body === "string" ? init.body : undefined,
    });

    const outcome = this.outcomes.shift();
    if (outcome === undefined) {
      throw new Error(`No mocked response for ${url}`);
    }
    if (outcome instanceof Error) {
      throw outcome;
    }
    return new Response(outcome.body, {
      status: outcome.status ?? 200,
      statusText: outcome.statusText,
      headers: outcome.headers,
    });
  };

  public mockResponseOnce(response: NodeFetchMockResponse): NodeFetchMock {
    this.outcomes.push(response);
    return this;
  }

  public mockRejectOnce(error: Error): NodeFetchMock {
    this.outcomes.push(error);
    return this;
  }

  public getCalls(): NodeFetchCall[] {
    return this.calls;
  }

  public reset(): void {
    this.outcomes = [];
    this.calls = [];
  }
}

const nodeFetchMock = new NodeFetchMock();

export default nodeFetchMock;
