import type {
  SuperagentRequestFactory,
  SuperagentRequestLike,
  SuperagentResponseLike,
} from "../../superagent-request-adapter";

type SuperagentOutcome = SuperagentResponseLike | Error;

/**
 * Records what the engine sets on a request and settles like superagent:
 * error statuses reject unless an `ok` callback accepts them.
 */
export class FakeRequest implements SuperagentRequestLike {
  public readonly headers: Record<string, string> = {};
  public body: string | undefined;
  private accept: ((response: SuperagentResponseLike) => boolean) | undefined;

  constructor(
    public readonly method: string,
    public readonly url: string,
    private readonly outcome: SuperagentOutcome | undefined
  ) {}

  public set(headers: Record<string, string>): this {
    Object.assign(this.headers, headers);
    return this;
  }

  public send(body: string): this {
    this.body = body;
    return this;
  }

  public ok(callback: (response: SuperagentResponseLike) => boolean): this {
    this.accept = callback;
    return this;
  }

  public then<TResult1 = SuperagentResponseLike, TResult2 = never>(
    onfulfilled?: ((value: SuperagentResponseLike) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): PromiseLike<TResult1 | TResult2> {
    return this.settle().then(onfulfilled, onrejected);
  }

  private async settle(): Promise<SuperagentResponseLike> {
    const outcome = this.outcome;
    if (outcome === undefined) {
      throw new Error(`No mocked response for ${this.url}`);
    }
    if (outcome instanceof Error) {
      throw outcome;
    }
    const accepted = this.accept
      ? this.accept(outcome)
      : outcome.status >= 200 && outcome.status < 300;
    if (!accepted) {
      throw Object.assign(new Error(`Unsuccessful status ${outcome.status}`), {
        status: outcome.status,
      });
    }
    return outcome;
  }
}

class SuperagentMock {
  private outcomes: SuperagentOutcome[] = [];
  private requests: FakeRequest[] = [];

  public readonly request: SuperagentRequestFactory = (method, url) => {
    const request = new FakeRequest(method, url, this.outcomes.shift());
    this.requests.push(request);
    return request;
  };

  public mockResponseOnce(response: Partial<SuperagentResponseLike>): SuperagentMock {
    this.outcomes.push({ status: 200, header: {}, ...response });
    return this;
  }

  public mockRejectOnce(error: Error): SuperagentMock {
    this.outcomes.push(error);
    return this;
  }

  public getRequests(): FakeRequest[] {
    return this.requests;
  }

  public reset(): void {
    this.outcomes = [];
    this.requests = [];
  }
}

const superagentMock = new SuperagentMock();

export default superagentMock;
