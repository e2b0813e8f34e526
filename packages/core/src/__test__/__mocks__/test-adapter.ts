import RequestAdapter from "../../client/request-adapter";
import { EMPTY_BODY, textBody } from "../../models/body";
import type { ClientRequest, ClientResponse } from "../../models/request-params";
import type { UrlValidationOptions } from "../../utils/url-validator";

type TestOutcome =
  | { kind: "response"; response: ClientResponse }
  | { kind: "error"; error: Error }
  | { kind: "hang" };

export interface TestRequestRecord {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: string | undefined;
}

/**
 * Engine answering from a queue of prepared outcomes. Records the
 * headers and body it would have sent.
 */
export default class TestAdapter extends RequestAdapter<ClientResponse> {
  public readonly name = "test";

  private outcomes: TestOutcome[] = [];
  private requests: TestRequestRecord[] = [];

  constructor(urlValidationOptions?: UrlValidationOptions) {
    super(urlValidationOptions);
  }

  public respondOnce(
    status: number,
    body = "",
    headers: Record<string, string> = {}
  ): this {
    this.outcomes.push({
      kind: "response",
      response: {
        status,
        statusText: "",
        headers,
        body: body === "" ? EMPTY_BODY : textBody(body),
      },
    });
    return this;
  }

  public failOnce(error: Error): this {
    this.outcomes.push({ kind: "error", error });
    return this;
  }

  /** The next request never completes. */
  public hangOnce(): this {
    this.outcomes.push({ kind: "hang" });
    return this;
  }

  public getRequests(): TestRequestRecord[] {
    return this.requests;
  }

  public createRequest(request: ClientRequest): Promise<ClientResponse> {
    this.requests.push({
      method: request.method,
      url: request.url,
      headers: this.requestHeaders(request),
      body: this.requestBody(request),
    });

    const outcome = this.outcomes.shift();
    if (outcome === undefined) {
      return Promise.reject(new Error(`No prepared outcome for ${request.url}`));
    }
    switch (outcome.kind) {
      case "response":
        return Promise.resolve(outcome.response);
      case "error":
        return Promise.reject(outcome.error);
      case "hang":
        return new Promise<ClientResponse>(() => {});
    }
  }

  public async getResult(response: ClientResponse): Promise<ClientResponse> {
    return response;
  }
}
