import axios, {
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";

type AxiosMockResponse = {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
  data?: string;
};

interface AxiosCall {
  url?: string;
  method?: string;
  contentType: unknown;
  data: unknown;
}

/**
 * An axios instance whose adapter answers from a queue instead of the
 * network, recording the config axios hands to it.
 */
class AxiosMock {
  private outcomes: (AxiosMockResponse | Error)[] = [];
  private calls: AxiosCall[] = [];

  public readonly instance: AxiosInstance = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      this.calls.push({
        url: config.url,
        method: config.method,
        contentType: config.headers.get("content-type"),
        data: config.data,
      });

      const outcome = this.outcomes.shift();
      if (outcome === undefined) {
        throw new Error(`No mocked response for ${config.url}`);
      }
      if (outcome instanceof Error) {
        throw outcome;
      }
      return {
        data: outcome.data,
        status: outcome.status ?? 200,
        statusText: outcome.statusText ?? "OK",
        headers: outcome.headers ?? {},
        config,
        request: {},
      };
    },
  });

  public mockResponseOnce(response: AxiosMockResponse): AxiosMock {
    this.outcomes.push(response);
    return this;
  }

  public mockRejectOnce(error: Error): AxiosMock {
    this.outcomes.push(error);
    return this;
  }

  public getCalls(): AxiosCall[] {
    return this.calls;
  }

  public reset(): void {
    this.outcomes = [];
    this.calls = [];
  }
}

const axiosMock = new AxiosMock();

export default axiosMock;
