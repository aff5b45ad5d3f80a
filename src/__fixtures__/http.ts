import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";

export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  body: unknown;
  authToken: string | null;
  userId: string | null;
}

export type RouteResult = { status: number; data: unknown } | { networkError: string };
export type Route = (request: RecordedRequest) => RouteResult;

/**
 * Axios adapter answering in-process. Non-2xx answers are thrown as AxiosError with
 * the response attached, the way axios' own adapters settle them.
 */
export function httpStub(route: Route): { adapter: AxiosAdapter; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const request: RecordedRequest = {
      method: (config.method ?? "get").toUpperCase(),
      url: config.url ?? "",
      params: config.params,
      body: typeof config.data === "string" ? JSON.parse(config.data) : config.data,
      authToken: header(config, "X-Auth-Token"),
      userId: header(config, "X-User-Id"),
    };
    requests.push(request);

    const outcome = route(request);
    if ("networkError" in outcome) {
      throw new AxiosError(`connect ${outcome.networkError}`, outcome.networkError, config);
    }

    const response: AxiosResponse = {
      data: outcome.data,
      status: outcome.status,
      statusText: String(outcome.status),
      headers: {},
      config,
    };
    if (outcome.status >= 200 && outcome.status < 300) return response;
    throw new AxiosError(
      `Request failed with status code ${outcome.status}`,
      outcome.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      null,
      response,
    );
  };

  return { adapter, requests };
}

function header(config: InternalAxiosRequestConfig, name: string): string | null {
  const value = config.headers.get(name);
  return typeof value === "string" ? value : null;
}

export function ok(data: unknown): RouteResult {
  return { status: 200, data };
}
