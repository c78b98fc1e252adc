import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  authorization: unknown;
}

export interface FakeReply {
  status: number;
  data?: unknown;
}

/**
 * axios instance whose requests are answered in process by `responder`.
 * Non-2xx replies are rejected the way the real adapters reject them,
 * honoring a per-request validateStatus.
 */
export function createFakeHttp(responder: (request: RecordedRequest) => FakeReply): {
  http: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        params: config.params ?? {},
        authorization: config.headers.get('Authorization'),
      };
      requests.push(request);

      const reply = responder(request);
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };

      const validateStatus = config.validateStatus;
      if (!validateStatus || validateStatus(reply.status)) {
        return response;
      }
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        {},
        response,
      );
    },
  });

  return { http, requests };
}
