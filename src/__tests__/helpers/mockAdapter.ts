import {
  AxiosError,
  AxiosHeaders,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

export interface MockReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type MockResponder = (config: InternalAxiosRequestConfig) => MockReply | Promise<MockReply>;

// Axios adapter answering from a function instead of the network; non-2xx rejects like axios does
export function mockAdapter(responder: MockResponder): {
  adapter: AxiosAdapter;
  calls: InternalAxiosRequestConfig[];
} {
  const calls: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const reply = await responder(config);

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: new AxiosHeaders(reply.headers),
      config,
      request: {},
    };

    if (reply.status >= 200 && reply.status < 300) {
      return response;
    }

    throw new AxiosError(
      `Request failed with status code ${reply.status}`,
      reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      {},
      response
    );
  };

  return { adapter, calls };
}

export function networkError(config: InternalAxiosRequestConfig, code = 'ECONNREFUSED'): AxiosError {
  return new AxiosError(`connect ${code}`, code, config, {});
}
