import { AxiosError, AxiosHeaders, AxiosResponse } from "axios";

export function axiosResponse<T>(data: T, status = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: status === 200 ? "OK" : "Error",
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

export function axiosError(code: string, status?: number): AxiosError {
  return new AxiosError(
    status ? `Request failed with status code ${status}` : `${code} error`,
    code,
    undefined,
    undefined,
    status ? axiosResponse({}, status) : undefined
  );
}
