import axios from "axios";
import type { AxiosInstance } from "axios";

export function createHttpClient(
  serverUrl: string,
  apiKey?: string,
): AxiosInstance {
  return axios.create({
    baseURL: serverUrl.replace(/\/+$/, ""),
    headers: apiKey ? { Authorization: `Bearer ${apiKey}` } : {},
  });
}

/** Message carried by the server's `{ error, message }` answers, if any. */
export function serverMessage(data: unknown): string | null {
  if (
    typeof data === "object" &&
    data !== null &&
    "message" in data &&
    typeof data.message === "string"
  ) {
    return data.message;
  }
  return null;
}
