/**
 * Default transport, backed by axios.
 *
 * Responses are always read as text and every status code resolves, so that the
 * dispatcher alone decides what a status means. Timeouts, connection errors and
 * cancellation reject with axios' own errors.
 *
 * @module AxiosTransport
 */

import axios, { type AxiosInstance } from "axios";
import {
  AxiosTransportConfigSchema,
  parseConfig,
  type AxiosTransportConfigInput,
} from "../config";
import type {
  ResponseHeaders,
  Transport,
  TransportRequest,
  TransportResponse,
} from "./Transport";

export interface AxiosTransportOptions extends AxiosTransportConfigInput {
  /**
   * Pre-configured axios instance (proxies, agents, interceptors). A fresh
   * instance is created when omitted.
   */
  instance?: AxiosInstance;
}

export class AxiosTransport implements Transport {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(options: AxiosTransportOptions = {}) {
    const { instance, ...config } = options;
    this.timeoutMs = parseConfig(AxiosTransportConfigSchema, config).timeoutMs;
    this.http = instance ?? axios.create();
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const response = await this.http.request<unknown>({
      method: request.method,
      url: request.url,
      headers: { ...request.headers },
      data: request.body,
      signal: request.signal,
      timeout: this.timeoutMs,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });

    return {
      status: response.status,
      headers: normalizeHeaders(response.headers),
      bodyText: toText(response.data),
    };
  }
}

/**
 * Lower-cases header names and joins repeated values with ", ".
 */
export function normalizeHeaders(raw: unknown): ResponseHeaders {
  const headers: Record<string, string> = {};
  if (typeof raw !== "object" || raw === null) return headers;

  const entries: Array<[string, unknown]> = Object.entries(raw);
  for (const [name, value] of entries) {
    if (value === null || value === undefined) continue;
    headers[name.toLowerCase()] = Array.isArray(value)
      ? value.map(String).join(", ")
      : String(value);
  }
  return headers;
}

function toText(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === null || data === undefined) return "";
  if (data instanceof Uint8Array) return Buffer.from(data).toString("utf8");
  return JSON.stringify(data);
}
