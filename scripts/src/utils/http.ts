import { describeError, RequestError } from "../errors.js";
import { logger } from "./logger.js";

export interface JsonRequest {
  method: "GET" | "POST";
  url: string;
  headers?: Record<string, string>;
  body?: unknown;
}

export interface JsonResponse {
  status: number;
  body: unknown;
}

/**
 * Single attempt. Non-2xx answers become a `RequestError` unless listed in `allowStatus`;
 * so do transport failures and unparsable bodies, with status 0.
 */
export async function requestJson(request: JsonRequest, allowStatus: number[] = []): Promise<JsonResponse> {
  const endpoint = sanitizeUrl(request.url);
  let response: Response;
  let text: string;
  try {
    response = await fetch(request.url, {
      method: request.method,
      headers: {
        "Content-Type": "application/json",
        ...request.headers
      },
      body: request.body === undefined ? undefined : JSON.stringify(request.body)
    });
    text = await response.text();
  } catch (error) {
    logger.error("Request did not complete", { method: request.method, endpoint, error: describeError(error) });
    throw new RequestError(`${request.method} ${endpoint} failed: ${describeError(error)}`, 0, endpoint, error);
  }

  if (!response.ok && !allowStatus.includes(response.status)) {
    logger.error("Request failed", {
      method: request.method,
      endpoint,
      status: response.status,
      body: text.slice(0, 500)
    });
    throw new RequestError(
      `${request.method} ${endpoint} failed with status ${response.status}`,
      response.status,
      endpoint
    );
  }

  return { status: response.status, body: parseBody(text, request.method, endpoint) };
}

function parseBody(text: string, method: string, endpoint: string): unknown {
  if (text.length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    logger.error("Response was not JSON", { method, endpoint, body: text.slice(0, 500) });
    throw new RequestError(`${method} ${endpoint} returned a body that is not JSON`, 0, endpoint, error);
  }
}

function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.search = "";
    return parsed.toString();
  } catch {
    return url;
  }
}
