import { TransportError } from "../errors";

export interface HttpTransportDescriptor {
  url: string;
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface HttpTransportOptions {
  fetch?: typeof fetch;
}

const MAX_ERROR_BODY = 500;

/**
 * Issues the request and yields the response body chunk by chunk as it
 * arrives. Non-2xx responses and failed reads raise TransportError.
 */
export async function* openHttpTransport(descriptor: HttpTransportDescriptor, options: HttpTransportOptions = {}): AsyncGenerator<Uint8Array, void, undefined> {
  const fetchImpl = options.fetch ?? fetch;
  const method = descriptor.method ?? (descriptor.body !== undefined ? "POST" : "GET");

  let response: Response;
  try {
    response = await fetchImpl(descriptor.url, {
      method,
      headers: descriptor.headers,
      body: descriptor.body,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TransportError(`request to ${descriptor.url} failed: ${message}`, { cause: error });
  }

  if (!response.ok) {
    let detail = "";
    try {
      detail = (await response.text()).slice(0, MAX_ERROR_BODY);
    } catch {
      // body unreadable; report the status alone
    }
    throw new TransportError(`HTTP ${response.status}${detail ? `: ${detail}` : ""}`, { status: response.status });
  }

  if (!response.body) {
    return;
  }

  const reader = response.body.getReader();
  let complete = false;
  try {
    for (;;) {
      let chunk: ReadableStreamReadResult<Uint8Array>;
      try {
        chunk = await reader.read();
      } catch (error) {
        complete = true;
        const message = error instanceof Error ? error.message : String(error);
        throw new TransportError(`read failed: ${message}`, { cause: error });
      }
      if (chunk.done) {
        complete = true;
        return;
      }
      yield chunk.value;
    }
  } finally {
    if (!complete) {
      await reader.cancel().catch((error: unknown) => {
        console.warn("[tokenpipe] failed to cancel response body:", error);
      });
    }
    reader.releaseLock();
  }
}
