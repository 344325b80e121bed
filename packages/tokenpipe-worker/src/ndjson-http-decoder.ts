import { type HttpTransportDescriptor, type RecordDecoder, createNdjsonDecoder, openHttpTransport } from "@tokenpipe/core";

export interface NdjsonHttpTransport extends HttpTransportDescriptor {
  malformed?: "error" | "skip";
}

/**
 * Decoder factory for `beginThreadedStream`: fetches `url` inside the poller
 * thread and decodes the body as newline-delimited JSON.
 */
export function createDecoder(transport: NdjsonHttpTransport): RecordDecoder<unknown> {
  const { malformed, ...descriptor } = transport;
  return createNdjsonDecoder(openHttpTransport(descriptor), { malformed });
}
