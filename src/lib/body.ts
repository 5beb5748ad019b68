type ByteReader = {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
};

type ByteSource = {
  getReader(): ByteReader;
};

/**
 * readLimitedBody collects a request body, giving up as soon as more than
 * `maxBytes` have arrived. Returns null when the cap was exceeded, whatever
 * the request's content-length header claimed.
 * Example:
 *   const bytes = await readLimitedBody(req.body, 8 * 1024);
 */
export async function readLimitedBody(source: ByteSource | null, maxBytes: number): Promise<ArrayBuffer | null> {
  if (!source) return new ArrayBuffer(0);
  const reader = source.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    if (!value) continue;
    received += value.byteLength;
    if (received > maxBytes) {
      await reader.cancel("body too large");
      return null;
    }
    chunks.push(value);
  }
  const body = new ArrayBuffer(received);
  const view = new Uint8Array(body);
  let offset = 0;
  for (const chunk of chunks) {
    view.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return body;
}

/** parseFormBody decodes urlencoded or multipart bytes the way Request#formData would. */
export function parseFormBody(bytes: ArrayBuffer, contentType: string | null): Promise<FormData> {
  return new Response(bytes, { headers: { "content-type": contentType || "" } }).formData();
}
