import { StreamProtocolError, errorMessage } from '@/lib/errors';
import type { ChainStreamEvent } from '@/lib/types';
import { ChainStreamEventSchema } from '@/lib/validation';

export function parseStreamLine(line: string): ChainStreamEvent | undefined {
  const trimmed = line.trim();
  if (!trimmed) return undefined;
  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch {
    throw new StreamProtocolError(`malformed stream line: ${trimmed.slice(0, 80)}`);
  }
  const parsed = ChainStreamEventSchema.safeParse(json);
  if (!parsed.success) {
    throw new StreamProtocolError(`unexpected stream event: ${trimmed.slice(0, 80)}`);
  }
  return parsed.data;
}

/**
 * Reads an NDJSON body to the end, handing each event to `onEvent` as it
 * arrives. A bad line or a throwing handler cancels the body.
 */
export async function readChainStream(
  body: ReadableStream<Uint8Array>,
  onEvent: (event: ChainStreamEvent) => void,
): Promise<void> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  const deliver = (line: string) => {
    const event = parseStreamLine(line);
    if (event) onEvent(event);
  };
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });
      let idx = buffer.indexOf('\n');
      while (idx >= 0) {
        deliver(buffer.slice(0, idx));
        buffer = buffer.slice(idx + 1);
        idx = buffer.indexOf('\n');
      }
    }
    buffer += decoder.decode();
    deliver(buffer);
  } catch (e) {
    // Cancelling the body tells the server to stop the run.
    await reader.cancel(errorMessage(e));
    throw e;
  } finally {
    reader.releaseLock();
  }
}
