import { once } from 'node:events';
import type { Writable } from 'node:stream';

import type { OutputFormat } from '@app/config';

export type EnrichedWriter = Readonly<{
  write: (record: unknown) => Promise<void>;
  /** Terminates the document; ends the stream only when the writer owns it. */
  close: () => Promise<void>;
  count: () => number;
}>;

export type EnrichedWriterOptions = Readonly<{
  format: OutputFormat;
  endStream: boolean;
}>;

export function createEnrichedWriter(stream: Writable, options: EnrichedWriterOptions): EnrichedWriter {
  let written = 0;
  let closed = false;

  const push = async (chunk: string): Promise<void> => {
    if (!stream.write(chunk)) {
      await once(stream, 'drain');
    }
  };

  return {
    async write(record) {
      if (closed) throw new Error('EnrichedWriter is closed');
      const json = JSON.stringify(record);
      if (options.format === 'ndjson') {
        await push(`${json}\n`);
      } else {
        await push(`${written === 0 ? '[\n' : ',\n'}${json}`);
      }
      written += 1;
    },

    async close() {
      if (closed) return;
      closed = true;
      if (options.format === 'json') {
        await push(written === 0 ? '[]\n' : '\n]\n');
      }
      if (options.endStream) {
        stream.end();
        await once(stream, 'finish');
      }
    },

    count: () => written,
  };
}
