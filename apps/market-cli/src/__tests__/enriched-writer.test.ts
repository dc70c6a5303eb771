import { describe, expect, it } from 'vitest';

import { createEnrichedWriter } from '../io/enriched-writer.js';

import { createCapturedStream } from './fixtures.js';

describe('createEnrichedWriter', () => {
  it('writes one JSON object per line', async () => {
    const { stream, text } = createCapturedStream();
    const writer = createEnrichedWriter(stream, { format: 'ndjson', endStream: false });

    await writer.write({ id: '1' });
    await writer.write({ id: '2' });
    await writer.close();

    expect(text()).toBe('{"id":"1"}\n{"id":"2"}\n');
    expect(writer.count()).toBe(2);
    expect(stream.writableEnded).toBe(false);
  });

  it('writes a JSON array', async () => {
    const { stream, text } = createCapturedStream();
    const writer = createEnrichedWriter(stream, { format: 'json', endStream: true });

    await writer.write({ id: '1' });
    await writer.write({ id: '2' });
    await writer.close();

    expect(text()).toBe('[\n{"id":"1"},\n{"id":"2"}\n]\n');
    expect(JSON.parse(text())).toEqual([{ id: '1' }, { id: '2' }]);
    expect(stream.writableFinished).toBe(true);
  });

  it('writes an empty array when nothing was scored', async () => {
    const { stream, text } = createCapturedStream();
    const writer = createEnrichedWriter(stream, { format: 'json', endStream: false });

    await writer.close();
    await writer.close();

    expect(text()).toBe('[]\n');
  });

  it('refuses writes after close', async () => {
    const { stream } = createCapturedStream();
    const writer = createEnrichedWriter(stream, { format: 'ndjson', endStream: false });
    await writer.close();

    await expect(writer.write({ id: '1' })).rejects.toThrow('EnrichedWriter is closed');
  });
});
