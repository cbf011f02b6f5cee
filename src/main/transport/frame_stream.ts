/**
 * Sequential frame reader over a dump file.
 *
 * Incoming chunks from the file stream are accumulated into a receive
 * buffer. Each time the buffer holds a whole frame, that frame is emitted
 * and removed. Bytes left over when the file ends form a partial frame and
 * fail the read.
 */

import { createReadStream } from 'fs';
import { FrameSizeError } from '../protocol/errors';

/** Lower bound of the read chunk size. */
const MIN_CHUNK_SIZE = 64 * 1024;

/** Frames requested per read, when frames are larger than the minimum chunk. */
const FRAMES_PER_CHUNK = 16;

/**
 * Yield each `frame_size`-byte frame of the file in order.
 *
 * Frames are fresh copies; callers may keep them.
 *
 * @throws FrameSizeError if the file ends inside a frame.
 */
export async function* read_frames(path: string, frame_size: number): AsyncGenerator<Uint8Array> {
  const stream = createReadStream(path, {
    highWaterMark: Math.max(MIN_CHUNK_SIZE, frame_size * FRAMES_PER_CHUNK)
  });

  let rx_buffer: Buffer = Buffer.alloc(0);
  let frame_index = 0;

  try {
    for await (const chunk of stream) {
      if (!Buffer.isBuffer(chunk)) continue;
      rx_buffer = rx_buffer.length === 0 ? chunk : Buffer.concat([rx_buffer, chunk]);

      let start = 0;
      while (rx_buffer.length - start >= frame_size) {
        yield new Uint8Array(rx_buffer.subarray(start, start + frame_size));
        start += frame_size;
        frame_index++;
      }
      rx_buffer = rx_buffer.subarray(start);
    }
  } finally {
    stream.destroy();
  }

  if (rx_buffer.length > 0) {
    throw new FrameSizeError(
      `Partial frame at end of input: ${rx_buffer.length} of ${frame_size} bytes`,
      frame_size,
      rx_buffer.length,
      { frame_index }
    );
  }
}
