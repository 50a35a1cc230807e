import { InvalidPortError } from "../errors.js";

/**
 * Where an unrolled access connects on its memory.
 *
 *            |--------------|--------------|
 *            |   Buffer 0   |   Buffer 1   |
 *            |--------------|--------------|
 * bufferPort         0              1           undefined for accesses outside the pipeline
 * muxSize            3              3           width of one time multiplexed vector
 *                 |x x x|        |x x x|
 *
 *              |x x x|x x|     |x x x|x x x|
 * muxPort         0    1          0     1       id of the time multiplexed vector
 *
 *              |( ) O|O O|    |(   )|( ) O|
 * muxOfs        0   2 0 1        0    0  2      start offset into the vector
 */
export interface Port {
  bufferPort: number | undefined;
  muxPort: number;
  muxSize: number;
  muxOfs: number;
  /** 0 for the first access on a lane, k for the k-th access sharing it. */
  broadcast: number;
}

export function makePort(port: Port): Port {
  const { bufferPort, muxPort, muxSize, muxOfs, broadcast } = port;
  if (bufferPort !== undefined && (!Number.isInteger(bufferPort) || bufferPort < 0)) {
    throw new InvalidPortError(`Buffer port must be a non-negative integer, got ${bufferPort}`);
  }
  if (!Number.isInteger(muxPort) || muxPort < 0) {
    throw new InvalidPortError(`Mux port must be a non-negative integer, got ${muxPort}`);
  }
  if (!Number.isInteger(muxOfs) || !Number.isInteger(muxSize) || muxOfs < 0 || muxOfs >= muxSize) {
    throw new InvalidPortError(`Mux offset ${muxOfs} is outside a mux of width ${muxSize}`);
  }
  if (!Number.isInteger(broadcast) || broadcast < 0) {
    throw new InvalidPortError(`Broadcast must be a non-negative integer, got ${broadcast}`);
  }
  return { bufferPort, muxPort, muxSize, muxOfs, broadcast };
}
