import { MalformedBlobError } from '../errors.js';

/** Bytes per stored dimension (IEEE-754 single precision). */
export const BYTES_PER_DIMENSION = 4;

/**
 * Pack a vector into a little-endian float32 blob, one value per dimension.
 * Values wider than float32 are rounded to the nearest float32; NaN and
 * Infinity are written as-is.
 */
export function encodeBlob(vector: ArrayLike<number>): Buffer {
  const buffer = Buffer.alloc(vector.length * BYTES_PER_DIMENSION);
  for (let i = 0; i < vector.length; i++) {
    buffer.writeFloatLE(vector[i], i * BYTES_PER_DIMENSION);
  }
  return buffer;
}

/**
 * Unpack a blob written by `encodeBlob`. The dimension is inferred from the
 * byte length.
 *
 * @throws MalformedBlobError if the length is not a multiple of 4
 */
export function decodeBlob(blob: Uint8Array): Float32Array {
  if (blob.byteLength % BYTES_PER_DIMENSION !== 0) {
    throw new MalformedBlobError(blob.byteLength);
  }

  const dimensions = blob.byteLength / BYTES_PER_DIMENSION;
  const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);
  const vector = new Float32Array(dimensions);
  for (let i = 0; i < dimensions; i++) {
    vector[i] = view.getFloat32(i * BYTES_PER_DIMENSION, true);
  }
  return vector;
}
