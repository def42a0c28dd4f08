/**
 * Serializes staged objects into payload bytes and back.
 */
export interface PayloadCodec<T> {
  /**
   * @throws DiffError ENCODING_FAILED
   */
  encode(value: T): Uint8Array;

  /**
   * @throws DiffError DECODING_FAILED
   */
  decode(bytes: Uint8Array): T;
}
