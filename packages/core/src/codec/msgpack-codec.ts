/**
 * MessagePack payload codec
 */

import { ExtensionCodec, encode, decode } from '@msgpack/msgpack';
import type { z } from 'zod';
import type { PayloadCodec } from '../interfaces/index.js';
import { DiffError } from '../errors/index.js';

const SET_EXT_TYPE = 0;
const MAP_EXT_TYPE = 1;
const BIGINT_EXT_TYPE = 2;

/** Carries Map, Set and bigint, which MessagePack has no native type for */
const extensionCodec = new ExtensionCodec();

function encodeNested(value: unknown): Uint8Array {
  return encode(value, { extensionCodec, ignoreUndefined: true });
}

function decodeArray(data: Uint8Array, kind: string): unknown[] {
  const value = decode(data, { extensionCodec });
  if (!Array.isArray(value)) {
    throw new Error(`${kind} extension does not hold an array`);
  }
  return value;
}

extensionCodec.register({
  type: SET_EXT_TYPE,
  encode: (input: unknown) => (input instanceof Set ? encodeNested([...input]) : null),
  decode: (data: Uint8Array) => new Set(decodeArray(data, 'Set')),
});

extensionCodec.register({
  type: MAP_EXT_TYPE,
  encode: (input: unknown) => (input instanceof Map ? encodeNested([...input]) : null),
  decode: (data: Uint8Array) => {
    const map = new Map<unknown, unknown>();
    for (const entry of decodeArray(data, 'Map')) {
      if (!Array.isArray(entry) || entry.length !== 2) {
        throw new Error('Map extension entry is not a key/value pair');
      }
      map.set(entry[0], entry[1]);
    }
    return map;
  },
});

extensionCodec.register({
  type: BIGINT_EXT_TYPE,
  encode: (input: unknown) => (typeof input === 'bigint' ? encodeNested(input.toString()) : null),
  decode: (data: Uint8Array) => {
    const digits = decode(data);
    if (typeof digits !== 'string') {
      throw new Error('BigInt extension does not hold a string');
    }
    return BigInt(digits);
  },
});

export interface MsgpackCodecOptions<T> {
  /**
   * Validates decoded payloads. Without a schema the decoded value is
   * trusted to be a T, since only this codec wrote it.
   */
  schema?: z.ZodType<T>;
}

export function createMsgpackCodec<T>(options: MsgpackCodecOptions<T> = {}): PayloadCodec<T> {
  const { schema } = options;

  return {
    encode(value: T): Uint8Array {
      try {
        return encodeNested(value);
      } catch (err) {
        throw new DiffError({
          code: 'ENCODING_FAILED',
          message: `Failed to encode payload: ${err instanceof Error ? err.message : String(err)}`,
          cause: err,
        });
      }
    },

    decode(bytes: Uint8Array): T {
      let raw: unknown;
      try {
        raw = decode(bytes, { extensionCodec });
      } catch (err) {
        throw new DiffError({
          code: 'DECODING_FAILED',
          message: `Failed to decode payload: ${err instanceof Error ? err.message : String(err)}`,
          cause: err,
        });
      }

      if (!schema) {
        return raw as T;
      }

      const result = schema.safeParse(raw);
      if (!result.success) {
        throw new DiffError({
          code: 'DECODING_FAILED',
          message: 'Decoded payload does not match the schema',
          cause: result.error,
          context: {
            issues: result.error.issues.map((issue) => ({
              path: issue.path.join('.'),
              message: issue.message,
            })),
          },
        });
      }
      return result.data;
    },
  };
}
