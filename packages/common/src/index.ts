import { webcrypto } from "one-webcrypto";

/** @internal */
export function integerToOctetStringLE(i: bigint, len: number): Uint8Array {
  const max = 256n ** BigInt(len);
  if (i >= max) {
    throw new Error(
      `Integer ${i} too large for ${len} byte array (max ${max}).`,
    );
  }
  const octets = new Uint8Array(len);
  for (let index = 0; index < len; index++) {
    octets[index] = Number(i % 256n);
    i /= 256n;
  }
  return octets;
}

/** @internal */
export function octetStringToIntegerLE(octetString: Uint8Array): bigint {
  return octetString.reduce(
    (total, value, index) => total + 256n ** BigInt(index) * BigInt(value),
    0n,
  );
}

/** @internal */
export function arr<T>(length: number, mapper: (n: number) => T): T[] {
  const a = new Array(length) as T[];
  for (let i = 0; i < length; i++) a[i] = mapper(i);
  return a;
}

/** @internal */
export function fill<T>(length: number, value: T): T[] {
  return new Array(length).fill(value) as T[];
}

/** @internal */
export function randomBytes(n: number): Uint8Array {
  const buffer = new Uint8Array(n);
  webcrypto.getRandomValues(buffer);
  return buffer;
}

/** @internal */
export function concat(buffers: Uint8Array[]): Uint8Array {
  const newLength = buffers.reduce((sum, b) => sum + b.byteLength, 0);
  const ret = new Uint8Array(newLength);
  let writeIndex = 0;
  for (const buffer of buffers) {
    ret.set(buffer, writeIndex);
    writeIndex += buffer.byteLength;
  }
  return ret;
}

/**
   XOR `b` into a copy of `a`. Both arguments must be the same length.
*/
export function xor(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.length !== b.length) {
    throw new Error("could not xor two unequal arrays");
  }
  return a.map((byte, i) => byte ^ b[i]);
}

/**
   Compares two byte strings without returning early on the first
   differing byte.
*/
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let difference = 0;
  for (let i = 0; i < a.length; i++) difference |= a[i] ^ b[i];
  return difference === 0;
}

/**
   Copies `bytes` into a standalone ArrayBuffer, for APIs that take a
   plain buffer rather than a view onto one.
*/
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}

export async function sha256(data: Uint8Array): Promise<Uint8Array> {
  return new Uint8Array(
    await webcrypto.subtle.digest("SHA-256", toArrayBuffer(data)),
  );
}

/**
   HKDF-SHA256 (RFC 5869), extract and expand in one step.
*/
export async function hkdfSha256(
  ikm: Uint8Array,
  salt: Uint8Array,
  info: Uint8Array,
  length: number,
): Promise<Uint8Array> {
  const key = await webcrypto.subtle.importKey(
    "raw",
    toArrayBuffer(ikm),
    "HKDF",
    false,
    ["deriveBits"],
  );
  const bits = await webcrypto.subtle.deriveBits(
    {
      name: "HKDF",
      hash: "SHA-256",
      salt: toArrayBuffer(salt),
      info: toArrayBuffer(info),
    },
    key,
    length * 8,
  );
  return new Uint8Array(bits);
}
