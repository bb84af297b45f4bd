/**
 * Argon2 KDF for kdbxweb
 *
 * kdbxweb ships no Argon2 implementation; KDBX4 databases (the KeePass
 * default) need one to open and to save. The native argon2 binding does it.
 */

import kdbxweb from 'kdbxweb'
import * as argon2 from 'argon2'

type Argon2Impl = Parameters<typeof kdbxweb.CryptoEngine.setArgon2Impl>[0]

/** kdbxweb's Argon2id type id, anything else is Argon2d */
const KDBX_ARGON2ID = 2

let registered = false

/**
 * Copy bytes into a fresh ArrayBuffer
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(buffer).set(bytes)
  return buffer
}

/**
 * Argon2 with kdbxweb's calling convention (memory in KiB)
 */
export const nativeArgon2: Argon2Impl = async (password, salt, memory, iterations, length, parallelism, type, version) => {
  const hash = await argon2.hash(Buffer.from(password), {
    raw: true,
    salt: Buffer.from(salt),
    memoryCost: memory,
    timeCost: iterations,
    hashLength: length,
    parallelism,
    type: type === KDBX_ARGON2ID ? argon2.argon2id : argon2.argon2d,
    version
  })
  return toArrayBuffer(hash)
}

/**
 * Install the native implementation once per process
 */
export function registerArgon2(): void {
  if (registered) return
  kdbxweb.CryptoEngine.setArgon2Impl(nativeArgon2)
  registered = true
}
