/**
 * Shared Crypto Utilities
 * AES-GCM sealing of small JSON payloads (the stored session) via the Web
 * Crypto API.
 */

/** Encrypted payload as stored at rest. Both fields are base64. */
export interface SealedPayload {
  iv: string;
  ciphertext: string;
}

const IV_BYTES = 12;

function toBase64(bytes: Uint8Array): string {
  let binary = '';
  for (const byte of bytes) binary += String.fromCharCode(byte);
  return btoa(binary);
}

function fromBase64(value: string) {
  const binary = atob(value);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) bytes[i] = binary.charCodeAt(i);
  return bytes;
}

/**
 * Derive an AES-256-GCM key from an application secret (SHA-256 of the
 * secret, used as raw key material).
 */
export async function deriveKey(secret: string): Promise<CryptoKey> {
  const material = await crypto.subtle.digest('SHA-256', new TextEncoder().encode(secret));
  return crypto.subtle.importKey('raw', material, { name: 'AES-GCM' }, false, [
    'encrypt',
    'decrypt'
  ]);
}

export async function sealJson(value: unknown, key: CryptoKey): Promise<SealedPayload> {
  const iv = crypto.getRandomValues(new Uint8Array(IV_BYTES));
  const plaintext = new TextEncoder().encode(JSON.stringify(value));
  const ciphertext = await crypto.subtle.encrypt({ name: 'AES-GCM', iv }, key, plaintext);
  return { iv: toBase64(iv), ciphertext: toBase64(new Uint8Array(ciphertext)) };
}

/**
 * Decrypt and parse a payload sealed by {@link sealJson}.
 * Throws when the key is wrong or the payload was tampered with.
 */
export async function openJson(sealed: SealedPayload, key: CryptoKey): Promise<unknown> {
  const plaintext = await crypto.subtle.decrypt(
    { name: 'AES-GCM', iv: fromBase64(sealed.iv) },
    key,
    fromBase64(sealed.ciphertext)
  );
  const parsed: unknown = JSON.parse(new TextDecoder().decode(plaintext));
  return parsed;
}
