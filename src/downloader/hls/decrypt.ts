import { createDecipheriv } from "node:crypto";
import type { KyInstance } from "ky";
import { DownloadError, ManifestError, httpStatusError, toDownloadError } from "../../shared/errors.js";
import { PLAYER_REFERER } from "../../shared/http.js";

export const AES_BLOCK_SIZE = 16;

/**
 * Decodes the IV attribute of an EXT-X-KEY tag. The first two characters are
 * the "0x" scheme prefix; the rest must be exactly 16 hex-encoded bytes.
 */
export function parseIv(raw: string): Buffer {
  const hex = raw.slice(2);
  if (!/^[0-9a-fA-F]{32}$/.test(hex)) {
    throw new ManifestError(`Invalid IV: ${raw}`);
  }
  return Buffer.from(hex, "hex");
}

/**
 * Fetches a 16-byte AES key. A shorter body is a hard failure.
 */
export async function fetchKey(http: KyInstance, keyUrl: string): Promise<Buffer> {
  let response: Response;
  try {
    response = await http.get(keyUrl, {
      throwHttpErrors: false,
      headers: { Referer: PLAYER_REFERER },
    });
  } catch (error) {
    throw toDownloadError(error);
  }

  if (!response.ok) {
    throw httpStatusError(response.status, keyUrl);
  }

  const body = Buffer.from(await response.arrayBuffer());
  if (body.length < AES_BLOCK_SIZE) {
    throw new DownloadError(
      "corruption",
      `Decryption key too short: got ${body.length} of ${AES_BLOCK_SIZE} bytes`,
      { retryable: false }
    );
  }
  return body.subarray(0, AES_BLOCK_SIZE);
}

/**
 * Decrypts a whole AES-128-CBC segment. Padding is left in place; transport
 * stream demuxers ignore the trailing bytes.
 */
export function decryptSegment(ciphertext: Uint8Array, key: Uint8Array, iv: Uint8Array): Buffer {
  if (key.length !== AES_BLOCK_SIZE || iv.length !== AES_BLOCK_SIZE) {
    throw new DownloadError("corruption", "Key and IV must be 16 bytes each", { retryable: false });
  }
  if (ciphertext.length % AES_BLOCK_SIZE !== 0) {
    throw new DownloadError(
      "corruption",
      `Ciphertext length ${ciphertext.length} is not a multiple of ${AES_BLOCK_SIZE}`
    );
  }

  const decipher = createDecipheriv("aes-128-cbc", key, iv);
  decipher.setAutoPadding(false);
  return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
}
