/**
 * File and folder names for downloaded releases.
 */
import type { Container, ProductFormat } from "../api/schemas.js";

export const MAX_FOLDER_NAME_LENGTH = 100;
export const MAX_VIDEO_NAME_LENGTH = 200;

const RESERVED_CHARS = /[\\/:*?"><|]/g;

/**
 * Replaces characters that are invalid in file names on common filesystems.
 *
 * @example
 * sanitise('AC/DC: "Live"')
 * // => "AC_DC_ _Live_"
 */
export function sanitise(name: string): string {
  return name.replace(RESERVED_CHARS, "_").replace(/\t$/, "");
}

/**
 * Cuts `name` to at most `max` characters, never splitting a surrogate pair.
 */
export function truncateName(name: string, max: number): { name: string; truncated: boolean } {
  const chars = Array.from(name);
  if (chars.length <= max) return { name, truncated: false };
  return { name: chars.slice(0, max).join(""), truncated: true };
}

/**
 * "Artist - Show info", the display name of a release or video.
 */
export function releaseName(container: Pick<Container, "artistName" | "containerInfo">): string {
  return `${container.artistName} - ${container.containerInfo.trimEnd()}`;
}

/**
 * @example
 * trackFileName(3, "Jam / Reprise", ".flac")
 * // => "03. Jam _ Reprise.flac"
 */
export function trackFileName(trackNumber: number, title: string, containerExt: string): string {
  return `${String(trackNumber).padStart(2, "0")}. ${sanitise(title)}${containerExt}`;
}

export function videoFileBase(name: string, resolutionLabel: string): string {
  return sanitise(`${name}_${resolutionLabel}`);
}

// ============================================================================
// Products
// ============================================================================

const VIDEO_PRODUCTS = new Set(["VIDEO ON DEMAND", "LIVE HD VIDEO"]);
const LIVESTREAM_PRODUCT = "LIVE HD VIDEO";

/**
 * SKU of the release's video product, or null when it has none.
 */
export function findVideoSku(products: readonly ProductFormat[]): number | null {
  return products.find((product) => VIDEO_PRODUCTS.has(product.formatStr))?.skuId ?? null;
}

export function findLivestreamSku(formats: readonly ProductFormat[]): number | null {
  return formats.find((format) => format.formatStr === LIVESTREAM_PRODUCT)?.skuId ?? null;
}
