/**
 * HLS manifest resolution.
 *
 * Master manifests yield bandwidth-sorted variants; media manifests yield the
 * ordered segment list and the optional AES-128 key tag.
 */
import * as HLS from "hls-parser";
import type { KyInstance } from "ky";
import { MAX_RESOLUTION, RESOLUTION_FALLBACK, formatResolution } from "../../catalog/quality.js";
import type { QualityOption } from "../../catalog/quality.js";
import { ManifestError, SelectionError, getErrorMessage } from "../../shared/errors.js";
import { PLAYER_REFERER } from "../../shared/http.js";
import type { Logger } from "../../shared/logger.js";
import { getManifestBase, resolveUrl, resolveUrlWithParams } from "../../shared/url.js";

// ============================================================================
// Types
// ============================================================================

export interface Variant {
  uri: string;
  /** Bits per second */
  bandwidth: number;
  /** "WIDTHxHEIGHT", or empty for audio-only variants */
  resolution: string;
  frameRate?: number | undefined;
}

export interface EncryptionTag {
  method: "AES-128";
  uri: string;
  /** Raw IV attribute, including its "0x" prefix; null when the tag has none. */
  iv: string | null;
}

export interface MediaManifest {
  segmentUris: string[];
  encryption: EncryptionTag | null;
}

export interface VariantChoice {
  variant: Variant;
  /** e.g. "1080p" or "4K" */
  resolutionLabel: string;
  fellBack: boolean;
}

// ============================================================================
// Parsing
// ============================================================================

function parsePlaylist(content: string): ReturnType<typeof HLS.parse> {
  try {
    return HLS.parse(content);
  } catch (error) {
    throw new ManifestError(`Unparseable manifest: ${getErrorMessage(error)}`, undefined, {
      cause: error,
    });
  }
}

/**
 * Sorts variants by bandwidth, highest first. Equal bandwidths keep manifest order.
 */
export function sortVariants(variants: readonly Variant[]): Variant[] {
  return [...variants].sort((a, b) => b.bandwidth - a.bandwidth);
}

/**
 * Parses a master manifest into variants sorted by descending bandwidth.
 */
export function parseMasterManifest(content: string): Variant[] {
  const playlist = parsePlaylist(content);

  if (!("variants" in playlist)) {
    throw new ManifestError("Expected a master playlist but got a media playlist");
  }

  return sortVariants(
    playlist.variants.map((variant) => ({
      uri: variant.uri,
      bandwidth: variant.bandwidth,
      resolution: variant.resolution
        ? `${variant.resolution.width}x${variant.resolution.height}`
        : "",
      frameRate: variant.frameRate,
    }))
  );
}

function splitAttributes(raw: string): string[] {
  const parts: string[] = [];
  let current = "";
  let inQuotes = false;
  for (const ch of raw) {
    if (ch === '"') {
      inQuotes = !inQuotes;
    } else if (ch === "," && !inQuotes) {
      parts.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  if (current.length > 0) {
    parts.push(current);
  }
  return parts;
}

/**
 * Parses an HLS attribute list (`KEY=VALUE,KEY="VALUE"`).
 */
export function parseAttributes(raw: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const part of splitAttributes(raw)) {
    const idx = part.indexOf("=");
    if (idx === -1) continue;
    const key = part.slice(0, idx).trim();
    let value = part.slice(idx + 1).trim();
    if (value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    attrs[key] = value;
  }
  return attrs;
}

/**
 * Reads the first EXT-X-KEY tag. The IV is kept as text; hls-parser would
 * decode it and lose the prefix the decryptor strips.
 */
export function parseEncryptionTag(content: string): EncryptionTag | null {
  const line = content
    .split(/\r?\n/)
    .map((l) => l.trim())
    .find((l) => l.startsWith("#EXT-X-KEY:"));
  if (!line) return null;

  const attrs = parseAttributes(line.slice("#EXT-X-KEY:".length));
  const method = attrs.METHOD;

  if (method === undefined || method === "NONE") return null;
  if (method !== "AES-128") {
    throw new ManifestError(`Unsupported encryption method: ${method}`);
  }

  const uri = attrs.URI;
  if (!uri) {
    throw new ManifestError("Encryption tag has no key URI");
  }

  return { method, uri, iv: attrs.IV ?? null };
}

/**
 * Parses a media manifest. Segment enumeration stops at the first entry without a URI.
 */
export function parseMediaManifest(content: string): MediaManifest {
  const playlist = parsePlaylist(content);

  if ("variants" in playlist) {
    throw new ManifestError("Expected a media playlist but got a master playlist");
  }

  const segmentUris: string[] = [];
  for (const segment of playlist.segments) {
    if (!segment.uri) break;
    segmentUris.push(segment.uri);
  }

  return { segmentUris, encryption: parseEncryptionTag(content) };
}

// ============================================================================
// Selection
// ============================================================================

function nativeHeight(variant: Variant): string | undefined {
  const [, height] = variant.resolution.split("x");
  return height || undefined;
}

/**
 * Picks a variant for the wanted resolution tier.
 * The top tier takes the highest-bandwidth variant; other tiers match the
 * resolution suffix and step down the fallback chain.
 */
export function chooseVariant(sorted: readonly Variant[], wantRes: string): VariantChoice {
  if (wantRes === MAX_RESOLUTION) {
    const top = sorted[0];
    if (top) {
      const height = nativeHeight(top);
      return {
        variant: top,
        resolutionLabel: height ? formatResolution(height) : "source",
        fellBack: false,
      };
    }
  }

  let res: string | undefined = wantRes;
  while (res !== undefined) {
    const suffix = `x${res}`;
    const match = sorted.find((variant) => variant.resolution.endsWith(suffix));
    if (match) {
      return { variant: match, resolutionLabel: formatResolution(res), fellBack: res !== wantRes };
    }
    res = RESOLUTION_FALLBACK[res];
  }

  throw new SelectionError("No variant was chosen.");
}

/**
 * Reads the kbps figure from an audio variant URI such as `aac_256k_v1.m3u8`.
 */
export function extractBitrate(uri: string): string | null {
  return /\w+_(\d+)k_v\d+/.exec(uri)?.[1] ?? null;
}

// ============================================================================
// Resolver
// ============================================================================

export interface SingleSegment {
  segmentUrl: string;
  encryption: { keyUrl: string; iv: string | null } | null;
}

/**
 * Fetches and interprets manifests over HTTP.
 */
export class ManifestResolver {
  constructor(
    private readonly http: KyInstance,
    private readonly logger: Logger
  ) {}

  private async fetchText(url: string): Promise<string> {
    let response: Response;
    try {
      response = await this.http.get(url, {
        throwHttpErrors: false,
        headers: { Referer: PLAYER_REFERER },
      });
    } catch (error) {
      throw new ManifestError(`Failed to fetch manifest: ${getErrorMessage(error)}`, url, {
        cause: error,
      });
    }
    if (!response.ok) {
      throw new ManifestError(`Failed to fetch manifest: HTTP ${response.status}`, url);
    }
    return response.text();
  }

  async resolveMaster(url: string): Promise<Variant[]> {
    const variants = parseMasterManifest(await this.fetchText(url));
    this.logger.debug("Parsed master manifest", { variants: variants.length });
    return variants;
  }

  async resolveMedia(url: string): Promise<MediaManifest> {
    return parseMediaManifest(await this.fetchText(url));
  }

  /**
   * Lists absolute segment URLs, resolving relative entries against the media
   * playlist's directory and carrying the signed query onto each.
   */
  async resolveSegmentUrls(mediaUrl: string, query: string): Promise<string[]> {
    const { segmentUris } = await this.resolveMedia(mediaUrl);
    if (segmentUris.length === 0) {
      throw new ManifestError("Media playlist has no segments", mediaUrl);
    }
    const { baseUrl } = getManifestBase(mediaUrl);
    return segmentUris.map((uri) => resolveUrlWithParams(uri, baseUrl, query));
  }

  /**
   * Resolves a manifest-only track option to its top variant and reports its bitrate.
   */
  async resolveHlsOnlyOption(option: QualityOption): Promise<QualityOption> {
    const variants = await this.resolveMaster(option.url);
    const top = variants[0];
    if (!top) {
      throw new ManifestError("Master playlist has no variants", option.url);
    }

    const bitrate = extractBitrate(top.uri);
    if (bitrate === null) {
      throw new ManifestError("No bitrate found in manifest variant", top.uri);
    }

    const { baseUrl, query } = getManifestBase(option.url);
    return {
      ...option,
      specsLabel: `${bitrate} Kbps AAC`,
      url: resolveUrlWithParams(top.uri, baseUrl, query),
    };
  }

  /**
   * Resolves the first segment of a media playlist and its key, for single-segment tracks.
   */
  async resolveSingleSegment(mediaUrl: string): Promise<SingleSegment> {
    const { segmentUris, encryption } = await this.resolveMedia(mediaUrl);
    const first = segmentUris[0];
    if (!first) {
      throw new ManifestError("Media playlist has no segments", mediaUrl);
    }

    const { baseUrl, query } = getManifestBase(mediaUrl);
    return {
      segmentUrl: resolveUrlWithParams(first, baseUrl, query),
      encryption: encryption
        ? { keyUrl: resolveUrl(encryption.uri, baseUrl), iv: encryption.iv }
        : null,
    };
  }
}
