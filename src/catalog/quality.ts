/**
 * Quality catalog and negotiation.
 *
 * The stream API hands back opaque URLs; the encoding is recognised from a
 * marker in the URL path. Negotiation then walks a fixed fallback chain from
 * the user's preferred format until an offered option matches.
 */
import { AUDIO_FORMAT, type AudioFormat, type VideoFormat } from "../config/schema.js";
import type { Logger } from "../shared/logger.js";

// ============================================================================
// Quality Options
// ============================================================================

/** Format id of an HLS manifest; never requested directly. */
export const MANIFEST_FORMAT = 6;

export type QualityFormatId = AudioFormat | typeof MANIFEST_FORMAT;

export interface QualityOption {
  url: string;
  formatId: QualityFormatId;
  /** Extension of the final file, including the dot. */
  containerExt: string;
  /** Human-readable encoding, e.g. "16-bit / 44.1 kHz FLAC". Empty until resolved for manifests. */
  specsLabel: string;
}

export const MANIFEST_MARKER = ".m3u8?";

/**
 * Checked in order; the first marker contained in the URL decides the option.
 */
export const QUALITY_SIGNATURES: readonly {
  marker: string;
  formatId: QualityFormatId;
  containerExt: string;
  specsLabel: string;
}[] = [
  { marker: ".alac16/", formatId: 1, containerExt: ".m4a", specsLabel: "16-bit / 44.1 kHz ALAC" },
  { marker: ".flac16/", formatId: 2, containerExt: ".flac", specsLabel: "16-bit / 44.1 kHz FLAC" },
  { marker: ".mqa24/", formatId: 3, containerExt: ".flac", specsLabel: "24-bit / 48 kHz MQA" },
  { marker: ".flac?", formatId: 2, containerExt: ".flac", specsLabel: "FLAC" },
  { marker: ".s360/", formatId: 4, containerExt: ".mp4", specsLabel: "360 Reality Audio" },
  { marker: ".aac150/", formatId: 5, containerExt: ".m4a", specsLabel: "150 Kbps AAC" },
  { marker: ".m4a?", formatId: 5, containerExt: ".m4a", specsLabel: "AAC" },
  { marker: MANIFEST_MARKER, formatId: MANIFEST_FORMAT, containerExt: ".m4a", specsLabel: "" },
];

/**
 * Recognises a single stream URL, or returns null for an unknown profile.
 */
export function matchQuality(url: string): QualityOption | null {
  const signature = QUALITY_SIGNATURES.find(({ marker }) => url.includes(marker));
  if (!signature) return null;
  return {
    url,
    formatId: signature.formatId,
    containerExt: signature.containerExt,
    specsLabel: signature.specsLabel,
  };
}

/**
 * Builds the option set for one track. Unrecognised URLs are dropped with a warning.
 */
export function buildQualityOptions(
  candidateUrls: readonly string[],
  logger?: Logger
): QualityOption[] {
  const options: QualityOption[] = [];
  for (const url of candidateUrls) {
    const option = matchQuality(url);
    if (option) {
      options.push(option);
    } else {
      logger?.warn("API returned unsupported format", { url });
    }
  }
  return options;
}

/**
 * True when every option is an HLS manifest, so the track must be assembled from segments.
 */
export function isManifestOnly(options: readonly QualityOption[]): boolean {
  return options.every((option) => option.url.includes(MANIFEST_MARKER));
}

// ============================================================================
// Audio Negotiation
// ============================================================================

/**
 * Next format to try when one is unavailable. AAC is the end of every chain.
 */
export const FALLBACK_CHAIN: Readonly<Record<AudioFormat, AudioFormat | null>> = {
  1: AUDIO_FORMAT.flac,
  2: AUDIO_FORMAT.aac,
  3: AUDIO_FORMAT.flac,
  4: AUDIO_FORMAT.mqa,
  5: null,
};

/**
 * Formats tried, in order, for a given preference.
 */
export function fallbackPath(start: AudioFormat): AudioFormat[] {
  const path: AudioFormat[] = [];
  let current: AudioFormat | null = start;
  while (current !== null && !path.includes(current)) {
    path.push(current);
    current = FALLBACK_CHAIN[current];
  }
  return path;
}

export interface QualitySelection {
  option: QualityOption;
  requestedFormat: AudioFormat;
  selectedFormat: AudioFormat;
  fellBack: boolean;
  /** Whether the user should be told the preferred format was unavailable. */
  shouldNotify: boolean;
}

/**
 * Picks the option for the preferred format, falling back along the chain.
 * Returns null when the chain is exhausted.
 */
export function selectAudioQuality(
  options: readonly QualityOption[],
  desired: AudioFormat
): QualitySelection | null {
  for (const format of fallbackPath(desired)) {
    const option = options.find((candidate) => candidate.formatId === format);
    if (option) {
      const fellBack = format !== desired;
      return {
        option,
        requestedFormat: desired,
        selectedFormat: format,
        fellBack,
        // Spatial audio availability varies; substitutions for it stay silent.
        shouldNotify: fellBack && desired !== AUDIO_FORMAT.spatial,
      };
    }
  }
  return null;
}

// ============================================================================
// Video Resolution
// ============================================================================

export const VIDEO_RESOLUTION: Readonly<Record<VideoFormat, string>> = {
  1: "480",
  2: "720",
  3: "1080",
  4: "1440",
  5: "2160",
};

/** The highest tier; it always takes the top variant. */
export const MAX_RESOLUTION = "2160";

export const RESOLUTION_FALLBACK: Readonly<Record<string, string>> = {
  "1440": "1080",
  "1080": "720",
  "720": "480",
};

export function videoResolutionFor(format: VideoFormat): string {
  return VIDEO_RESOLUTION[format];
}

/**
 * Display label for a resolution tier.
 */
export function formatResolution(resolution: string): string {
  return resolution === MAX_RESOLUTION ? "4K" : `${resolution}p`;
}
