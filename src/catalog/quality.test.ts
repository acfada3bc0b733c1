import { describe, expect, it } from "vitest";
import type { AudioFormat, VideoFormat } from "../config/schema.js";
import { createSilentLogger, type Logger } from "../shared/logger.js";
import {
  FALLBACK_CHAIN,
  buildQualityOptions,
  fallbackPath,
  formatResolution,
  isManifestOnly,
  matchQuality,
  selectAudioQuality,
  videoResolutionFor,
  type QualityOption,
} from "./quality.js";

const CDN = "https://cdn.example.com/tracks";

function option(formatId: QualityOption["formatId"], url = `${CDN}/${formatId}`): QualityOption {
  return { url, formatId, containerExt: ".flac", specsLabel: "" };
}

function recordingLogger(): { logger: Logger; warnings: string[] } {
  const warnings: string[] = [];
  const logger: Logger = {
    ...createSilentLogger(),
    warn: (message, context) => warnings.push(`${message} ${String(context?.url)}`),
  };
  return { logger, warnings };
}

describe("matchQuality", () => {
  it.each([
    [`${CDN}/x.alac16/a.m4a`, 1, ".m4a", "16-bit / 44.1 kHz ALAC"],
    [`${CDN}/x.flac16/a.flac`, 2, ".flac", "16-bit / 44.1 kHz FLAC"],
    [`${CDN}/x.mqa24/a.flac`, 3, ".flac", "24-bit / 48 kHz MQA"],
    [`${CDN}/a.flac?token=1`, 2, ".flac", "FLAC"],
    [`${CDN}/x.s360/a.mp4`, 4, ".mp4", "360 Reality Audio"],
    [`${CDN}/x.aac150/a.m4a`, 5, ".m4a", "150 Kbps AAC"],
    [`${CDN}/a.m4a?token=1`, 5, ".m4a", "AAC"],
    [`${CDN}/master.m3u8?token=1`, 6, ".m4a", ""],
  ])("recognises %s", (url, formatId, containerExt, specsLabel) => {
    expect(matchQuality(url)).toEqual({ url, formatId, containerExt, specsLabel });
  });

  it("prefers the earlier signature when several match", () => {
    expect(matchQuality(`${CDN}/x.flac16/a.flac?token=1`)?.specsLabel).toBe("16-bit / 44.1 kHz FLAC");
  });
});

describe("buildQualityOptions", () => {
  it("drops unknown profiles with a warning", () => {
    const { logger, warnings } = recordingLogger();

    const options = buildQualityOptions(
      [`${CDN}/x.flac16/a.flac`, `${CDN}/x.opus96/a.ogg`, `${CDN}/a.m4a?t=1`],
      logger
    );

    expect(options.map((o) => o.formatId)).toEqual([2, 5]);
    expect(warnings).toEqual([`API returned unsupported format ${CDN}/x.opus96/a.ogg`]);
  });
});

describe("isManifestOnly", () => {
  it("is true when every option is a manifest", () => {
    expect(isManifestOnly([option(6, `${CDN}/a.m3u8?t=1`), option(6, `${CDN}/b.m3u8?t=2`)])).toBe(
      true
    );
  });

  it("is false when a single option is not a manifest", () => {
    expect(
      isManifestOnly([
        option(6, `${CDN}/a.m3u8?t=1`),
        option(6, `${CDN}/b.m3u8?t=2`),
        option(2, `${CDN}/c.flac?t=3`),
      ])
    ).toBe(false);
  });
});

describe("FALLBACK_CHAIN", () => {
  const formats: AudioFormat[] = [1, 2, 3, 4, 5];

  it("terminates without cycles within four steps from every format", () => {
    for (const start of formats) {
      const path = fallbackPath(start);
      expect(new Set(path).size).toBe(path.length);
      expect(path.length - 1).toBeLessThanOrEqual(4);
      expect(path[path.length - 1]).toBe(5);
    }
  });

  it("walks from spatial audio through every lossless tier to AAC", () => {
    expect(fallbackPath(4)).toEqual([4, 3, 2, 5]);
    expect(FALLBACK_CHAIN[5]).toBeNull();
  });
});

describe("selectAudioQuality", () => {
  it("falls back from ALAC to FLAC", () => {
    const flac = option(2);
    const selection = selectAudioQuality([flac, option(5)], 1);

    expect(selection).toEqual({
      option: flac,
      requestedFormat: 1,
      selectedFormat: 2,
      fellBack: true,
      shouldNotify: true,
    });
  });

  it("takes an exact match without a notice", () => {
    const selection = selectAudioQuality([option(2), option(5)], 5);
    expect(selection?.selectedFormat).toBe(5);
    expect(selection?.shouldNotify).toBe(false);
  });

  it("substitutes silently for spatial audio", () => {
    const selection = selectAudioQuality([option(5)], 4);
    expect(selection?.selectedFormat).toBe(5);
    expect(selection?.fellBack).toBe(true);
    expect(selection?.shouldNotify).toBe(false);
  });

  it("returns null when the chain is exhausted", () => {
    expect(selectAudioQuality([option(1), option(3)], 2)).toBeNull();
    expect(selectAudioQuality([], 1)).toBeNull();
  });
});

describe("video resolution", () => {
  it("maps video formats to tiers", () => {
    const formats: VideoFormat[] = [1, 2, 3, 4, 5];
    expect(formats.map((f) => videoResolutionFor(f))).toEqual([
      "480",
      "720",
      "1080",
      "1440",
      "2160",
    ]);
  });

  it("labels 2160 as 4K", () => {
    expect(formatResolution("2160")).toBe("4K");
    expect(formatResolution("720")).toBe("720p");
  });
});
