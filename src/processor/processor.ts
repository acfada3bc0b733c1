/**
 * Turns catalog references into files on disk.
 *
 * Items are processed strictly one after another. A failing track, artist
 * release or input URL is logged with its context and the batch moves on;
 * albums and playlists with failed tracks report a `BatchFailureError` once
 * every track has been tried.
 */
import { extname, join } from "node:path";
import type { KyInstance } from "ky";
import type { CatalogService } from "../api/client.js";
import type { Container, Track } from "../api/schemas.js";
import { type MediaReference, assertNever, classifyUrl, describeMediaKind } from "../catalog/classifier.js";
import {
  type QualityOption,
  buildQualityOptions,
  isManifestOnly,
  selectAudioQuality,
} from "../catalog/quality.js";
import type { Settings } from "../config/settings.js";
import { decryptSegment, fetchKey, parseIv } from "../downloader/hls/decrypt.js";
import { type ManifestResolver, chooseVariant } from "../downloader/hls/manifest.js";
import { type BatchResult, BatchQueue } from "../downloader/queue.js";
import type { Finalizer } from "../downloader/shared/ffmpeg.js";
import type { DownloadPhase, ProgressCallback, TrackMetadata } from "../downloader/shared/types.js";
import type { TransferEngine } from "../downloader/transfer.js";
import {
  BatchFailureError,
  DownloadError,
  ManifestError,
  SelectionError,
  getErrorMessage,
} from "../shared/errors.js";
import { ensureDir, pathExists, readFile, removeFile, siblingPath } from "../shared/fs.js";
import type { Logger } from "../shared/logger.js";
import { getManifestBase, getQueryParam, resolveUrlWithParams } from "../shared/url.js";
import {
  MAX_FOLDER_NAME_LENGTH,
  MAX_VIDEO_NAME_LENGTH,
  findLivestreamSku,
  findVideoSku,
  releaseName,
  sanitise,
  trackFileName,
  truncateName,
  videoFileBase,
} from "./naming.js";

// ============================================================================
// Types
// ============================================================================

/** Delivery platforms asked for a track; each may offer a different encoding. */
export const TRACK_PLATFORM_IDS = [1, 4, 7, 10] as const;

export type MediaTransfer = Pick<TransferEngine, "transfer" | "transferLivestream">;
export type MediaFinalizer = Pick<Finalizer, "mux" | "readDuration" | "writeChapters">;

export type ProcessorSettings = Pick<
  Settings,
  "format" | "wantRes" | "outPath" | "skipVideos" | "forceVideo" | "skipChapters" | "tagAudio"
>;

/**
 * Hooks for the terminal UI around each file transfer.
 */
export interface ProcessorEvents {
  transferStarted?: ((label: string) => void) | undefined;
  progress?: ProgressCallback | undefined;
  transferFinished?: (() => void) | undefined;
}

export interface ProcessorOptions {
  catalog: CatalogService;
  resolver: ManifestResolver;
  transfer: MediaTransfer;
  finalizer: MediaFinalizer;
  /** Client for key requests. */
  http: KyInstance;
  logger: Logger;
  settings: ProcessorSettings;
  events?: ProcessorEvents | undefined;
  /** Checked before each item; once false, the remaining items are skipped. */
  shouldContinue?: (() => boolean) | undefined;
}

export interface RunSummary extends BatchResult {
  /** Inputs that matched no catalog URL pattern. */
  invalid: string[];
}

interface VideoOptions {
  livestream: boolean;
  /** Purchased shows resolve their manifest through the user's uguid. */
  purchased?: boolean | undefined;
  meta?: Container | undefined;
}

interface TrackContext {
  folder: string;
  trackNumber: number;
  trackTotal: number;
  album: string;
  artist: string;
}

function describeFailure(error: unknown): string {
  return error instanceof DownloadError ? error.describe() : getErrorMessage(error);
}

// ============================================================================
// Processor
// ============================================================================

export class Processor {
  private readonly catalog: CatalogService;
  private readonly resolver: ManifestResolver;
  private readonly transfer: MediaTransfer;
  private readonly finalizer: MediaFinalizer;
  private readonly http: KyInstance;
  private readonly logger: Logger;
  private readonly settings: ProcessorSettings;
  private readonly events: ProcessorEvents;
  private readonly shouldContinue: () => boolean;

  constructor(options: ProcessorOptions) {
    this.catalog = options.catalog;
    this.resolver = options.resolver;
    this.transfer = options.transfer;
    this.finalizer = options.finalizer;
    this.http = options.http;
    this.logger = options.logger;
    this.settings = options.settings;
    this.events = options.events ?? {};
    this.shouldContinue = options.shouldContinue ?? (() => true);
  }

  /**
   * Processes every input URL in order and summarises the run.
   */
  async run(urls: readonly string[]): Promise<RunSummary> {
    const invalid: string[] = [];
    const queue = new BatchQueue<{ url: string; ref: MediaReference }>({
      onItemFailed: (id, error) => {
        this.logger.error("Item failed", { url: id, error: describeFailure(error) });
      },
    });

    urls.forEach((url) => {
      const ref = classifyUrl(url);
      if (ref) {
        queue.add(url, { url, ref });
      } else {
        this.logger.warn("Invalid URL", { url });
        invalid.push(url);
      }
    });

    let position = 0;
    const total = urls.length - invalid.length;
    const result = await queue.process(
      async ({ ref }) => {
        position++;
        this.logger.info(`Item ${position} of ${total}: ${describeMediaKind(ref.kind)} ${ref.itemId}`);
        await this.processReference(ref);
      },
      { shouldContinue: this.shouldContinue }
    );

    return { ...result, invalid };
  }

  async processReference(ref: MediaReference): Promise<void> {
    switch (ref.kind) {
      case "album":
        return this.processAlbum(ref.itemId);
      case "userPlaylist":
        return this.processPlaylist(ref.itemId, { catalog: false });
      case "catalogPlaylist":
        return this.processCatalogPlaylist(ref.itemId);
      case "video":
        return this.processVideo(ref.itemId, { livestream: false });
      case "artist":
        return this.processArtist(ref.itemId);
      case "exclusiveLivestream":
      case "webcast":
        return this.processVideo(ref.itemId, { livestream: true });
      case "purchasedLivestream":
        return this.processPurchasedLivestream(ref.itemId);
      default:
        return assertNever(ref.kind);
    }
  }

  // --------------------------------------------------------------------------
  // Releases
  // --------------------------------------------------------------------------

  async processAlbum(albumId: string): Promise<void> {
    const meta = await this.catalog.getAlbumMeta(albumId);
    await this.processRelease(meta, meta.tracks);
  }

  /**
   * `tracks` is passed separately: artist listings carry them as `songs`.
   */
  private async processRelease(meta: Container, tracks: readonly Track[]): Promise<void> {
    const videoSku = findVideoSku(meta.products);
    if (videoSku === null && tracks.length === 0) {
      throw new Error("Release has no tracks or videos");
    }

    if (videoSku !== null) {
      if (this.settings.skipVideos) {
        this.logger.info("Video-only album, skipped.");
        return;
      }
      if (this.settings.forceVideo || tracks.length === 0) {
        return this.processVideo(String(meta.containerId), { livestream: false, meta });
      }
    }

    const name = releaseName(meta);
    this.logger.info(name);
    const folder = await this.makeFolder(name, "Album");

    await this.processTracks(name, tracks, {
      folder,
      album: meta.containerInfo.trimEnd(),
      artist: meta.artistName,
    });
  }

  async processArtist(artistId: string): Promise<void> {
    const containers = await this.catalog.getArtistMeta(artistId);
    const first = containers[0];
    if (!first) {
      throw new Error("The API didn't return any artist metadata");
    }
    this.logger.info(first.artistName);

    const queue = new BatchQueue<Container>({
      onItemFailed: (id, error) => {
        this.logger.error("Artist item failed", {
          artist_id: artistId,
          container_id: id,
          error: describeFailure(error),
        });
      },
    });
    queue.addAll(containers.map((container) => ({ id: String(container.containerId), data: container })));

    let position = 0;
    const result = await queue.process(
      async (container) => {
        position++;
        this.logger.info(`Item ${position} of ${containers.length}:`);
        // Artist listings lack video products, so full metadata is needed unless videos are skipped.
        if (this.settings.skipVideos) {
          await this.processRelease(container, container.songs);
        } else {
          await this.processAlbum(String(container.containerId));
        }
      },
      { shouldContinue: this.shouldContinue }
    );

    if (result.failed > 0) {
      throw new BatchFailureError(`artist ${first.artistName}`, result.errors);
    }
  }

  async processPlaylist(playlistId: string, options: { catalog: boolean }): Promise<void> {
    const playlist = await this.catalog.getPlaylistMeta(playlistId, options);
    this.logger.info(playlist.playListName);
    const folder = await this.makeFolder(playlist.playListName, "Playlist");

    await this.processTracks(
      playlist.playListName,
      playlist.items.map((item) => item.track),
      { folder, album: playlist.playListName, artist: "" }
    );
  }

  async processCatalogPlaylist(shortUrl: string): Promise<void> {
    const playlistId = await this.catalog.resolveCatalogPlaylistId(shortUrl);
    await this.processPlaylist(playlistId, { catalog: true });
  }

  async processPurchasedLivestream(query: string): Promise<void> {
    const showId = getQueryParam(query, "showID");
    if (!showId) {
      throw new Error("URL didn't contain a showID parameter");
    }
    await this.processVideo(showId, { livestream: true, purchased: true });
  }

  private async makeFolder(name: string, kind: "Album" | "Playlist"): Promise<string> {
    const { name: folderName, truncated } = truncateName(name, MAX_FOLDER_NAME_LENGTH);
    if (truncated) {
      this.logger.info(`${kind} folder name was chopped because it exceeds ${MAX_FOLDER_NAME_LENGTH} characters.`);
    }
    const folder = join(this.settings.outPath, sanitise(folderName));
    await ensureDir(folder);
    return folder;
  }

  private async processTracks(
    label: string,
    tracks: readonly Track[],
    context: Omit<TrackContext, "trackNumber" | "trackTotal">
  ): Promise<void> {
    const queue = new BatchQueue<{ track: Track; trackNumber: number }>({
      onItemFailed: (id, error) => {
        this.logger.error("Track download failed", {
          collection: label,
          track_num: id,
          total: tracks.length,
          error: describeFailure(error),
        });
      },
    });
    queue.addAll(
      tracks.map((track, i) => ({ id: String(i + 1), data: { track, trackNumber: i + 1 } }))
    );

    const result = await queue.process(
      ({ track, trackNumber }) =>
        this.processTrack(track, { ...context, trackNumber, trackTotal: tracks.length }),
      { shouldContinue: this.shouldContinue }
    );

    if (result.failed > 0) {
      throw new BatchFailureError(label, result.errors);
    }
  }

  // --------------------------------------------------------------------------
  // Tracks
  // --------------------------------------------------------------------------

  /**
   * Asks every delivery platform for the track, since the offered formats
   * differ between them, then downloads the negotiated option.
   */
  private async processTrack(track: Track, context: TrackContext): Promise<void> {
    const candidates: string[] = [];
    for (const platformId of TRACK_PLATFORM_IDS) {
      const url = await this.catalog.getStreamUrl({ kind: "track", trackId: track.trackId, platformId });
      if (!url) {
        throw new Error("The API didn't return a track stream URL");
      }
      candidates.push(url);
    }

    const options = buildQualityOptions(candidates, this.logger);
    const first = options[0];
    if (!first) {
      throw new Error("The API didn't return any formats");
    }

    const manifestOnly = isManifestOnly(options);
    let option: QualityOption;
    if (manifestOnly) {
      this.logger.info("HLS-only track. Only AAC is available.");
      option = await this.resolver.resolveHlsOnlyOption(first);
    } else {
      const selection = selectAudioQuality(options, this.settings.format);
      if (!selection) {
        throw new SelectionError("No track format was chosen.");
      }
      if (selection.shouldNotify) {
        this.logger.info("Unavailable in your chosen format.");
      }
      option = selection.option;
    }

    const trackPath = join(
      context.folder,
      trackFileName(context.trackNumber, track.songTitle, option.containerExt)
    );
    if (await pathExists(trackPath)) {
      this.logger.info("Track already exists locally.");
      return;
    }

    this.logger.info(
      `Downloading track ${context.trackNumber} of ${context.trackTotal}: ${track.songTitle} - ${option.specsLabel}`
    );

    const metadata: TrackMetadata = {
      title: track.songTitle,
      artist: context.artist,
      album: context.album,
      trackNumber: context.trackNumber,
    };

    await this.withTransferEvents(track.songTitle, async () => {
      if (manifestOnly) {
        await this.downloadHlsOnlyTrack(trackPath, option.url, metadata);
      } else if (this.settings.tagAudio) {
        await this.downloadTaggedTrack(trackPath, option.url, metadata);
      } else {
        await this.transfer.transfer(trackPath, option.url, 0, { onProgress: this.events.progress });
      }
    });
  }

  /**
   * Single-segment HLS track: fetch the ciphertext, decrypt it in memory and
   * remux it with tags into the final container.
   */
  private async downloadHlsOnlyTrack(
    trackPath: string,
    mediaUrl: string,
    metadata: TrackMetadata
  ): Promise<void> {
    const { segmentUrl, encryption } = await this.resolver.resolveSingleSegment(mediaUrl);
    const encryptedPath = siblingPath(trackPath, ".enc.ts");

    let plaintext: Buffer;
    try {
      await this.transfer.transfer(encryptedPath, segmentUrl, 0, { onProgress: this.events.progress });
      const ciphertext = await readFile(encryptedPath);

      if (encryption) {
        if (encryption.iv === null) {
          throw new ManifestError("Encrypted segment has no IV", mediaUrl);
        }
        this.reportPhase("decrypting");
        const key = await fetchKey(this.http, encryption.keyUrl);
        plaintext = decryptSegment(ciphertext, key, parseIv(encryption.iv));
      } else {
        plaintext = ciphertext;
      }
    } finally {
      await removeFile(encryptedPath);
    }

    this.reportPhase("muxing");
    await this.finalizer.mux({ source: plaintext, outputPath: trackPath, metadata });
  }

  private async downloadTaggedTrack(
    trackPath: string,
    url: string,
    metadata: TrackMetadata
  ): Promise<void> {
    const untaggedPath = siblingPath(trackPath, `.untagged${extname(trackPath)}`);
    try {
      await this.transfer.transfer(untaggedPath, url, 0, { onProgress: this.events.progress });
      this.reportPhase("muxing");
      await this.finalizer.mux({ source: untaggedPath, outputPath: trackPath, metadata });
    } finally {
      await removeFile(untaggedPath);
    }
  }

  // --------------------------------------------------------------------------
  // Videos
  // --------------------------------------------------------------------------

  async processVideo(videoId: string, options: VideoOptions): Promise<void> {
    const meta = options.meta ?? (await this.catalog.getAlbumMeta(videoId));
    const chapters = this.settings.skipChapters ? [] : meta.videoChapters;

    const fullName = releaseName(meta);
    this.logger.info(fullName);
    const { name, truncated } = truncateName(fullName, MAX_VIDEO_NAME_LENGTH);
    if (truncated) {
      this.logger.info(`Video filename was chopped because it exceeds ${MAX_VIDEO_NAME_LENGTH} characters.`);
    }

    const sku = options.livestream
      ? findLivestreamSku(meta.productFormatList)
      : findVideoSku(meta.products);
    if (sku === null) {
      throw new Error("No video available");
    }

    const manifestUrl = options.purchased
      ? await this.catalog.getPurchasedManifestUrl(sku, videoId)
      : await this.catalog.getStreamUrl({ kind: "container", containerId: meta.containerId, skuId: sku });
    if (!manifestUrl) {
      throw new Error("The API didn't return a video manifest URL");
    }

    const variants = await this.resolver.resolveMaster(manifestUrl);
    const { variant, resolutionLabel } = chooseVariant(variants, this.settings.wantRes);

    const basePath = join(this.settings.outPath, videoFileBase(name, resolutionLabel));
    const tsPath = `${basePath}.ts`;
    const mp4Path = `${basePath}.mp4`;
    if (await pathExists(mp4Path)) {
      this.logger.info("Video already exists locally.");
      return;
    }

    const { baseUrl, query } = getManifestBase(manifestUrl);
    const mediaUrl = resolveUrlWithParams(variant.uri, baseUrl, query);
    const segmentUrls = await this.resolver.resolveSegmentUrls(mediaUrl, query);

    // Video-on-demand playlists list byte ranges of one file; livestreams list distinct files.
    const [firstSegment, secondSegment] = segmentUrls;
    const livestream = secondSegment !== undefined && firstSegment !== secondSegment;

    const fps = !livestream && variant.frameRate ? `${variant.frameRate.toFixed(3)} FPS, ` : "";
    this.logger.info(
      `${fps}${Math.floor(variant.bandwidth / 1000)} Kbps, ${resolutionLabel} (${variant.resolution})`
    );

    await this.withTransferEvents(name, async () => {
      if (livestream) {
        await this.transfer.transferLivestream(tsPath, segmentUrls, {
          sourceUrl: mediaUrl,
          onProgress: this.events.progress,
        });
      } else if (firstSegment) {
        await this.transfer.transfer(tsPath, firstSegment, 0, { onProgress: this.events.progress });
      }
    });

    const chaptersPath = `${basePath}.chapters.txt`;
    const withChapters = chapters.length > 0;
    try {
      if (withChapters) {
        const duration = await this.finalizer.readDuration(tsPath);
        await this.finalizer.writeChapters(chapters, duration, chaptersPath);
      }

      this.logger.info("Putting into MP4 container...");
      await this.finalizer.mux({
        source: tsPath,
        outputPath: mp4Path,
        chaptersPath: withChapters ? chaptersPath : undefined,
      });
    } finally {
      if (withChapters) {
        await removeFile(chaptersPath);
      }
    }

    await removeFile(tsPath);
  }

  /** Post-download steps have no byte count; the bar stays full and shows the phase. */
  private reportPhase(phase: Exclude<DownloadPhase, "downloading">): void {
    this.events.progress?.({ percent: 100, phase });
  }

  private async withTransferEvents(label: string, run: () => Promise<void>): Promise<void> {
    this.events.transferStarted?.(label);
    try {
      await run();
    } finally {
      this.events.transferFinished?.();
    }
  }
}
