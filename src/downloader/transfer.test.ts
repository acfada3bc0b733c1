import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DownloadError } from "../shared/errors.js";
import { pathExists } from "../shared/fs.js";
import { createHttpClient } from "../shared/http.js";
import { createSilentLogger } from "../shared/logger.js";
import { bytesResponse, createFakeFetch, routeByUrl, type FakeHandler } from "../testing/fakeFetch.js";
import { ResumeStateStore } from "./resumeStore.js";
import type { DownloadProgress } from "./shared/types.js";
import {
  DISK_CHECK_FILE,
  TransferEngine,
  calculateChecksum,
  checkDiskSpace,
  checksumOf,
  totalSizeFrom,
} from "./transfer.js";

const SOURCE = "https://cdn.example.com/audio/track.flac16/01.flac?token=test-secret";
const encode = (text: string) => new TextEncoder().encode(text);

describe("TransferEngine", () => {
  let dir: string;
  let target: string;
  let temp: string;
  let store: ResumeStateStore;
  let sleeps: number[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tapevault-transfer-"));
    target = join(dir, "out", "01. Intro.flac");
    temp = `${target}.tmp`;
    store = new ResumeStateStore(join(dir, "state"));
    sleeps = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function engine(handler: FakeHandler, maxRetries = 3, diskCheck?: (dir: string) => Promise<void>) {
    const fake = createFakeFetch(handler);
    const transfer = new TransferEngine({
      http: createHttpClient({ fetch: fake.fetch }),
      store,
      logger: createSilentLogger(),
      maxRetries,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      diskCheck,
    });
    return { transfer, requests: fake.requests };
  }

  /** Honours `Range: bytes=4-` against an 8-byte resource. */
  const rangeAware: FakeHandler = (request) =>
    request.headers.get("range") === "bytes=4-"
      ? bytesResponse(encode("efgh"), 206, { "content-range": "bytes 4-7/8" })
      : bytesResponse(encode("abcdefgh"));

  describe("transfer", () => {
    it("downloads into place and leaves no temp file or state", async () => {
      const { transfer, requests } = engine(routeByUrl({ [SOURCE]: () => bytesResponse(encode("abcdefgh")) }));

      await transfer.transfer(target, SOURCE, 8, {
        expectedChecksum: "e8dc4081b13434b45189a720b77b6818",
      });

      expect(await readFile(target, "utf-8")).toBe("abcdefgh");
      expect(await pathExists(temp)).toBe(false);
      expect(await store.load(temp)).toBeNull();
      expect(requests[0]?.headers.get("range")).toBeNull();
      expect(requests[0]?.headers.get("referer")).toBe("https://play.nugs.net/");
    });

    it("reports progress ending at 100 percent", async () => {
      const updates: DownloadProgress[] = [];
      const { transfer } = engine(() => bytesResponse(encode("abcdefgh")));

      await transfer.transfer(target, SOURCE, 8, { onProgress: (p) => updates.push(p) });

      expect(updates.at(-1)).toMatchObject({ percent: 100, downloadedBytes: 8, totalBytes: 8 });
    });

    it("checks disk space when the server declares a large body", async () => {
      const checked: string[] = [];
      const { transfer, requests } = engine(
        () => bytesResponse(encode("abcdefgh"), 200, { "content-length": String(200 * 1024 * 1024) }),
        3,
        async (path) => {
          checked.push(path);
          throw new DownloadError("disk_space", `Not enough disk space in ${path}`);
        }
      );

      await expect(transfer.transfer(target, SOURCE)).rejects.toMatchObject({ type: "disk_space" });

      expect(checked).toEqual([join(dir, "out")]);
      expect(requests).toHaveLength(1);
      expect(await pathExists(temp)).toBe(false);
      expect(await pathExists(target)).toBe(false);
    });

    it("skips the disk space check for small bodies", async () => {
      const checked: string[] = [];
      const { transfer } = engine(
        () => bytesResponse(encode("abcdefgh")),
        3,
        async (path) => {
          checked.push(path);
        }
      );

      await transfer.transfer(target, SOURCE);

      expect(checked).toEqual([]);
      expect(await readFile(target, "utf-8")).toBe("abcdefgh");
    });

    it("rejects a body shorter than its declared length", async () => {
      const { transfer } = engine(() => bytesResponse(encode("abcdefgh"), 200, { "content-length": "10" }), 1);

      await expect(transfer.transfer(target, SOURCE)).rejects.toMatchObject({
        type: "corruption",
        message: "Size mismatch: expected 10 bytes, got 8",
      });
      expect(await pathExists(target)).toBe(false);
    });

    it("resumes from an existing temp file with a range request", async () => {
      await mkdir(join(dir, "out"), { recursive: true });
      await writeFile(temp, "abcd");
      const { transfer, requests } = engine(rangeAware);

      await transfer.transfer(target, SOURCE);

      expect(requests[0]?.headers.get("range")).toBe("bytes=4-");
      expect(await readFile(target, "utf-8")).toBe("abcdefgh");
    });

    it("resumes from a saved state", async () => {
      const { transfer, requests } = await withPartial("abcd", 4, rangeAware);

      await transfer.transfer(target, SOURCE, 8);

      expect(requests[0]?.headers.get("range")).toBe("bytes=4-");
      expect(await readFile(target, "utf-8")).toBe("abcdefgh");
      expect(await store.load(temp)).toBeNull();
    });

    it("continues after an interruption that outran the last state save", async () => {
      // Killed after writing "ef" but before the state recorded it.
      const { transfer, requests } = await withPartial("abcdef", 4, rangeAware);

      await transfer.transfer(target, SOURCE, 8);

      expect(requests).toHaveLength(1);
      expect(requests[0]?.headers.get("range")).toBe("bytes=4-");
      expect(await readFile(target, "utf-8")).toBe("abcdefgh");
      expect(await pathExists(temp)).toBe(false);
    });

    it("restarts from zero when the state records more than the temp file holds", async () => {
      const { transfer, requests } = await withPartial("abcd", 6, rangeAware);

      await transfer.transfer(target, SOURCE, 8);

      expect(requests[0]?.headers.get("range")).toBeNull();
      expect(await readFile(target, "utf-8")).toBe("abcdefgh");
    });

    it("sends the recorded ETag as If-Range", async () => {
      const { transfer, requests } = await withPartial("abcd", 4, rangeAware, '"v1"');

      await transfer.transfer(target, SOURCE, 8);

      expect(requests[0]?.headers.get("if-range")).toBe('"v1"');
      expect(await readFile(target, "utf-8")).toBe("abcdefgh");
    });

    it("starts over when the resource changed since the partial download", async () => {
      const changed: FakeHandler = (request) =>
        request.headers.get("range") === "bytes=4-"
          ? bytesResponse(encode("WXYZ"), 206, { "content-range": "bytes 4-7/8", etag: '"v2"' })
          : bytesResponse(encode("ABCDWXYZ"), 200, { etag: '"v2"' });
      const { transfer, requests } = await withPartial("abcd", 4, changed, '"v1"');

      await transfer.transfer(target, SOURCE, 8);

      expect(requests.map((r) => r.headers.get("range"))).toEqual(["bytes=4-", null]);
      expect(sleeps).toEqual([1000]);
      expect(await readFile(target, "utf-8")).toBe("ABCDWXYZ");
    });

    it("truncates the temp file when the server ignores the range", async () => {
      const { transfer, requests } = await withPartial("abcd", 4, () =>
        bytesResponse(encode("abcdefgh"))
      );

      await transfer.transfer(target, SOURCE);

      expect(requests[0]?.headers.get("range")).toBe("bytes=4-");
      expect(await readFile(target, "utf-8")).toBe("abcdefgh");
    });

    it("retries server errors with linear backoff", async () => {
      let calls = 0;
      const { transfer } = engine(() =>
        ++calls < 3 ? new Response("busy", { status: 503 }) : bytesResponse(encode("abcdefgh"))
      );

      await transfer.transfer(target, SOURCE, 8);

      expect(calls).toBe(3);
      expect(sleeps).toEqual([1000, 2000]);
      expect(await readFile(target, "utf-8")).toBe("abcdefgh");
    });

    it("does not retry a missing resource", async () => {
      const { transfer, requests } = engine(routeByUrl({}));

      const error: unknown = await transfer.transfer(target, SOURCE).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadError);
      expect(error).toMatchObject({ type: "network", retryable: false, message: `HTTP 404 for ${SOURCE}` });
      expect(requests).toHaveLength(1);
      expect(sleeps).toEqual([]);
    });

    it("treats a short body as corruption until the retry ceiling", async () => {
      const { transfer, requests } = engine(() => bytesResponse(encode("abcdef")));

      const error: unknown = await transfer.transfer(target, SOURCE, 10).catch((e: unknown) => e);

      expect(error).toMatchObject({
        type: "corruption",
        message: "Size mismatch: expected 10 bytes, got 6",
      });
      expect(requests).toHaveLength(3);
      expect(sleeps).toEqual([1000, 2000]);
      expect(await pathExists(target)).toBe(false);
      expect(await pathExists(temp)).toBe(false);
    });

    it("never leaves a partial file at the target when the body is cut off", async () => {
      const reset = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
      const { transfer, requests } = engine(() => new Response(cutOffBody("abc", reset)), 2);

      const error: unknown = await transfer.transfer(target, SOURCE).catch((e: unknown) => e);

      expect(error).toMatchObject({ type: "network" });
      expect(requests[1]?.headers.get("range")).toBe("bytes=3-");
      expect(sleeps).toEqual([1000]);
      expect(await pathExists(target)).toBe(false);
      expect(await pathExists(temp)).toBe(false);
      expect(await store.load(temp)).toBeNull();
    });

    it("discards the partial file on 416 and starts over", async () => {
      const { transfer, requests } = await withPartial("abcdefghij", 10, (request) =>
        request.headers.has("range")
          ? new Response(null, { status: 416 })
          : bytesResponse(encode("abcdefgh"))
      );

      await transfer.transfer(target, SOURCE);

      expect(requests.map((r) => r.headers.get("range"))).toEqual(["bytes=10-", null]);
      expect(sleeps).toEqual([1000]);
      expect(await readFile(target, "utf-8")).toBe("abcdefgh");
    });

    it("rejects a checksum mismatch", async () => {
      const { transfer } = engine(() => bytesResponse(encode("abcdefgh")), 1);

      const error: unknown = await transfer
        .transfer(target, SOURCE, 8, { expectedChecksum: "0".repeat(32) })
        .catch((e: unknown) => e);

      expect(error).toMatchObject({
        type: "corruption",
        message: `Checksum mismatch: expected ${"0".repeat(32)}, got e8dc4081b13434b45189a720b77b6818`,
      });
      expect(await pathExists(temp)).toBe(false);
    });
  });

  describe("transferLivestream", () => {
    const seg0 = "https://cdn.example.com/live/0.ts";
    const seg1 = "https://cdn.example.com/live/1.ts";
    const seg2 = "https://cdn.example.com/live/2.ts";
    const segments = [seg0, seg1, seg2];
    const routes = {
      [seg0]: () => bytesResponse(encode("aa")),
      [seg1]: () => bytesResponse(encode("bb")),
      [seg2]: () => bytesResponse(encode("cc")),
    };
    const manifest = "https://cdn.example.com/live/index.m3u8";

    it("appends segments in order and clears the state", async () => {
      const updates: DownloadProgress[] = [];
      const { transfer } = engine(routeByUrl(routes));

      await transfer.transferLivestream(target, segments, {
        sourceUrl: manifest,
        onProgress: (p) => updates.push(p),
      });

      expect(await readFile(target, "utf-8")).toBe("aabbcc");
      expect(await store.load(target)).toBeNull();
      expect(updates.map((u) => u.downloadedSegments)).toEqual([1, 2, 3]);
      expect(updates.at(-1)).toMatchObject({ percent: 100, totalSegments: 3, downloadedBytes: 6 });
    });

    it("continues at the first incomplete segment", async () => {
      await saveLivestreamState("aa", 1);
      const { transfer, requests } = engine(routeByUrl(routes));

      await transfer.transferLivestream(target, segments, { sourceUrl: manifest });

      expect(requests.map((r) => r.url)).toEqual([seg1, seg2]);
      expect(await readFile(target, "utf-8")).toBe("aabbcc");
    });

    it("keeps the file and state when a segment fails", async () => {
      const { transfer } = engine(routeByUrl({ [seg0]: () => bytesResponse(encode("aa")) }));

      await expect(
        transfer.transferLivestream(target, segments, { sourceUrl: manifest })
      ).rejects.toThrow(`HTTP 404 for ${seg1}`);

      expect(await readFile(target, "utf-8")).toBe("aa");
      const state = await store.load(target);
      expect(state?.downloadedSize).toBe(2);
      expect(state?.segments.map((s) => s.completed)).toEqual([true, false, false]);
      expect(state?.segments[0]?.checksum).toBe(checksumOf(encode("aa")));
    });

    it("retries a truncated segment", async () => {
      let calls = 0;
      const { transfer } = engine((request) => {
        if (request.url === seg1 && ++calls === 1) {
          return bytesResponse(encode("b"), 200, { "content-length": "2" });
        }
        return routeByUrl(routes)(request);
      });

      await transfer.transferLivestream(target, segments, { sourceUrl: manifest });

      expect(sleeps).toEqual([1000]);
      expect(await readFile(target, "utf-8")).toBe("aabbcc");
    });
  });

  async function withPartial(
    content: string,
    downloadedSize: number,
    handler: FakeHandler,
    etag = ""
  ) {
    await mkdir(join(dir, "out"), { recursive: true });
    await writeFile(temp, content);
    await store.save({ ...store.createInitialState(temp, SOURCE, 8), downloadedSize, etag });
    return engine(handler);
  }

  async function saveLivestreamState(content: string, completedCount: number) {
    await mkdir(join(dir, "out"), { recursive: true });
    await writeFile(target, content);
    await store.save({
      ...store.createInitialState(target, "https://cdn.example.com/live/index.m3u8", 0),
      downloadedSize: encode(content).length,
      segments: [0, 1, 2].map((index) => ({
        index,
        url: `https://cdn.example.com/live/${index}.ts`,
        size: index < completedCount ? 2 : 0,
        checksum: "",
        completed: index < completedCount,
      })),
    });
  }
});

/** Delivers `prefix`, then fails the stream. */
function cutOffBody(prefix: string, error: Error): ReadableStream<Uint8Array> {
  let sent = false;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (sent) {
        controller.error(error);
        return;
      }
      sent = true;
      controller.enqueue(encode(prefix));
    },
  });
}

describe("checkDiskSpace", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tapevault-disk-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("removes its test file", async () => {
    await checkDiskSpace(dir);
    expect(await pathExists(join(dir, DISK_CHECK_FILE))).toBe(false);
  });

  it("reports an unwritable location as a disk-space error", async () => {
    const notADir = join(dir, "file");
    await writeFile(notADir, "x");

    await expect(checkDiskSpace(notADir)).rejects.toMatchObject({ type: "disk_space", retryable: false });
  });
});

describe("checksums", () => {
  it("hashes a known byte sequence", () => {
    expect(checksumOf(encode("test data for checksum"))).toBe("a16de13eaa4650a7827e619b6db9fcb7");
  });

  it("hashes a file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "tapevault-md5-"));
    const path = join(dir, "data.bin");
    await writeFile(path, "test data for checksum");

    expect(await calculateChecksum(path)).toBe("a16de13eaa4650a7827e619b6db9fcb7");
    await rm(dir, { recursive: true, force: true });
  });
});

describe("totalSizeFrom", () => {
  it("prefers the Content-Range total", () => {
    expect(totalSizeFrom(new Headers({ "content-range": "bytes 4-7/8", "content-length": "4" }), 4)).toBe(8);
  });

  it("adds Content-Length to the offset", () => {
    expect(totalSizeFrom(new Headers({ "content-length": "4" }), 4)).toBe(8);
  });

  it("returns 0 when the size is unknown", () => {
    expect(totalSizeFrom(new Headers(), 0)).toBe(0);
  });
});
