import { describe, expect, it } from "vitest";
import { ApiError } from "../shared/errors.js";
import { createHttpClient } from "../shared/http.js";
import { createSilentLogger } from "../shared/logger.js";
import { type FakeHandler, createFakeFetch, jsonResponse } from "../testing/fakeFetch.js";
import { APP_USER_AGENT, ApiClient, MAX_REDIRECTS, PLAYER_USER_AGENT } from "./client.js";
import { SessionError } from "./session.js";

const jwt = `header.${Buffer.from(
  JSON.stringify({ legacyToken: "test-legacy-token", legacyUguid: "test-uguid" })
).toString("base64url")}.signature`;

const subscriptionBody = {
  legacySubscriptionId: "sub-123",
  plan: { description: "Premium Plan", planId: "plan-456" },
  promo: null,
  startedAt: "01/01/2024 00:00:00",
  endsAt: "12/31/2024 23:59:59",
  isContentAccessible: true,
  productFormatList: null,
};

const container = {
  artistName: "The Band",
  containerInfo: "2024-06-01 Red Rocks ",
  containerId: 23329,
  containerTypeStr: "Show",
  availabilityTypeStr: "AVAILABLE",
  tracks: [
    { trackId: 1, songTitle: "Intro" },
    { trackId: 2, songTitle: "Jam" },
  ],
  songs: null,
  products: [{ formatStr: "VIDEO ON DEMAND", skuId: 777 }],
  productFormatList: null,
  videoChapters: [{ chapterSeconds: 12.5, chaptername: "Set One" }],
};

/**
 * Answers the identity endpoints and delegates everything else.
 */
function withIdentity(next: FakeHandler = () => new Response("not found", { status: 404 })): FakeHandler {
  return (request) => {
    const url = new URL(request.url);
    if (url.href === "https://id.nugs.net/connect/token") return jsonResponse({ access_token: jwt });
    if (url.href === "https://id.nugs.net/connect/userinfo") return jsonResponse({ sub: "user-1" });
    if (url.href === "https://subscriptions.nugs.net/api/v1/me/subscriptions") {
      return jsonResponse(subscriptionBody);
    }
    return next(request);
  };
}

function createClient(handler: FakeHandler, overrides: { clientId?: string; developerKey?: string } = {}) {
  const fake = createFakeFetch(handler);
  const client = new ApiClient({
    http: createHttpClient({ fetch: fake.fetch }),
    logger: createSilentLogger(),
    clientId: overrides.clientId ?? "test-client",
    developerKey: overrides.developerKey ?? "test-dev-key",
  });
  return { client, requests: fake.requests };
}

function paramsOf(request: Request | undefined): Record<string, string> {
  return Object.fromEntries(new URL(request?.url ?? "http://invalid").searchParams);
}

const credentials = { email: "fan@example.com", password: "test-secret", token: "" };

describe("ApiClient sign-in", () => {
  it("posts a password grant as a form", async () => {
    const { client, requests } = createClient(withIdentity());

    expect(await client.authenticate("fan@example.com", "test-secret")).toBe(jwt);

    const request = requests[0];
    expect(request?.method).toBe("POST");
    expect(request?.headers.get("User-Agent")).toBe(APP_USER_AGENT);
    expect(await request?.text()).toBe(
      "client_id=test-client&grant_type=password" +
        "&scope=openid+profile+email+nugsnet%3Aapi+nugsnet%3Alegacyapi+offline_access" +
        "&username=fan%40example.com&password=test-secret"
    );
  });

  it("refuses a password login without a client id", async () => {
    const { client, requests } = createClient(withIdentity(), { clientId: "" });

    await expect(client.authenticate("fan@example.com", "test-secret")).rejects.toThrow(SessionError);
    expect(requests).toHaveLength(0);
  });

  it("builds the session from the user and subscription", async () => {
    const { client, requests } = createClient(withIdentity());

    const session = await client.signIn(credentials);

    expect(requests.map((r) => r.url)).toEqual([
      "https://id.nugs.net/connect/token",
      "https://id.nugs.net/connect/userinfo",
      "https://subscriptions.nugs.net/api/v1/me/subscriptions",
    ]);
    expect(requests[1]?.headers.get("Authorization")).toBe(`Bearer ${jwt}`);
    expect(session).toEqual({
      accessToken: jwt,
      legacyToken: "test-legacy-token",
      legacyUguid: "test-uguid",
      planDescription: "Premium Plan",
      streamParams: {
        subscriptionId: "sub-123",
        planId: "plan-456",
        userId: "user-1",
        startStamp: "1704067200",
        endStamp: "1735689599",
      },
    });
  });

  it("skips the password login when a token is given", async () => {
    const { client, requests } = createClient(withIdentity());

    await client.signIn({ ...credentials, token: jwt });

    expect(requests.map((r) => r.url)).toEqual([
      "https://id.nugs.net/connect/userinfo",
      "https://subscriptions.nugs.net/api/v1/me/subscriptions",
    ]);
  });

  it("reports an inaccessible subscription", async () => {
    const { client } = createClient((request) =>
      request.url.startsWith("https://subscriptions.nugs.net/")
        ? jsonResponse({ ...subscriptionBody, isContentAccessible: false })
        : withIdentity()(request)
    );

    const session = await client.signIn({ ...credentials, token: jwt });
    expect(session.planDescription).toBe("no active subscription");
  });

  it("wraps a rejected login as an ApiError", async () => {
    const { client } = createClient(() => jsonResponse({ error: "invalid_grant" }, 400));

    const error = await client.authenticate("fan@example.com", "test-secret").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ endpoint: "auth", statusCode: 400, message: "HTTP 400 from auth" });
  });
});

describe("ApiClient catalog", () => {
  it("fetches and normalises album metadata", async () => {
    const { client, requests } = createClient(() => jsonResponse({ response: container }));

    const album = await client.getAlbumMeta("23329");

    expect(paramsOf(requests[0])).toEqual({
      method: "catalog.container",
      containerID: "23329",
      vdisp: "1",
    });
    expect(requests[0]?.headers.get("User-Agent")).toBe(APP_USER_AGENT);
    expect(album.songs).toEqual([]);
    expect(album.productFormatList).toEqual([]);
    expect(album.videoChapters).toEqual([{ startSeconds: 12.5, title: "Set One" }]);
    expect(album.tracks.map((t) => t.songTitle)).toEqual(["Intro", "Jam"]);
  });

  it("rejects a response of the wrong shape", async () => {
    const { client } = createClient(() => jsonResponse({ response: { artistName: "The Band" } }));

    await expect(client.getAlbumMeta("1")).rejects.toMatchObject({
      name: "ApiError",
      endpoint: "catalog.container",
      message: "Unexpected response from catalog.container",
    });
  });

  it("rejects a body that is not JSON", async () => {
    const { client } = createClient(() => new Response("<html>oops</html>"));

    await expect(client.getAlbumMeta("1")).rejects.toThrow("Response is not JSON");
  });

  it("pages through an artist until an empty page", async () => {
    const pages: Record<string, unknown[]> = {
      "1": [{ ...container, containerId: 1 }, { ...container, containerId: 2 }],
      "3": [{ ...container, containerId: 3 }],
    };
    const { client, requests } = createClient((request) => {
      const offset = new URL(request.url).searchParams.get("startOffset") ?? "";
      return jsonResponse({ response: { containers: pages[offset] ?? [] } });
    });

    const containers = await client.getArtistMeta("1125");

    expect(containers.map((c) => c.containerId)).toEqual([1, 2, 3]);
    expect(requests.map((r) => paramsOf(r).startOffset)).toEqual(["1", "3", "4"]);
    expect(paramsOf(requests[0])).toEqual({
      method: "catalog.containersAll",
      limit: "100",
      artistList: "1125",
      availType: "1",
      vdisp: "1",
      startOffset: "1",
    });
  });

  it("fetches a catalog playlist by GUID without a session", async () => {
    const { client, requests } = createClient(() =>
      jsonResponse({
        response: { playListName: "Summer Jams", items: [{ track: { trackId: 9, songTitle: "Tune" } }] },
      })
    );

    const playlist = await client.getPlaylistMeta("guid-1", { catalog: true });

    expect(playlist).toEqual({ playListName: "Summer Jams", items: [{ track: { trackId: 9, songTitle: "Tune" } }] });
    expect(requests[0]?.url).toBe(
      "https://streamapi.nugs.net/api.aspx?method=catalog.playlist&plGUID=guid-1"
    );
    expect(requests[0]?.headers.get("User-Agent")).toBe(PLAYER_USER_AGENT);
  });

  it("fetches a user playlist with the legacy credentials", async () => {
    const { client, requests } = createClient(
      withIdentity(() => jsonResponse({ response: { playListName: "Mine", items: null } }))
    );
    await client.signIn(credentials);

    const playlist = await client.getPlaylistMeta("55", { catalog: false });

    expect(playlist).toEqual({ playListName: "Mine", items: [] });
    const request = requests.at(-1);
    expect(request?.url.startsWith("https://streamapi.nugs.net/secureApi.aspx?")).toBe(true);
    expect(paramsOf(request)).toEqual({
      method: "user.playlist",
      playlistID: "55",
      developerKey: "test-dev-key",
      user: "fan@example.com",
      token: "test-legacy-token",
    });
  });

  it("needs a developer key for user playlists", async () => {
    const { client } = createClient(withIdentity(), { developerKey: "" });
    await client.signIn(credentials);

    await expect(client.getPlaylistMeta("55", { catalog: false })).rejects.toThrow(
      "User playlists need apiDeveloperKey"
    );
  });
});

describe("ApiClient streams", () => {
  it("requires a session", async () => {
    const { client } = createClient(withIdentity());

    await expect(client.getStreamUrl({ kind: "track", trackId: 1, platformId: 1 })).rejects.toThrow(
      "Not signed in"
    );
  });

  it("requests a track stream by platform", async () => {
    const { client, requests } = createClient(
      withIdentity(() => jsonResponse({ streamLink: "https://cdn.example.com/a.flac16/1.flac?x=1" }))
    );
    await client.signIn(credentials);

    const url = await client.getStreamUrl({ kind: "track", trackId: 321, platformId: 4 });

    expect(url).toBe("https://cdn.example.com/a.flac16/1.flac?x=1");
    const request = requests.at(-1);
    expect(request?.headers.get("User-Agent")).toBe(PLAYER_USER_AGENT);
    expect(request?.url).toBe(
      "https://streamapi.nugs.net/bigriver/subPlayer.aspx?platformID=4&trackID=321&app=1" +
        "&subscriptionID=sub-123&subCostplanIDAccessList=plan-456&nn_userID=user-1" +
        "&startDateStamp=1704067200&endDateStamp=1735689599"
    );
  });

  it("requests a container stream by SKU", async () => {
    const { client, requests } = createClient(withIdentity(() => jsonResponse({ streamLink: "" })));
    await client.signIn(credentials);

    expect(await client.getStreamUrl({ kind: "container", containerId: 23329, skuId: 777 })).toBe("");
    expect(paramsOf(requests.at(-1))).toMatchObject({ skuId: "777", containerID: "23329", chap: "1" });
  });

  it("requests a purchased manifest with the user's uguid", async () => {
    const { client, requests } = createClient(
      withIdentity(() => jsonResponse({ fileUrl: "https://cdn.example.com/master.m3u8?t=1" }))
    );
    await client.signIn(credentials);

    expect(await client.getPurchasedManifestUrl(777, "show-9")).toBe(
      "https://cdn.example.com/master.m3u8?t=1"
    );
    expect(paramsOf(requests.at(-1))).toEqual({
      skuId: "777",
      showId: "show-9",
      uguid: "test-uguid",
      nn_userID: "user-1",
      app: "1",
    });
  });
});

describe("resolveCatalogPlaylistId", () => {
  it("follows the short link to the plGUID parameter", async () => {
    const { client, requests } = createClient(
      () =>
        new Response(null, {
          status: 301,
          headers: { location: "https://play.nugs.net/playlist?plGUID=guid-42" },
        })
    );

    expect(await client.resolveCatalogPlaylistId("https://2nu.gs/abc")).toBe("guid-42");
    expect(requests.map((r) => r.url)).toEqual(["https://2nu.gs/abc"]);
  });

  it("resolves relative locations", async () => {
    const { client } = createClient((request) =>
      request.url === "https://2nu.gs/abc"
        ? new Response(null, { status: 302, headers: { location: "/p" } })
        : new Response(null, { status: 302, headers: { location: "/list?plGUID=guid-7" } })
    );

    expect(await client.resolveCatalogPlaylistId("https://2nu.gs/abc")).toBe("guid-7");
  });

  it("rejects a link that lands elsewhere", async () => {
    const { client } = createClient(() => new Response("<html></html>"));

    await expect(client.resolveCatalogPlaylistId("https://2nu.gs/abc")).rejects.toThrow(
      "Not a catalog playlist"
    );
  });

  it("gives up after the redirect limit", async () => {
    const { client, requests } = createClient(
      () => new Response(null, { status: 302, headers: { location: "/again" } })
    );

    await expect(client.resolveCatalogPlaylistId("https://2nu.gs/abc")).rejects.toThrow(
      "Too many redirects resolving https://2nu.gs/abc"
    );
    expect(requests).toHaveLength(MAX_REDIRECTS + 1);
  });

  it("reports an error status", async () => {
    const { client } = createClient(() => new Response("gone", { status: 410 }));

    await expect(client.resolveCatalogPlaylistId("https://2nu.gs/abc")).rejects.toMatchObject({
      statusCode: 410,
    });
  });
});
