/**
 * Client for the catalog, identity and stream APIs.
 *
 * Responses are validated with the schemas in `schemas.ts`; any failure
 * surfaces as an `ApiError` naming the endpoint.
 */
import type { KyInstance, Options } from "ky";
import { z } from "zod";
import { ApiError, getErrorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import {
  AlbumResponseSchema,
  ArtistPageSchema,
  type Container,
  type Playlist,
  PlaylistResponseSchema,
  PurchasedManifestSchema,
  StreamLinkSchema,
  type Subscription,
  SubscriptionSchema,
  TokenResponseSchema,
  UserInfoSchema,
} from "./schemas.js";
import {
  type Session,
  SessionError,
  buildStreamParams,
  extractLegacyToken,
  getPlanDescription,
} from "./session.js";

// ============================================================================
// Endpoints
// ============================================================================

export const API_URLS = {
  token: "https://id.nugs.net/connect/token",
  userInfo: "https://id.nugs.net/connect/userinfo",
  subscriptions: "https://subscriptions.nugs.net/api/v1/me/subscriptions",
  streamApi: "https://streamapi.nugs.net/",
} as const;

/** Identity, subscription and catalog requests. */
export const APP_USER_AGENT = "NugsNet/3.26.724 (Android; 7.1.2; Asus; ASUS_Z01QD; Scale/2.0; en)";

/** Playlist and stream requests. */
export const PLAYER_USER_AGENT = "nugsnetAndroid";

export const AUTH_SCOPE = "openid profile email nugsnet:api nugsnet:legacyapi offline_access";

export const ARTIST_PAGE_SIZE = 100;

/** Redirect hops followed when resolving a playlist short link. */
export const MAX_REDIRECTS = 5;

// ============================================================================
// Service Interface
// ============================================================================

/**
 * A stream is requested either for one track on a delivery platform, or for
 * a whole container (videos) by its SKU.
 */
export type StreamRequest =
  | { kind: "track"; trackId: number; platformId: number }
  | { kind: "container"; containerId: number; skuId: number };

/**
 * What the processor needs from the catalog. Requires a signed-in session.
 */
export interface CatalogService {
  getAlbumMeta(containerId: string): Promise<Container>;
  /** Every container of the artist, across all pages. */
  getArtistMeta(artistId: string): Promise<Container[]>;
  getPlaylistMeta(playlistId: string, options: { catalog: boolean }): Promise<Playlist>;
  /** Empty when the API offers no stream. */
  getStreamUrl(request: StreamRequest): Promise<string>;
  /** Empty when the API offers no manifest. */
  getPurchasedManifestUrl(skuId: number, showId: string): Promise<string>;
  resolveCatalogPlaylistId(shortUrl: string): Promise<string>;
}

export interface Credentials {
  email: string;
  password: string;
  /** A bearer token skips the password login. */
  token: string;
}

export interface ApiClientOptions {
  http: KyInstance;
  logger: Logger;
  clientId: string;
  developerKey: string;
}

// ============================================================================
// Client
// ============================================================================

export class ApiClient implements CatalogService {
  private readonly http: KyInstance;
  private readonly logger: Logger;
  private readonly clientId: string;
  private readonly developerKey: string;
  private session: (Session & { email: string }) | null = null;

  constructor(options: ApiClientOptions) {
    this.http = options.http;
    this.logger = options.logger;
    this.clientId = options.clientId;
    this.developerKey = options.developerKey;
  }

  // --------------------------------------------------------------------------
  // Sign-in
  // --------------------------------------------------------------------------

  /**
   * Password login. Returns the access token.
   */
  async authenticate(email: string, password: string): Promise<string> {
    if (!this.clientId) {
      throw new SessionError(
        "Password login needs apiClientId. Set it with `tapevault config set apiClientId <id>` or pass a token."
      );
    }

    const body = new URLSearchParams({
      client_id: this.clientId,
      grant_type: "password",
      scope: AUTH_SCOPE,
      username: email,
      password,
    });

    const result = await this.request("auth", API_URLS.token, TokenResponseSchema, {
      method: "post",
      body,
      headers: { "User-Agent": APP_USER_AGENT },
    });
    return result.access_token;
  }

  async getUserId(accessToken: string): Promise<string> {
    const result = await this.request("userinfo", API_URLS.userInfo, UserInfoSchema, {
      headers: { Authorization: `Bearer ${accessToken}`, "User-Agent": APP_USER_AGENT },
    });
    return result.sub;
  }

  async getSubscription(accessToken: string): Promise<Subscription> {
    return this.request("subscriptions", API_URLS.subscriptions, SubscriptionSchema, {
      headers: { Authorization: `Bearer ${accessToken}`, "User-Agent": APP_USER_AGENT },
    });
  }

  /**
   * Signs in and keeps the session for the catalog calls that need it.
   */
  async signIn(credentials: Credentials): Promise<Session> {
    const accessToken =
      credentials.token || (await this.authenticate(credentials.email, credentials.password));

    const userId = await this.getUserId(accessToken);
    const subscription = await this.getSubscription(accessToken);
    const { legacyToken, legacyUguid } = extractLegacyToken(accessToken);
    const plan = getPlanDescription(subscription);

    const session: Session = {
      accessToken,
      legacyToken,
      legacyUguid,
      streamParams: buildStreamParams(userId, subscription, plan.isPromo),
      planDescription: subscription.isContentAccessible ? plan.description : "no active subscription",
    };
    this.session = { ...session, email: credentials.email };
    this.logger.debug("Signed in", { userId, promo: plan.isPromo });
    return session;
  }

  // --------------------------------------------------------------------------
  // Catalog
  // --------------------------------------------------------------------------

  async getAlbumMeta(containerId: string): Promise<Container> {
    const result = await this.request("catalog.container", this.streamApiUrl("api.aspx"), AlbumResponseSchema, {
      searchParams: { method: "catalog.container", containerID: containerId, vdisp: "1" },
      headers: { "User-Agent": APP_USER_AGENT },
    });
    return result.response;
  }

  async getArtistMeta(artistId: string): Promise<Container[]> {
    const containers: Container[] = [];
    let offset = 1;

    for (;;) {
      const page = await this.request(
        "catalog.containersAll",
        this.streamApiUrl("api.aspx"),
        ArtistPageSchema,
        {
          searchParams: {
            method: "catalog.containersAll",
            limit: String(ARTIST_PAGE_SIZE),
            artistList: artistId,
            availType: "1",
            vdisp: "1",
            startOffset: String(offset),
          },
          headers: { "User-Agent": APP_USER_AGENT },
        }
      );

      const returned = page.response.containers;
      if (returned.length === 0) break;
      containers.push(...returned);
      offset += returned.length;
    }

    return containers;
  }

  async getPlaylistMeta(playlistId: string, options: { catalog: boolean }): Promise<Playlist> {
    if (options.catalog) {
      const result = await this.request(
        "catalog.playlist",
        this.streamApiUrl("api.aspx"),
        PlaylistResponseSchema,
        {
          searchParams: { method: "catalog.playlist", plGUID: playlistId },
          headers: { "User-Agent": PLAYER_USER_AGENT },
        }
      );
      return result.response;
    }

    const session = this.requireSession();
    if (!this.developerKey) {
      throw new SessionError(
        "User playlists need apiDeveloperKey. Set it with `tapevault config set apiDeveloperKey <key>`."
      );
    }

    const result = await this.request(
      "user.playlist",
      this.streamApiUrl("secureApi.aspx"),
      PlaylistResponseSchema,
      {
        searchParams: {
          method: "user.playlist",
          playlistID: playlistId,
          developerKey: this.developerKey,
          user: session.email,
          token: session.legacyToken,
        },
        headers: { "User-Agent": PLAYER_USER_AGENT },
      }
    );
    return result.response;
  }

  // --------------------------------------------------------------------------
  // Streams
  // --------------------------------------------------------------------------

  async getStreamUrl(request: StreamRequest): Promise<string> {
    const { streamParams } = this.requireSession();

    const target: Record<string, string> =
      request.kind === "track"
        ? { platformID: String(request.platformId), trackID: String(request.trackId) }
        : { skuId: String(request.skuId), containerID: String(request.containerId), chap: "1" };

    const result = await this.request(
      "subPlayer",
      this.streamApiUrl("bigriver/subPlayer.aspx"),
      StreamLinkSchema,
      {
        searchParams: {
          ...target,
          app: "1",
          subscriptionID: streamParams.subscriptionId,
          subCostplanIDAccessList: streamParams.planId,
          nn_userID: streamParams.userId,
          startDateStamp: streamParams.startStamp,
          endDateStamp: streamParams.endStamp,
        },
        headers: { "User-Agent": PLAYER_USER_AGENT },
      }
    );
    return result.streamLink;
  }

  async getPurchasedManifestUrl(skuId: number, showId: string): Promise<string> {
    const session = this.requireSession();

    const result = await this.request(
      "vidPlayer",
      this.streamApiUrl("bigriver/vidPlayer.aspx"),
      PurchasedManifestSchema,
      {
        searchParams: {
          skuId: String(skuId),
          showId,
          uguid: session.legacyUguid,
          nn_userID: session.streamParams.userId,
          app: "1",
        },
        headers: { "User-Agent": PLAYER_USER_AGENT },
      }
    );
    return result.fileUrl;
  }

  /**
   * Follows a playlist short link until a URL carries the `plGUID` parameter.
   */
  async resolveCatalogPlaylistId(shortUrl: string): Promise<string> {
    let url = shortUrl;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const playlistId = new URL(url).searchParams.get("plGUID");
      if (playlistId) return playlistId;

      let response: Response;
      try {
        response = await this.http.get(url, { redirect: "manual", throwHttpErrors: false });
      } catch (error) {
        throw new ApiError("shortlink", `Request failed: ${getErrorMessage(error)}`, undefined, {
          cause: error,
        });
      }

      const location = response.headers.get("location");
      if (response.status >= 300 && response.status < 400 && location) {
        url = new URL(location, url).toString();
        continue;
      }
      if (!response.ok) {
        throw new ApiError("shortlink", `HTTP ${response.status} for ${url}`, response.status);
      }
      throw new ApiError("shortlink", "Not a catalog playlist");
    }

    throw new ApiError("shortlink", `Too many redirects resolving ${shortUrl}`);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private streamApiUrl(path: string): string {
    return `${API_URLS.streamApi}${path}`;
  }

  private requireSession(): Session & { email: string } {
    if (!this.session) {
      throw new SessionError("Not signed in");
    }
    return this.session;
  }

  private async request<T>(
    endpoint: string,
    url: string,
    schema: z.ZodType<T>,
    options: Options
  ): Promise<T> {
    let response: Response;
    try {
      response = await this.http(url, { ...options, throwHttpErrors: false });
    } catch (error) {
      throw new ApiError(endpoint, `Request failed: ${getErrorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new ApiError(endpoint, `HTTP ${response.status} from ${endpoint}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ApiError(endpoint, "Response is not JSON", response.status, { cause: error });
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      this.logger.debug("Unexpected response shape", { endpoint, issues: z.prettifyError(result.error) });
      throw new ApiError(endpoint, `Unexpected response from ${endpoint}`, response.status, {
        cause: result.error,
      });
    }
    return result.data;
  }
}
