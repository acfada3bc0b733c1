/**
 * Maps user-supplied catalog URLs to the item they reference.
 */

// ============================================================================
// Media Kinds
// ============================================================================

export const MEDIA_KIND = {
  album: "album",
  userPlaylist: "userPlaylist",
  catalogPlaylist: "catalogPlaylist",
  video: "video",
  artist: "artist",
  exclusiveLivestream: "exclusiveLivestream",
  purchasedLivestream: "purchasedLivestream",
  webcast: "webcast",
} as const;

export type MediaKind = (typeof MEDIA_KIND)[keyof typeof MEDIA_KIND];

export interface MediaReference {
  /** Catalog id, or the raw value the kind needs (short link, query string). */
  itemId: string;
  kind: MediaKind;
}

/**
 * Compile-time exhaustiveness guard for switches over closed unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}

// ============================================================================
// URL Patterns
// ============================================================================

/**
 * Ordered: the first matching pattern wins and its first capture group is the id.
 */
export const URL_PATTERNS: readonly { pattern: RegExp; kind: MediaKind }[] = [
  { pattern: /^https:\/\/play\.nugs\.net\/release\/(\d+)$/, kind: "album" },
  { pattern: /^https:\/\/play\.nugs\.net\/#\/playlists\/playlist\/(\d+)$/, kind: "userPlaylist" },
  { pattern: /^https:\/\/play\.nugs\.net\/library\/playlist\/(\d+)$/, kind: "userPlaylist" },
  { pattern: /^(https:\/\/2nu\.gs\/[a-zA-Z\d]+)$/, kind: "catalogPlaylist" },
  { pattern: /^https:\/\/play\.nugs\.net\/#\/videos\/artist\/\d+\/.+\/(\d+)$/, kind: "video" },
  { pattern: /^https:\/\/play\.nugs\.net\/artist\/(\d+)(?:\/albums|\/latest|)$/, kind: "artist" },
  { pattern: /^https:\/\/play\.nugs\.net\/livestream\/(\d+)\/exclusive$/, kind: "exclusiveLivestream" },
  {
    pattern: /^https:\/\/play\.nugs\.net\/watch\/livestreams\/exclusive\/(\d+)$/,
    kind: "exclusiveLivestream",
  },
  { pattern: /^https:\/\/play\.nugs\.net\/#\/my-webcasts\/\d+-(\d+)-\d+-\d+$/, kind: "webcast" },
  {
    pattern:
      /^https:\/\/www\.nugs\.net\/on\/demandware\.store\/Sites-NugsNet-Site\/default\/(?:Stash-QueueVideo|NugsVideo-GetStashVideo)\?([a-zA-Z0-9=%&-]+)$/,
    kind: "purchasedLivestream",
  },
  { pattern: /^https:\/\/play\.nugs\.net\/library\/webcast\/(\d+)$/, kind: "video" },
];

/**
 * Classifies a URL. Returns null when no pattern matches; callers skip the item.
 *
 * @example
 * classifyUrl("https://play.nugs.net/release/23329")
 * // => { itemId: "23329", kind: "album" }
 */
export function classifyUrl(url: string): MediaReference | null {
  for (const { pattern, kind } of URL_PATTERNS) {
    const itemId = pattern.exec(url)?.[1];
    if (itemId) {
      return { itemId, kind };
    }
  }
  return null;
}

const KIND_LABELS: Record<MediaKind, string> = {
  album: "album",
  userPlaylist: "playlist",
  catalogPlaylist: "catalog playlist",
  video: "video",
  artist: "artist",
  exclusiveLivestream: "livestream",
  purchasedLivestream: "purchased livestream",
  webcast: "webcast",
};

export function describeMediaKind(kind: MediaKind): string {
  return KIND_LABELS[kind];
}
