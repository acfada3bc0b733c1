/**
 * Zod schemas for the catalog, identity and stream API responses.
 * Every response is parsed through one of these before it is used.
 */

import { z } from "zod";

/**
 * The catalog sends `null` for empty lists; both become `[]`.
 */
function listOf<T extends z.ZodType>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((items) => items ?? []);
}

// ============================================================================
// Identity API
// ============================================================================

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export const UserInfoSchema = z.object({
  sub: z.string().min(1),
});

export type UserInfo = z.infer<typeof UserInfoSchema>;

// ============================================================================
// Subscriptions API
// ============================================================================

const PlanSchema = z.object({
  description: z.string().default(""),
  planId: z.string().default(""),
});

export const ProductFormatSchema = z.object({
  formatStr: z.string(),
  skuId: z.number().int(),
});

export type ProductFormat = z.infer<typeof ProductFormatSchema>;

export const SubscriptionSchema = z.object({
  plan: PlanSchema.nullish().transform((plan) => plan ?? { description: "", planId: "" }),
  promo: z
    .object({ plan: PlanSchema.nullish() })
    .nullish()
    .transform((promo) => ({
      plan: promo?.plan ?? { description: "", planId: "" },
    })),
  legacySubscriptionId: z.string().default(""),
  startedAt: z.string().default(""),
  endsAt: z.string().default(""),
  isContentAccessible: z.boolean().default(false),
  productFormatList: listOf(ProductFormatSchema),
});

export type Subscription = z.infer<typeof SubscriptionSchema>;

// ============================================================================
// Catalog API
// ============================================================================

export const TrackSchema = z.object({
  trackId: z.number().int(),
  songTitle: z.string(),
});

export type Track = z.infer<typeof TrackSchema>;

export const VideoChapterSchema = z
  .object({
    chapterSeconds: z.number().nonnegative(),
    chaptername: z.string(),
  })
  .transform((chapter) => ({
    startSeconds: chapter.chapterSeconds,
    title: chapter.chaptername,
  }));

export const ContainerSchema = z.object({
  artistName: z.string(),
  containerInfo: z.string(),
  containerId: z.number().int(),
  containerTypeStr: z.string().nullish(),
  availabilityTypeStr: z.string().nullish(),
  tracks: listOf(TrackSchema),
  songs: listOf(TrackSchema),
  products: listOf(ProductFormatSchema),
  productFormatList: listOf(ProductFormatSchema),
  videoChapters: listOf(VideoChapterSchema),
});

export type Container = z.infer<typeof ContainerSchema>;

export const AlbumResponseSchema = z.object({
  response: ContainerSchema,
});

export const ArtistPageSchema = z.object({
  response: z.object({
    containers: listOf(ContainerSchema),
  }),
});

export type ArtistPage = z.infer<typeof ArtistPageSchema>;

export const PlaylistSchema = z.object({
  playListName: z.string(),
  items: listOf(z.object({ track: TrackSchema })),
});

export type Playlist = z.infer<typeof PlaylistSchema>;

export const PlaylistResponseSchema = z.object({
  response: PlaylistSchema,
});

// ============================================================================
// Stream API
// ============================================================================

export const StreamLinkSchema = z.object({
  streamLink: z.string().default(""),
});

export const PurchasedManifestSchema = z.object({
  fileUrl: z.string().default(""),
});

// ============================================================================
// Session Token
// ============================================================================

/**
 * Claims of the identity token that the legacy endpoints need.
 */
export const LegacyClaimsSchema = z.object({
  legacyToken: z.string(),
  legacyUguid: z.string(),
});

export type LegacyClaims = z.infer<typeof LegacyClaimsSchema>;
