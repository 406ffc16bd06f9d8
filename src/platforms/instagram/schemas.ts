import { z } from "zod";

const CountSchema = z
  .object({ count: z.number() })
  .transform((edge) => edge.count)
  .optional()
  .catch(undefined);

// Largest instant a Date can hold, in seconds.
const MAX_EPOCH_SECONDS = 8.64e12;

const text = () => z.string().catch("");
const flag = () => z.boolean().catch(false);
const optionalText = () => z.string().min(1).optional().catch(undefined);

/** Fields read from `graphql.user`; anything missing or mistyped falls back to its default. */
export const UserNodeSchema = z.object({
  username: text(),
  full_name: text(),
  biography: text(),
  profile_pic_url: text(),
  profile_pic_url_hd: optionalText(),
  is_business_account: flag(),
  connected_fb_page: z.string().nullable().catch(null),
  external_url: text(),
  is_joined_recently: flag(),
  business_category_name: text(),
  is_private: flag(),
  is_verified: flag(),
  has_guides: flag(),
  has_clips: flag(),
  has_ar_effects: flag(),
  has_channel: flag(),
  highlight_reel_count: z.number().catch(0),
  edge_followed_by: CountSchema,
  edge_follow: CountSchema,
  edge_owner_to_timeline_media: CountSchema,
});
export type UserNode = z.infer<typeof UserNodeSchema>;

export const JsonLdSchema = z.object({
  name: optionalText(),
  mainEntityOfPage: z
    .object({ "@id": optionalText() })
    .transform((page) => page["@id"])
    .optional()
    .catch(undefined),
});

const CaptionEdgesSchema = z
  .object({
    edges: z.array(z.object({ node: z.object({ text: z.string() }) })),
  })
  .transform((caption) => caption.edges[0]?.node.text ?? "")
  .catch("");

const EdgeCountSchema = z
  .object({ count: z.number() })
  .transform((edge) => edge.count)
  .catch(0);

export const PostNodeSchema = z.object({
  id: z.union([z.string().min(1), z.number().transform(String)]),
  shortcode: text(),
  edge_media_to_caption: CaptionEdgesSchema,
  accessibility_caption: text(),
  edge_media_to_comment: EdgeCountSchema,
  comments_disabled: flag(),
  edge_liked_by: EdgeCountSchema,
  taken_at_timestamp: z.number().int().nonnegative().max(MAX_EPOCH_SECONDS).catch(0),
  is_video: flag(),
  video_view_count: z.number().catch(0),
  display_url: text(),
  video_url: optionalText(),
  dimensions: z.object({ height: z.number(), width: z.number() }).nullable().catch(null),
  location: z
    .object({ id: z.union([z.string(), z.number().transform(String)]), name: z.string() })
    .nullable()
    .catch(null),
});
export type PostNode = z.infer<typeof PostNodeSchema>;

export const TimelineEdgesSchema = z
  .object({
    edge_owner_to_timeline_media: z.object({
      edges: z.array(z.unknown()),
    }),
  })
  .transform((user) => user.edge_owner_to_timeline_media.edges)
  .catch([]);

export const EdgeSchema = z.object({ node: PostNodeSchema });
