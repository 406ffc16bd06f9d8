import { z } from "zod";
import { normalizeUsername } from "../core/normalize";

export const UsernameSchema = z
  .string()
  .transform(normalizeUsername)
  .pipe(z.string().regex(/^(?!\.+$)[a-z0-9._]{1,30}$/, "Usernames use letters, digits, '.' and '_' (max 30)"));

export const KeyStyleSchema = z.enum(["snake", "display"]);
export type KeyStyle = z.infer<typeof KeyStyleSchema>;

export const ProfileRecordSchema = z.object({
  username: z.string(),
  displayName: z.string(),
  url: z.string(),
  followers: z.string(),
  following: z.string(),
  posts: z.string(),
  bio: z.string(),
  profilePicUrl: z.string(),
  isBusinessAccount: z.boolean(),
  connectedFbPage: z.string().nullable(),
  externalUrl: z.string(),
  joinedRecently: z.boolean(),
  businessCategory: z.string(),
  isPrivate: z.boolean(),
  isVerified: z.boolean(),
  hasGuides: z.boolean(),
  hasClips: z.boolean(),
  hasArEffects: z.boolean(),
  hasChannel: z.boolean(),
  highlightReelCount: z.number(),
  scrapedAt: z.string(),
});
export type ProfileRecord = Readonly<z.infer<typeof ProfileRecordSchema>>;

export const DimensionsSchema = z.object({
  height: z.number(),
  width: z.number(),
});
export type Dimensions = z.infer<typeof DimensionsSchema>;

export const PostLocationSchema = z.object({
  id: z.string(),
  name: z.string(),
});
export type PostLocation = z.infer<typeof PostLocationSchema>;

export const PostRecordSchema = z.object({
  id: z.string(),
  shortcode: z.string(),
  postUrl: z.string(),
  caption: z.string(),
  accessibilityCaption: z.string(),
  commentsCount: z.number(),
  commentsDisabled: z.boolean(),
  likesCount: z.number(),
  timestamp: z.number(),
  date: z.string(),
  isVideo: z.boolean(),
  videoViews: z.number().optional(),
  displayUrl: z.string(),
  mediaUrl: z.string(),
  dimensions: DimensionsSchema.nullable(),
  location: PostLocationSchema.nullable(),
});
export type PostRecord = Readonly<z.infer<typeof PostRecordSchema>>;

export type JsonObject = Record<string, unknown>;

export interface RawPageData {
  metaTokens: string[];
  jsonLd?: JsonObject;
  snapshot: JsonObject;
  user: JsonObject;
}
