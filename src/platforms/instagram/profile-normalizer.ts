import { normalizeUsername } from "../../core/normalize";
import type { ProfileRecord, RawPageData } from "../../domain/models";
import { JsonLdSchema, UserNodeSchema } from "./schemas";
import { INSTAGRAM_SELECTORS, buildProfileUrl } from "./selectors";

const UNKNOWN_COUNT = "N/A";

export interface NormalizeOptions {
  baseUrl?: string;
  capturedAt?: Date;
}

/**
 * Merges the summary meta tokens, JSON-LD block and snapshot user node into one record.
 *
 * Display name and URL prefer JSON-LD; the three counts prefer the meta tokens at
 * indices 0, 2 and 4 ("N Followers, N Following, N Posts") and fall back to the
 * snapshot edge counts when the summary is shorter than that.
 */
export function normalizeProfile(raw: RawPageData, username: string, options: NormalizeOptions = {}): ProfileRecord {
  const user = UserNodeSchema.parse(raw.user);
  const jsonLd = JsonLdSchema.parse(raw.jsonLd ?? {});
  const baseUrl = options.baseUrl ?? "https://www.instagram.com";
  const tokens = INSTAGRAM_SELECTORS.SUMMARY_TOKENS;

  const record: ProfileRecord = {
    username: normalizeUsername(user.username || username),
    displayName: jsonLd.name ?? user.full_name,
    url: jsonLd.mainEntityOfPage ?? buildProfileUrl(baseUrl, username),
    followers: raw.metaTokens[tokens.FOLLOWERS] ?? formatCount(user.edge_followed_by),
    following: raw.metaTokens[tokens.FOLLOWING] ?? formatCount(user.edge_follow),
    posts: raw.metaTokens[tokens.POSTS] ?? formatCount(user.edge_owner_to_timeline_media),
    bio: user.biography,
    profilePicUrl: user.profile_pic_url_hd ?? user.profile_pic_url,
    isBusinessAccount: user.is_business_account,
    connectedFbPage: user.connected_fb_page,
    externalUrl: user.external_url,
    joinedRecently: user.is_joined_recently,
    businessCategory: user.business_category_name,
    isPrivate: user.is_private,
    isVerified: user.is_verified,
    hasGuides: user.has_guides,
    hasClips: user.has_clips,
    hasArEffects: user.has_ar_effects,
    hasChannel: user.has_channel,
    highlightReelCount: user.highlight_reel_count,
    scrapedAt: (options.capturedAt ?? new Date()).toISOString(),
  };

  return Object.freeze(record);
}

function formatCount(count: number | undefined): string {
  return count === undefined ? UNKNOWN_COUNT : String(count);
}
