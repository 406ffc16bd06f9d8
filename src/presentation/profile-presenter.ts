import type { KeyStyle, PostRecord, ProfileRecord } from "../domain/models";

type FieldLabels<T> = { readonly [K in keyof T]-?: readonly [snake: string, display: string] };

const PROFILE_LABELS: FieldLabels<ProfileRecord> = {
  username: ["username", "Username"],
  displayName: ["profile_name", "Profile Name"],
  url: ["url", "URL"],
  followers: ["followers", "Followers"],
  following: ["following", "Following"],
  posts: ["posts", "Posts"],
  bio: ["bio", "Bio"],
  profilePicUrl: ["profile_pic_url", "Profile Picture URL"],
  isBusinessAccount: ["is_business_account", "Is Business Account"],
  connectedFbPage: ["connected_to_facebook", "Connected to Facebook"],
  externalUrl: ["external_url", "External URL"],
  joinedRecently: ["joined_recently", "Joined Recently"],
  businessCategory: ["business_category", "Business Category"],
  isPrivate: ["is_private", "Is Private"],
  isVerified: ["is_verified", "Is Verified"],
  hasGuides: ["has_guides", "Has Guides"],
  hasClips: ["has_clips", "Has Clips"],
  hasArEffects: ["has_ar_effects", "Has AR Effects"],
  hasChannel: ["has_channel", "Has Channel"],
  highlightReelCount: ["highlight_reel_count", "Highlight Reel Count"],
  scrapedAt: ["scraped_timestamp", "Scraped Timestamp"],
};

const POST_LABELS: FieldLabels<PostRecord> = {
  id: ["id", "ID"],
  shortcode: ["shortcode", "Shortcode"],
  postUrl: ["post_url", "Post URL"],
  caption: ["caption", "Caption"],
  accessibilityCaption: ["accessibility_caption", "Accessibility Caption"],
  commentsCount: ["comments_count", "Comments Count"],
  commentsDisabled: ["comments_disabled", "Comments Disabled"],
  likesCount: ["likes_count", "Likes Count"],
  timestamp: ["timestamp", "Timestamp"],
  date: ["date", "Date"],
  isVideo: ["is_video", "Is Video"],
  videoViews: ["video_views", "Video Views"],
  displayUrl: ["display_url", "Display URL"],
  mediaUrl: ["media_url", "Media URL"],
  dimensions: ["dimensions", "Dimensions"],
  location: ["location", "Location"],
};

function relabel<T extends object>(value: T, labels: FieldLabels<T>, style: KeyStyle): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const key in labels) {
    if (!(key in value)) continue;
    const [snake, display] = labels[key];
    out[style === "snake" ? snake : display] = value[key];
  }
  return out;
}

export function presentProfile(record: ProfileRecord, style: KeyStyle): Record<string, unknown> {
  return relabel(record, PROFILE_LABELS, style);
}

export function presentPosts(posts: readonly PostRecord[], style: KeyStyle): Record<string, unknown>[] {
  return posts.map((post) => relabel(post, POST_LABELS, style));
}
