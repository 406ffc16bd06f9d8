import type { Logger } from "../../core/logger";
import type { PostRecord, RawPageData } from "../../domain/models";
import { EdgeSchema, TimelineEdgesSchema, UserNodeSchema, type PostNode } from "./schemas";
import { buildPostUrl } from "./selectors";

export interface ExtractPostsOptions {
  baseUrl?: string;
}

export function extractPosts(
  raw: RawPageData,
  limit: number,
  logger: Logger,
  options: ExtractPostsOptions = {}
): PostRecord[] {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`Post limit must be a non-negative integer, got ${limit}`);
  }

  if (UserNodeSchema.parse(raw.user).is_private) {
    logger.warn("Cannot extract posts from a private profile");
    return [];
  }

  const baseUrl = options.baseUrl ?? "https://www.instagram.com";
  const edges = TimelineEdgesSchema.parse(raw.user).slice(0, limit);
  const posts: PostRecord[] = [];

  edges.forEach((edge, index) => {
    const parsed = EdgeSchema.safeParse(edge);
    if (!parsed.success) {
      logger.warn({ index }, "Skipping timeline edge without a post node id");
      return;
    }
    posts.push(toPostRecord(parsed.data.node, baseUrl));
  });

  logger.info({ requested: limit, available: edges.length, extracted: posts.length }, "Extracted posts");
  return posts;
}

function toPostRecord(node: PostNode, baseUrl: string): PostRecord {
  const record: PostRecord = {
    id: node.id,
    shortcode: node.shortcode,
    postUrl: buildPostUrl(baseUrl, node.shortcode),
    caption: node.edge_media_to_caption,
    accessibilityCaption: node.accessibility_caption,
    commentsCount: node.edge_media_to_comment,
    commentsDisabled: node.comments_disabled,
    likesCount: node.edge_liked_by,
    timestamp: node.taken_at_timestamp,
    date: new Date(node.taken_at_timestamp * 1000).toISOString(),
    isVideo: node.is_video,
    ...(node.is_video ? { videoViews: node.video_view_count } : {}),
    displayUrl: node.display_url,
    mediaUrl: node.is_video && node.video_url ? node.video_url : node.display_url,
    dimensions: node.dimensions,
    location: node.location,
  };

  return Object.freeze(record);
}
