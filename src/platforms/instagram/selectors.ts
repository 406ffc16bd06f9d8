import { trimTrailingSlash } from "../../core/normalize";

export const INSTAGRAM_SELECTORS = {
  PAGE: {
    SUMMARY_META: 'meta[property="og:description"]',
    JSON_LD: 'script[type="application/ld+json"]',
    INLINE_SCRIPT: 'script[type="text/javascript"]',
  },

  SNAPSHOT: {
    ASSIGNMENT_MARKER: "window._sharedData",
  },

  SUMMARY_TOKENS: {
    FOLLOWERS: 0,
    FOLLOWING: 2,
    POSTS: 4,
  },
} as const;

export function buildProfileUrl(baseUrl: string, username: string): string {
  return `${trimTrailingSlash(baseUrl)}/${username}/`;
}

export function buildPostUrl(baseUrl: string, shortcode: string): string {
  return `${trimTrailingSlash(baseUrl)}/p/${shortcode}/`;
}
