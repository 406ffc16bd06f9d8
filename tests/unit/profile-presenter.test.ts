import { describe, it, expect } from "vitest";
import type { PostRecord, ProfileRecord } from "../../src/domain/models";
import { presentPosts, presentProfile } from "../../src/presentation/profile-presenter";
import { formatProfileReport } from "../../src/presentation/profile-report";

const record: ProfileRecord = {
  username: "sample.user",
  displayName: "Sample User",
  url: "https://profiles.example.test/sample.user/",
  followers: "1.5k",
  following: "75",
  posts: "3",
  bio: "",
  profilePicUrl: "https://cdn.example.test/pic.jpg",
  isBusinessAccount: true,
  connectedFbPage: null,
  externalUrl: "https://example.test",
  joinedRecently: false,
  businessCategory: "Creators",
  isPrivate: false,
  isVerified: true,
  hasGuides: false,
  hasClips: true,
  hasArEffects: false,
  hasChannel: false,
  highlightReelCount: 4,
  scrapedAt: "2024-05-01T12:00:00.000Z",
};

const imagePost: PostRecord = {
  id: "1",
  shortcode: "AAA",
  postUrl: "https://profiles.example.test/p/AAA/",
  caption: "hi",
  accessibilityCaption: "",
  commentsCount: 2,
  commentsDisabled: false,
  likesCount: 9,
  timestamp: 0,
  date: "1970-01-01T00:00:00.000Z",
  isVideo: false,
  displayUrl: "https://cdn.example.test/1.jpg",
  mediaUrl: "https://cdn.example.test/1.jpg",
  dimensions: { height: 1080, width: 1080 },
  location: null,
};

describe("presentProfile", () => {
  it("should emit snake-case keys in record order", () => {
    const presented = presentProfile(record, "snake");

    expect(Object.keys(presented)).toEqual([
      "username",
      "profile_name",
      "url",
      "followers",
      "following",
      "posts",
      "bio",
      "profile_pic_url",
      "is_business_account",
      "connected_to_facebook",
      "external_url",
      "joined_recently",
      "business_category",
      "is_private",
      "is_verified",
      "has_guides",
      "has_clips",
      "has_ar_effects",
      "has_channel",
      "highlight_reel_count",
      "scraped_timestamp",
    ]);
  });

  it("should carry the same values under display keys", () => {
    const snake = presentProfile(record, "snake");
    const display = presentProfile(record, "display");

    expect(Object.values(display)).toEqual(Object.values(snake));
    expect(display["Profile Name"]).toBe("Sample User");
    expect(display["Has AR Effects"]).toBe(false);
  });
});

describe("presentPosts", () => {
  it("should include video views only for video posts", () => {
    const [image, video] = presentPosts([imagePost, { ...imagePost, id: "2", isVideo: true, videoViews: 7 }], "display");

    expect(image).not.toHaveProperty("Video Views");
    expect(video).toMatchObject({ ID: "2", "Is Video": true, "Video Views": 7 });
  });
});

describe("formatProfileReport", () => {
  it("should render business, feature and timestamp lines", () => {
    const lines = formatProfileReport(record, 30).split("\n");

    expect(lines[0]).toBe("=".repeat(30));
    expect(lines[1]).toBe("   Instagram Profile Report   ");
    expect(lines).toContain("Bio:");
    expect(lines).toContain("No bio available");
    expect(lines).toContain("External URL: https://example.test");
    expect(lines).toContain("Business Category: Creators");
    expect(lines).toContain("Connected to Facebook: No");
    expect(lines).toContain("Highlight Reels: 4");
    expect(lines[lines.length - 2]).toBe("Scraped At: 2024-05-01T12:00:00.000Z");
  });
});
