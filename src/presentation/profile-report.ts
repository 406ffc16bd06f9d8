import type { ProfileRecord } from "../domain/models";

const yesNo = (value: unknown): string => (value ? "Yes" : "No");

function center(text: string, width: number): string {
  const padding = Math.max(0, width - text.length);
  const left = Math.floor(padding / 2);
  return " ".repeat(left) + text + " ".repeat(padding - left);
}

export function formatProfileReport(record: ProfileRecord, width = 60): string {
  const rule = "=".repeat(width);
  const lines = [
    rule,
    center("Instagram Profile Report", width),
    rule,
    `Username: ${record.username}`,
    `Profile Name: ${record.displayName}`,
    `URL: ${record.url}`,
    `Followers: ${record.followers}`,
    `Following: ${record.following}`,
    `Posts: ${record.posts}`,
    "",
    "Bio:",
    record.bio || "No bio available",
  ];

  if (record.externalUrl) {
    lines.push("", `External URL: ${record.externalUrl}`);
  }

  lines.push("", "Account Type:", `Business Account: ${yesNo(record.isBusinessAccount)}`);
  if (record.isBusinessAccount) {
    lines.push(`Business Category: ${record.businessCategory || "N/A"}`);
  }
  lines.push(
    `Private Account: ${yesNo(record.isPrivate)}`,
    `Verified Account: ${yesNo(record.isVerified)}`,
    `Connected to Facebook: ${yesNo(record.connectedFbPage)}`,
    "",
    "Additional Features:",
    `Has Guides: ${yesNo(record.hasGuides)}`,
    `Has Clips: ${yesNo(record.hasClips)}`,
    `Has AR Effects: ${yesNo(record.hasArEffects)}`,
    `Has Channel: ${yesNo(record.hasChannel)}`,
    `Highlight Reels: ${record.highlightReelCount}`,
    "",
    `Scraped At: ${record.scrapedAt}`,
    rule
  );

  return lines.join("\n");
}
