import { describe, it, expect } from "vitest";
import { ParseError } from "../../src/core/errors";
import { silentLogger } from "../../src/core/logger";
import { extractAssignedJson, parseProfilePage } from "../../src/platforms/instagram/page-parser";
import { buildProfilePageHtml, buildSharedData, buildUserNode } from "../helpers/profile-page";

function parseError(html: string): ParseError | undefined {
  try {
    parseProfilePage(html, silentLogger);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  return undefined;
}

describe("parseProfilePage", () => {
  it("should tokenize the summary and resolve the user node", () => {
    const raw = parseProfilePage(buildProfilePageHtml(), silentLogger);

    expect(raw.metaTokens).toEqual(["1.5k", "Followers,", "75", "Following,", "3", "Posts", "-", "Sample"]);
    expect(raw.jsonLd).toBeUndefined();
    expect(raw.user.username).toBe("sample.user");
    expect(Object.keys(raw.snapshot)).toEqual(["entry_data"]);
  });

  it("should parse a JSON-LD block when present", () => {
    const html = buildProfilePageHtml({
      jsonLd: JSON.stringify({ name: "Sample Display", mainEntityOfPage: { "@id": "https://profiles.example.test/sample.user/" } }),
    });

    const raw = parseProfilePage(html, silentLogger);

    expect(raw.jsonLd).toEqual({ name: "Sample Display", mainEntityOfPage: { "@id": "https://profiles.example.test/sample.user/" } });
  });

  it("should yield an empty mapping when JSON-LD does not parse", () => {
    const raw = parseProfilePage(buildProfilePageHtml({ jsonLd: "{not json" }), silentLogger);

    expect(raw.jsonLd).toEqual({});
  });

  it("should fail with MISSING_SUMMARY when the meta tag is absent", () => {
    expect(parseError(buildProfilePageHtml({ summary: null }))?.code).toBe("MISSING_SUMMARY");
  });

  it("should fail with MISSING_SNAPSHOT when no script assigns the snapshot", () => {
    expect(parseError(buildProfilePageHtml({ snapshotScript: null }))?.code).toBe("MISSING_SNAPSHOT");
  });

  it("should fail with INVALID_SNAPSHOT when the assigned literal is malformed", () => {
    const html = buildProfilePageHtml({ snapshotScript: "window._sharedData = {\"entry_data\": ;" });

    expect(parseError(html)?.code).toBe("INVALID_SNAPSHOT");
  });

  it("should fail with MISSING_USER_NODE when ProfilePage is empty", () => {
    const html = buildProfilePageHtml({
      snapshotScript: `window._sharedData = ${JSON.stringify({ entry_data: { ProfilePage: [] } })};`,
    });

    expect(parseError(html)?.code).toBe("MISSING_USER_NODE");
  });

  it("should fail with MISSING_USER_NODE when graphql.user is missing", () => {
    const html = buildProfilePageHtml({
      snapshotScript: `window._sharedData = ${JSON.stringify({ entry_data: { ProfilePage: [{ graphql: {} }] } })};`,
    });

    expect(parseError(html)?.code).toBe("MISSING_USER_NODE");
  });

  it("should accept a snapshot assignment without a trailing semicolon", () => {
    const snapshot = buildSharedData(buildUserNode({ username: "no.semicolon" }));
    const html = buildProfilePageHtml({ snapshotScript: `window._sharedData = ${JSON.stringify(snapshot)}` });

    expect(parseProfilePage(html, silentLogger).user.username).toBe("no.semicolon");
  });

  it("should not mistake a JSON-LD block that mentions the snapshot marker for the snapshot", () => {
    const html = buildProfilePageHtml({
      jsonLd: JSON.stringify({ name: "Sample Display", description: "I debug window._sharedData for fun, see https://x.test/?a=b" }),
    });

    const raw = parseProfilePage(html, silentLogger);

    expect(raw.user.username).toBe("sample.user");
    expect(raw.jsonLd?.description).toBe("I debug window._sharedData for fun, see https://x.test/?a=b");
  });

  it("should ignore untyped inline scripts", () => {
    const html = buildProfilePageHtml({ snapshotScript: null }).replace(
      "</head>",
      `<script>window._sharedData = ${JSON.stringify(buildSharedData(buildUserNode()))};</script></head>`
    );

    expect(parseError(html)?.code).toBe("MISSING_SNAPSHOT");
  });
});

describe("extractAssignedJson", () => {
  it("should take the literal after the assignment and drop trailing semicolons", () => {
    expect(extractAssignedJson('  window._sharedData = {"a":1};;  ', "window._sharedData")).toBe('{"a":1}');
  });

  it("should fail with INVALID_SNAPSHOT when there is no assignment", () => {
    expect(() => extractAssignedJson("console.log(window._sharedData)", "window._sharedData")).toThrow(ParseError);
  });
});
