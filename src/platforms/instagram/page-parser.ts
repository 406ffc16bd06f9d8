import * as cheerio from "cheerio";
import { z } from "zod";
import { ParseError } from "../../core/errors";
import type { Logger } from "../../core/logger";
import { tokenizeWhitespace } from "../../core/normalize";
import type { JsonObject, RawPageData } from "../../domain/models";
import { INSTAGRAM_SELECTORS } from "./selectors";

const JsonObjectSchema = z.record(z.string(), z.unknown());

const SharedDataSchema = z.object({
  entry_data: z.object({
    ProfilePage: z.array(z.unknown()).nonempty(),
  }),
});

const ProfilePageEntrySchema = z.object({
  graphql: z.object({
    user: JsonObjectSchema,
  }),
});

export function parseProfilePage(html: string, logger: Logger): RawPageData {
  const $ = cheerio.load(html);

  const summary = $(INSTAGRAM_SELECTORS.PAGE.SUMMARY_META).first().attr("content");
  if (summary === undefined) {
    throw new ParseError("Summary meta tag (og:description) not found", "MISSING_SUMMARY");
  }
  const metaTokens = tokenizeWhitespace(summary);

  const jsonLdElement = $(INSTAGRAM_SELECTORS.PAGE.JSON_LD).first();
  const jsonLd = jsonLdElement.length > 0 ? parseJsonLd(jsonLdElement.text(), logger) : undefined;

  const marker = INSTAGRAM_SELECTORS.SNAPSHOT.ASSIGNMENT_MARKER;
  const snapshotScript = $(INSTAGRAM_SELECTORS.PAGE.INLINE_SCRIPT)
    .toArray()
    .map((element) => $(element).text())
    .find((text) => text.includes(marker));

  if (snapshotScript === undefined) {
    throw new ParseError(`No inline script assigns ${marker}`, "MISSING_SNAPSHOT");
  }

  const snapshot = parseSnapshot(snapshotScript, marker);
  const user = resolveUserNode(snapshot);

  logger.debug(
    { metaTokens: metaTokens.length, hasJsonLd: jsonLd !== undefined, userKeys: Object.keys(user).length },
    "Parsed profile page"
  );

  return { metaTokens, jsonLd, snapshot, user };
}

function parseJsonLd(text: string, logger: Logger): JsonObject {
  try {
    const parsed = JsonObjectSchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      return parsed.data;
    }
    logger.debug("JSON-LD block is not an object; ignoring it");
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    logger.debug({ error: message }, "JSON-LD block did not parse; ignoring it");
  }
  return {};
}

export function extractAssignedJson(script: string, marker: string): string {
  const markerIndex = script.indexOf(marker);
  const equalsIndex = markerIndex === -1 ? -1 : script.indexOf("=", markerIndex + marker.length);
  if (equalsIndex === -1) {
    throw new ParseError(`Script mentions ${marker} but holds no assignment`, "INVALID_SNAPSHOT");
  }
  return script
    .slice(equalsIndex + 1)
    .trim()
    .replace(/;+$/, "")
    .trim();
}

function parseSnapshot(script: string, marker: string): JsonObject {
  const literal = extractAssignedJson(script, marker);

  let parsed: unknown;
  try {
    parsed = JSON.parse(literal);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new ParseError(`Snapshot JSON is malformed: ${message}`, "INVALID_SNAPSHOT");
  }

  const result = JsonObjectSchema.safeParse(parsed);
  if (!result.success) {
    throw new ParseError("Snapshot JSON is not an object", "INVALID_SNAPSHOT");
  }
  return result.data;
}

function resolveUserNode(snapshot: JsonObject): JsonObject {
  const shared = SharedDataSchema.safeParse(snapshot);
  if (!shared.success) {
    throw new ParseError("Snapshot has no entry_data.ProfilePage entries", "MISSING_USER_NODE");
  }

  const entry = ProfilePageEntrySchema.safeParse(shared.data.entry_data.ProfilePage[0]);
  if (!entry.success) {
    throw new ParseError("Snapshot ProfilePage[0] has no graphql.user node", "MISSING_USER_NODE");
  }
  return entry.data.graphql.user;
}
