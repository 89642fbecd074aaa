// CHANGE: Validate upload index pagination and slug matching.
// WHY: The first page with the slug wins and later pages are never requested.
// SOURCE: internal reasoning

import { describe, expect, it } from "vitest";
import { findProfile } from "../src/apps.js";
import { NotFoundError, TransportError } from "../src/errors.js";
import { findSlugLink, locateRelease } from "../src/locator.js";
import { createRequest } from "../src/utils/slug.js";
import { uploadsPageUrl } from "../src/utils/url.js";
import { BASE, FakeMirror, contextFor, testConfig, uploadsPage } from "./helpers/fake-mirror.js";

const request = createRequest(findProfile("youtube"), "19.45.38");
const RELEASE_PATH = "/apk/google-inc/youtube/youtube-19-45-38-release/";

describe("uploadsPageUrl", () => {
  it("omits the page segment for page 1", () => {
    expect(uploadsPageUrl(BASE, "youtube", 1)).toBe("https://mirror.test/uploads/?appcategory=youtube");
    expect(uploadsPageUrl(BASE, "youtube-music", 3)).toBe(
      "https://mirror.test/uploads/page/3/?appcategory=youtube-music"
    );
  });
});

describe("findSlugLink", () => {
  it("matches by substring of the href and keeps the first hit", () => {
    const links = [
      { href: "/apk/google-inc/youtube/youtube-19-44-39-release/", text: "" },
      { href: "/apk/google-inc/youtube/youtube-19-45-38-release/youtube-19-45-38-android-apk-download/", text: "" },
      { href: RELEASE_PATH, text: "" }
    ];
    expect(findSlugLink(links, "youtube-19-45-38-release")?.href).toBe(links[1]?.href);
  });
});

describe("locateRelease", () => {
  it("returns the release page found on page 1 without requesting page 2", async () => {
    const mirror = new FakeMirror().page(
      uploadsPageUrl(BASE, "youtube", 1),
      uploadsPage(["/apk/google-inc/youtube/youtube-19-44-39-release/", RELEASE_PATH])
    );

    const result = await locateRelease(request, contextFor(mirror));

    expect(result).toEqual({ ok: true, value: `${BASE}${RELEASE_PATH}` });
    expect(mirror.requested).toEqual([uploadsPageUrl(BASE, "youtube", 1)]);
  });

  it("stops at the lowest page containing the slug", async () => {
    const mirror = new FakeMirror()
      .page(uploadsPageUrl(BASE, "youtube", 3), uploadsPage([RELEASE_PATH]))
      .page(uploadsPageUrl(BASE, "youtube", 4), uploadsPage(["/apk/elsewhere/youtube-19-45-38-release/"]));

    const result = await locateRelease(request, contextFor(mirror));

    expect(result).toEqual({ ok: true, value: `${BASE}${RELEASE_PATH}` });
    expect(mirror.requested).toEqual([1, 2, 3].map(page => uploadsPageUrl(BASE, "youtube", page)));
  });

  it("fails with NotFoundError after scanning every page up to the cap", async () => {
    const mirror = new FakeMirror();

    const result = await locateRelease(request, contextFor(mirror));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(result.error.message).toBe('Version slug "youtube-19-45-38-release" not found in 25 upload pages');
    }
    expect(mirror.requested).toHaveLength(25);
    expect(mirror.requested[24]).toBe(uploadsPageUrl(BASE, "youtube", 25));
  });

  it("honours a lower page cap from configuration", async () => {
    const mirror = new FakeMirror();
    await locateRelease(request, contextFor(mirror, testConfig({ maxPages: 2 })));
    expect(mirror.requested).toHaveLength(2);
  });

  it("propagates a failed page fetch immediately", async () => {
    const mirror = new FakeMirror()
      .page(uploadsPageUrl(BASE, "youtube", 2), "Forbidden", 403)
      .page(uploadsPageUrl(BASE, "youtube", 3), uploadsPage([RELEASE_PATH]));

    const result = await locateRelease(request, contextFor(mirror));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.stage).toBe("locate");
      expect(result.error.message).toBe(`HTTP 403 for ${uploadsPageUrl(BASE, "youtube", 2)}`);
    }
    expect(mirror.requested).toHaveLength(2);
  });

  it("sends the profile's header set", async () => {
    const reddit = createRequest(findProfile("reddit"), "2024.45.0");
    const mirror = new FakeMirror().page(
      uploadsPageUrl(BASE, "reddit", 1),
      uploadsPage(["/apk/redditinc/reddit/reddit-2024-45-0-release/"])
    );

    await locateRelease(reddit, contextFor(mirror));

    expect(mirror.headersSeen[0]?.Referer).toBe("https://www.apkmirror.com/");
  });
});
