import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createSilentLogger, createTempSite, type TempSite } from "@folio/test-utils";
import { SiteBuildError } from "@folio/utils";
import { PreviewServer, createPreviewApp, resolveCleanPath } from "../src";

describe("createPreviewApp", () => {
  let site: TempSite;

  beforeEach(async () => {
    site = await createTempSite({
      "_site/index.html": "home",
      "_site/about/index.html": "about",
      "_site/contact.html": "contact",
      "_site/assets/style.css": "body {}",
      "_site/404.html": "custom not found",
    });
  });

  afterEach(async () => {
    await site.cleanup();
  });

  it("should serve the home page", async () => {
    const res = await createPreviewApp(site.path("_site")).request("/");

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("home");
  });

  it("should map clean URLs onto index files", async () => {
    const app = createPreviewApp(site.path("_site"));

    expect(await (await app.request("/about")).text()).toBe("about");
    expect(await (await app.request("/about/")).text()).toBe("about");
  });

  it("should map clean URLs onto .html files", async () => {
    const res = await createPreviewApp(site.path("_site")).request("/contact");

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("contact");
  });

  it("should serve assets with their content type", async () => {
    const res = await createPreviewApp(site.path("_site")).request("/assets/style.css");

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("text/css");
  });

  it("should disable caching", async () => {
    const res = await createPreviewApp(site.path("_site")).request("/");

    expect(res.headers.get("cache-control")).toBe(
      "no-cache, no-store, must-revalidate",
    );
  });

  it("should answer misses with the site's 404 page", async () => {
    const res = await createPreviewApp(site.path("_site")).request("/missing");

    expect(res.status).toBe(404);
    expect(await res.text()).toBe("custom not found");
  });

  it("should answer misses with plain text without a 404 page", async () => {
    const other = await createTempSite({ "_site/index.html": "home" });
    try {
      const res = await createPreviewApp(other.path("_site")).request("/missing");

      expect(res.status).toBe(404);
      expect(await res.text()).toBe("Not Found");
    } finally {
      await other.cleanup();
    }
  });

  it("should serve the site below its base URL", async () => {
    const app = createPreviewApp(site.path("_site"), { baseurl: "/blog" });

    expect(await (await app.request("/blog")).text()).toBe("home");
    expect(await (await app.request("/blog/about")).text()).toBe("about");
    expect((await app.request("/about")).status).toBe(404);
  });
});

describe("resolveCleanPath", () => {
  let site: TempSite;

  beforeEach(async () => {
    site = await createTempSite({ "projects/demo/index.html": "demo" });
  });

  afterEach(async () => {
    await site.cleanup();
  });

  it.each([
    ["/", "/index.html"],
    ["/projects/demo", "/projects/demo/index.html"],
    ["/projects/demo/", "/projects/demo/index.html"],
    ["/about", "/about.html"],
    ["/feed.xml", "/feed.xml"],
  ])("should map %s to %s", (path, expected) => {
    expect(resolveCleanPath(site.root, path)).toBe(expected);
  });
});

describe("PreviewServer", () => {
  it("should refuse to start without a build", async () => {
    const server = new PreviewServer(
      { outputDir: "/nonexistent/folio/_site" },
      createSilentLogger(),
    );

    await expect(server.start()).rejects.toThrow(SiteBuildError);
    expect(server.isRunning()).toBe(false);
  });

  it("should report its URL", () => {
    const server = new PreviewServer(
      { outputDir: "_site", port: 4010, baseurl: "/blog" },
      createSilentLogger(),
    );

    expect(server.url).toBe("http://localhost:4010/blog/");
  });
});
