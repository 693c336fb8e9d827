import { describe, it, expect } from "vitest";
import { ConfigError } from "@folio/utils";
import {
  resolvePermalink,
  toOutputPath,
  PAGE_PERMALINK,
  COLLECTION_PERMALINK,
} from "../src";
import { makeItem } from "./fixtures";

const DATE_STYLE = "/:categories/:year/:month/:day/:title:output_ext";

describe("resolvePermalink", () => {
  it("should resolve :name from front matter", () => {
    const item = makeItem("_projects/demo-project.md", {
      collection: "projects",
      frontMatter: { name: "demo" },
    });

    expect(resolvePermalink("/projects/:name", item)).toBe("/projects/demo");
  });

  it("should fall back to the file slug for :name", () => {
    const item = makeItem("_projects/Widget.md", { collection: "projects" });

    expect(resolvePermalink("/projects/:name", item)).toBe("/projects/widget");
  });

  it("should expand date placeholders and categories", () => {
    const item = makeItem("_posts/2024-03-01-hello-world.md", {
      collection: "posts",
      date: new Date("2024-03-01T00:00:00Z"),
      frontMatter: { title: "Hello, World!", categories: ["Dev Notes"] },
    });

    expect(resolvePermalink(DATE_STYLE, item)).toBe(
      "/dev-notes/2024/03/01/hello-world.html",
    );
  });

  it("should collapse empty segments", () => {
    const item = makeItem("_posts/2024-03-01-hello-world.md", {
      collection: "posts",
      date: new Date("2024-03-01T00:00:00Z"),
    });

    expect(resolvePermalink(DATE_STYLE, item)).toBe(
      "/2024/03/01/hello-world.html",
    );
  });

  it("should expand ordinal and unpadded date parts", () => {
    const item = makeItem("_posts/2024-03-05-hello-world.md", {
      collection: "posts",
      date: new Date("2024-03-05T00:00:00Z"),
    });

    expect(resolvePermalink("/:year/:y_day/:slug", item)).toBe(
      "/2024/065/hello-world",
    );
    expect(resolvePermalink("/:short_year/:i_month/:i_day/:slug/", item)).toBe(
      "/24/3/5/hello-world/",
    );
  });

  it("should prefer a front matter slug for :title", () => {
    const item = makeItem("_posts/2024-03-05-hello-world.md", {
      collection: "posts",
      date: new Date("2024-03-05T00:00:00Z"),
      frontMatter: { title: "Hello World", slug: "greetings" },
    });

    expect(resolvePermalink("/blog/:title/", item)).toBe("/blog/greetings/");
  });

  it("should let front matter permalink override the pattern", () => {
    const item = makeItem("_projects/demo.md", {
      collection: "projects",
      frontMatter: { permalink: "/work/:name/" },
    });

    expect(resolvePermalink("/projects/:name", item)).toBe("/work/demo/");
  });

  it("should leave unknown placeholders as written", () => {
    expect(resolvePermalink("/x/:unknown", makeItem("a.md"))).toBe(
      "/x/:unknown",
    );
  });

  it("should map pages through the page pattern", () => {
    expect(resolvePermalink(PAGE_PERMALINK, makeItem("about.md"))).toBe(
      "/about.html",
    );
    expect(resolvePermalink(PAGE_PERMALINK, makeItem("docs/guide.md"))).toBe(
      "/docs/guide.html",
    );
    expect(resolvePermalink(PAGE_PERMALINK, makeItem("feed.xml"))).toBe(
      "/feed.xml",
    );
    expect(resolvePermalink(PAGE_PERMALINK, makeItem("index.md"))).toBe("/");
    expect(resolvePermalink(PAGE_PERMALINK, makeItem("blog/index.html"))).toBe(
      "/blog/",
    );
  });

  it("should place collection members below the collection by default", () => {
    const item = makeItem("_projects/tools/cli.md", { collection: "projects" });

    expect(resolvePermalink(COLLECTION_PERMALINK, item)).toBe(
      "/projects/tools/cli.html",
    );
  });

  it("should be deterministic", () => {
    const item = makeItem("_projects/demo.md", {
      collection: "projects",
      frontMatter: { name: "demo" },
    });

    expect(resolvePermalink("/projects/:name", item)).toBe(
      resolvePermalink("/projects/:name", { ...item }),
    );
  });
});

describe("toOutputPath", () => {
  it("should map URLs onto files", () => {
    expect(toOutputPath("/")).toBe("index.html");
    expect(toOutputPath("/projects/demo")).toBe("projects/demo/index.html");
    expect(toOutputPath("/projects/demo/")).toBe("projects/demo/index.html");
    expect(toOutputPath("/about.html")).toBe("about.html");
    expect(toOutputPath("/feed.xml")).toBe("feed.xml");
  });

  it("should decode escaped characters", () => {
    expect(toOutputPath("/my%20page/")).toBe("my page/index.html");
  });

  it("should reject paths that leave the destination", () => {
    expect(() => toOutputPath("/../etc/passwd")).toThrow(ConfigError);
    expect(() => toOutputPath("/a/%2E%2E/b")).toThrow(ConfigError);
  });
});
