import { describe, it, expect } from "vitest";
import type { FrontMatterDefault } from "@folio/config";
import { applyFrontMatterDefaults, matchesDefaultScope } from "../src";

const defaults: FrontMatterDefault[] = [
  {
    scope: { path: "" },
    values: { layout: "default", author: { name: "Ada" } },
  },
  {
    scope: { path: "_posts", type: "posts" },
    values: { layout: "post", comments: true },
  },
  {
    scope: { path: "", type: "projects" },
    values: { layout: "project" },
  },
];

describe("applyFrontMatterDefaults", () => {
  it("should merge matching scopes beneath the item's own values", () => {
    const frontMatter = applyFrontMatterDefaults(
      {
        relativePath: "_posts/2024-01-01-a.md",
        collection: "posts",
        frontMatter: { title: "A", author: { email: "ada@example.com" } },
      },
      defaults,
    );

    expect(frontMatter).toEqual({
      title: "A",
      layout: "post",
      comments: true,
      author: { name: "Ada", email: "ada@example.com" },
    });
  });

  it("should match pages by the pages type", () => {
    const frontMatter = applyFrontMatterDefaults(
      {
        relativePath: "about.md",
        collection: undefined,
        frontMatter: { title: "About" },
      },
      [...defaults, { scope: { path: "", type: "pages" }, values: { nav: true } }],
    );

    expect(frontMatter).toEqual({
      title: "About",
      layout: "default",
      author: { name: "Ada" },
      nav: true,
    });
  });

  it("should let the item's own values win", () => {
    const frontMatter = applyFrontMatterDefaults(
      {
        relativePath: "_projects/demo.md",
        collection: "projects",
        frontMatter: { layout: "custom" },
      },
      defaults,
    );

    expect(frontMatter["layout"]).toBe("custom");
  });

  it("should return the front matter untouched when nothing matches", () => {
    const item = {
      relativePath: "about.md",
      frontMatter: { title: "About" },
    };

    expect(applyFrontMatterDefaults(item, [])).toBe(item.frontMatter);
  });
});

describe("matchesDefaultScope", () => {
  it("should match path prefixes by whole segments", () => {
    const entry: FrontMatterDefault = { scope: { path: "_post" }, values: {} };

    expect(matchesDefaultScope({ relativePath: "_posts/a.md" }, entry)).toBe(
      false,
    );
    expect(matchesDefaultScope({ relativePath: "_post/a.md" }, entry)).toBe(
      true,
    );
  });

  it("should match glob paths", () => {
    const entry: FrontMatterDefault = {
      scope: { path: "projects/*.md" },
      values: {},
    };

    expect(matchesDefaultScope({ relativePath: "projects/a.md" }, entry)).toBe(
      true,
    );
    expect(
      matchesDefaultScope({ relativePath: "projects/sub/b.md" }, entry),
    ).toBe(false);
  });
});
