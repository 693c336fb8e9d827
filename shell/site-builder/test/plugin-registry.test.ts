import { describe, it, expect } from "vitest";
import { parseConfig } from "@folio/config";
import { createSilentLogger } from "@folio/test-utils";
import { SiteBuildError } from "@folio/utils";
import { PluginRegistry, type SitePlugin } from "../src";

function plugin(name: string, aliases: string[] = []): SitePlugin {
  return { name, aliases, generate: () => [] };
}

describe("PluginRegistry", () => {
  const sitemap = plugin("sitemap", ["jekyll-sitemap"]);
  const feed = plugin("feed", ["jekyll-feed"]);

  function registry(): PluginRegistry {
    return PluginRegistry.createFresh(createSilentLogger(), [sitemap, feed]);
  }

  it("should find plugins by name or alias", () => {
    const plugins = registry();

    expect(plugins.get("sitemap")).toBe(sitemap);
    expect(plugins.get("jekyll-feed")).toBe(feed);
    expect(plugins.get("jemoji")).toBeUndefined();
    expect(plugins.list()).toEqual([sitemap, feed]);
  });

  it("should reject a name that is already taken", () => {
    const plugins = registry();

    expect(() => plugins.register(plugin("sitemap-v2", ["jekyll-sitemap"]))).toThrow(
      new SiteBuildError(
        'Plugin name "jekyll-sitemap" of sitemap-v2 is already registered by sitemap',
      ),
    );
    expect(plugins.get("sitemap-v2")).toBeUndefined();
  });

  it("should select plugins in registration order", () => {
    const config = parseConfig(
      "title: T\nplugins: [jekyll-feed, jemoji, jekyll-sitemap]\n",
    );

    const selection = registry().select(config);

    expect(selection.enabled).toEqual([sitemap, feed]);
    expect(selection.unknown).toEqual(["jemoji"]);
    expect(selection.blocked).toEqual([]);
  });

  it("should select a plugin once when listed under several names", () => {
    const config = parseConfig("title: T\nplugins: [feed, jekyll-feed]\n");

    expect(registry().select(config).enabled).toEqual([feed]);
  });

  it("should block plugins missing from the whitelist in safe mode", () => {
    const config = parseConfig(
      "title: T\nsafe: true\nplugins: [jekyll-feed, jekyll-sitemap]\nwhitelist: [jekyll-sitemap]\n",
    );

    const selection = registry().select(config);

    expect(selection.enabled).toEqual([sitemap]);
    expect(selection.blocked).toEqual([feed]);
  });
});
