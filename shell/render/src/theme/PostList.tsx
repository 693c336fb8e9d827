import type { JSX } from "preact";
import { render } from "preact-render-to-string";
import type { ResolvedItem } from "@folio/collections";
import { toISODateString, toShortDateString } from "@folio/utils";
import { excerptFor } from "../page-data";
import type { SiteModel } from "../types";
import { pageTitle } from "./layout-props";
import { siteHref } from "./links";

function PostEntry({
  post,
  site,
  showExcerpt,
}: {
  post: ResolvedItem;
  site: SiteModel;
  showExcerpt: boolean;
}): JSX.Element {
  const config = site.config;
  const excerpt = showExcerpt ? excerptFor(post, site) : "";
  return (
    <li className="post-entry">
      <a href={siteHref(config, post.url)}>{pageTitle(post) ?? post.slug}</a>
      {post.date && (
        <time dateTime={toISODateString(post.date)}>
          {toShortDateString(post.date)}
        </time>
      )}
      {excerpt && (
        <div
          className="post-excerpt"
          dangerouslySetInnerHTML={{ __html: excerpt }}
        />
      )}
    </li>
  );
}

/**
 * `{% include posts.html limit=5 excerpt=false %}`: newest posts first
 */
export function renderPostList(
  site: SiteModel,
  params: Record<string, unknown>,
): string {
  const posts = site.collections.get("posts")?.items ?? [];
  const limit = typeof params["limit"] === "number" ? params["limit"] : posts.length;
  const visible = posts.slice(0, Math.max(0, limit));
  if (visible.length === 0) {
    return "";
  }

  return render(
    <ul className="post-list">
      {visible.map((post) => (
        <PostEntry
          key={post.relativePath}
          post={post}
          site={site}
          showExcerpt={params["excerpt"] !== false}
        />
      ))}
    </ul>,
  );
}
