import { render } from "preact-render-to-string";
import { slugify } from "@folio/utils";
import type { SiteModel } from "../types";
import { pageTitle } from "./layout-props";
import { siteHref } from "./links";

/**
 * `{% include tags.html %}`: every tag with its posts, anchored by slug
 */
export function renderTagList(site: SiteModel): string {
  if (site.tags.size === 0) {
    return "";
  }

  return render(
    <div className="tags">
      <ul className="tag-index">
        {[...site.tags].map(([tag, posts]) => (
          <li key={tag}>
            <a href={`#${slugify(tag)}`}>
              {tag} <span className="tag-count">{posts.length}</span>
            </a>
          </li>
        ))}
      </ul>
      {[...site.tags].map(([tag, posts]) => (
        <section key={tag} id={slugify(tag)} className="tag-group">
          <h2>{tag}</h2>
          <ul>
            {posts.map((post) => (
              <li key={post.relativePath}>
                <a href={siteHref(site.config, post.url)}>
                  {pageTitle(post) ?? post.slug}
                </a>
              </li>
            ))}
          </ul>
        </section>
      ))}
    </div>,
  );
}
