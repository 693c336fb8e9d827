import type { JSX } from "preact";
import { render } from "preact-render-to-string";
import { toISODateString, toShortDateString } from "@folio/utils";
import { siteHref } from "./links";
import { pageTags, pageTitle, type LayoutProps } from "./layout-props";

function PostLayoutBody({ site, page, content }: LayoutProps): JSX.Element {
  const title = pageTitle(page);
  const tags = pageTags(page);
  const { previous, next } = page;

  return (
    <article className="post">
      <header className="post-header">
        {title && <h1 className="post-title">{title}</h1>}
        {page.date && (
          <time dateTime={toISODateString(page.date)}>
            {toShortDateString(page.date)}
          </time>
        )}
        {tags.length > 0 && (
          <ul className="post-tags">
            {tags.map((tag) => (
              <li key={tag}>{tag}</li>
            ))}
          </ul>
        )}
      </header>
      <div
        className="post-body"
        dangerouslySetInnerHTML={{ __html: content }}
      />
      {(previous ?? next) && (
        <nav className="post-nav">
          {previous && (
            <a className="previous" href={siteHref(site.config, previous.url)}>
              ← {previous.title ?? previous.url}
            </a>
          )}
          {next && (
            <a className="next" href={siteHref(site.config, next.url)}>
              {next.title ?? next.url} →
            </a>
          )}
        </nav>
      )}
    </article>
  );
}

export function renderPostLayout(props: LayoutProps): string {
  return render(<PostLayoutBody {...props} />);
}
